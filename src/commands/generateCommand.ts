import type { Command } from 'commander';
import { generateCollection, type GenerationResult } from '../generator';
import type { Diagnostic } from '../models/errors';
import { GeneratorError } from '../models/errors';
import { loadConfig } from '../services/configService';
import { loadSwaggerDocument } from '../services/documentLoader';
import { describeErrors, validateCollection } from '../services/validationService';
import { writeTextFile } from '../services/yamlParser';
import type { CommandContext } from './types';

export interface GenerateOptions {
  output?: string;
  config?: string;
  name?: string;
  host?: string;
  environment?: string;
}

const QUIET_DIAGNOSTICS: ReadonlySet<Diagnostic['code']> = new Set<Diagnostic['code']>(['depth-limit-reached', 'malformed-operation']);

/** Load, generate, validate and write one collection. */
export async function runGenerate(source: string, options: GenerateOptions, ctx: CommandContext): Promise<GenerationResult> {
  const { logger } = ctx;
  const doc = await loadSwaggerDocument(source);
  const config = await loadConfig(options.config, {
    collectionName: options.name,
    host: options.host,
    environmentName: options.environment,
  });

  const result = generateCollection(doc, config);
  for (const d of result.diagnostics) {
    const level = QUIET_DIAGNOSTICS.has(d.code) ? 'debug' : 'warn';
    logger[level]({ code: d.code, subject: d.subject }, d.message);
  }

  const check = validateCollection(result.collection);
  if (!check.ok) {
    throw new GeneratorError('INVALID_COLLECTION', 'Generated collection failed validation', describeErrors(check.errors));
  }

  if (result.undefinedVariables.length) {
    logger.info({ variables: result.undefinedVariables }, 'Requests reference variables no environment defines');
  }

  if (options.output) {
    await writeTextFile(options.output, result.yaml);
  } else {
    ctx.stdout(result.yaml);
  }

  logger.info(
    { ...result.stats, output: options.output ?? 'stdout' },
    `Generated ${result.stats.requests} request(s) in ${result.stats.folders} folder(s)`,
  );
  return result;
}

export function registerGenerateCommand(program: Command, ctx: CommandContext): Command {
  return program
    .command('generate')
    .argument('<source>', 'Swagger 2.0 JSON document')
    .description('Generate an Insomnia 5.0 collection from a Swagger document')
    .option('-o, --output <file>', 'write the collection to a file instead of stdout')
    .option('-c, --config <file>', 'YAML or JSON generator config')
    .option('-n, --name <name>', 'collection name')
    .option('--host <host>', 'host for the sub-environment')
    .option('-e, --environment <name>', 'sub-environment name')
    .action(async (source: string, options: GenerateOptions) => {
      await runGenerate(source, options, ctx);
    });
}
