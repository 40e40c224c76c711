import type { Command } from 'commander';
import { GeneratorError } from '../models/errors';
import { findUndefinedVariables } from '../services/unresolvedVars';
import { describeErrors, validateCollection } from '../services/validationService';
import { readYamlFile } from '../services/yamlParser';
import type { CommandContext } from './types';

export interface CheckReport {
  valid: boolean;
  errors: string[];
  undefinedVariables: string[];
}

/** Validate an existing collection file and list the variables it leaves undefined. */
export async function runCheck(collectionFile: string, ctx: CommandContext): Promise<CheckReport> {
  let data: unknown;
  try {
    data = await readYamlFile(collectionFile);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    const code = e instanceof Error && 'code' in e && e.code === 'ENOENT' ? 'MISSING_INPUT_DOCUMENT' : 'MALFORMED_INPUT_DOCUMENT';
    throw new GeneratorError(code, `Cannot read collection ${collectionFile}: ${reason}`);
  }

  const result = validateCollection(data);
  if (!result.ok) {
    const errors = describeErrors(result.errors);
    for (const line of errors) ctx.logger.error(line);
    return { valid: false, errors, undefinedVariables: [] };
  }

  const undefinedVariables = findUndefinedVariables(result.value);
  if (undefinedVariables.length) {
    ctx.logger.warn({ variables: undefinedVariables }, 'Collection references undefined variables');
  }
  ctx.logger.info({ folders: result.value.collection.length }, `${collectionFile} is a valid collection`);
  return { valid: true, errors: [], undefinedVariables };
}

export function registerCheckCommand(program: Command, ctx: CommandContext): Command {
  return program
    .command('check')
    .argument('<collection>', 'Insomnia collection YAML file')
    .description('Validate a collection and report undefined variables')
    .action(async (collectionFile: string) => {
      const report = await runCheck(collectionFile, ctx);
      if (!report.valid) process.exitCode = 1;
    });
}
