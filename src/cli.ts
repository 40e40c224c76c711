#!/usr/bin/env node
import { Command } from 'commander';
import { registerCheckCommand } from './commands/checkCommand';
import { registerGenerateCommand } from './commands/generateCommand';
import type { CommandContext } from './commands/types';
import { isGeneratorError } from './models/errors';
import { logger, setLogLevel } from './services/logger';

export const VERSION = '0.1.0';

export function buildProgram(ctx: CommandContext): Command {
  const program = new Command('insomnia-gen')
    .description('Generate Insomnia collections from Swagger 2.0 documents')
    .version(VERSION)
    .option('-v, --verbose', 'log debug output, including skipped operations')
    .showHelpAfterError();

  program.hook('preAction', () => {
    if (program.opts<{ verbose?: boolean }>().verbose) setLogLevel('debug');
  });

  registerGenerateCommand(program, ctx);
  registerCheckCommand(program, ctx);
  return program;
}

export async function main(argv: string[]): Promise<void> {
  const ctx: CommandContext = {
    logger,
    stdout: text => { process.stdout.write(text); },
  };
  try {
    await buildProgram(ctx).parseAsync(argv);
  } catch (e: unknown) {
    if (isGeneratorError(e)) {
      ctx.logger.error({ code: e.code, details: e.details }, e.message);
    } else {
      ctx.logger.error({ err: e }, 'Unexpected error');
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main(process.argv);
}
