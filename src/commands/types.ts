import type { Logger } from '../services/logger';

/** Shared dependencies for CLI commands. */
export interface CommandContext {
  logger: Logger;
  /** Sink for generated text when no output file is given. */
  stdout: (text: string) => void;
}
