import pino, { type Logger } from 'pino';

export type { Logger };

/** stdout carries the generated YAML, so logs go to stderr. */
export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  return pino({ name: 'insomnia-gen', level }, pino.destination(2));
}

export const logger = createLogger();

export function setLogLevel(level: string): void {
  logger.level = level;
}
