/**
 * Structured logging using Pino.
 * Logs go to stderr so machine-readable output on stdout stays clean.
 */

import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  /** File descriptor or path; defaults to stderr */
  destination?: number | string;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  return pino(
    {
      name: 'querygate',
      level: opts.level ?? process.env.QUERYGATE_LOG_LEVEL ?? 'warn',
      base: undefined,
    },
    pino.destination(opts.destination ?? 2),
  );
}

/** Process-wide default logger. Pipeline callers may inject their own. */
export const logger = createLogger();
