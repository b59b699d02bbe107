/**
 * CLI logger using pino
 *
 * Writes JSON lines to stderr so stdout only carries the command result.
 */

import { isLogLevel, type LogLevel } from '@retrykit/core';
import pino, { type DestinationStream, type Logger } from 'pino';

export const LOG_LEVEL_ENV = 'RETRYKIT_LOG_LEVEL';

export type CliLoggerOptions = {
  level?: LogLevel;
  destination?: DestinationStream;
};

/**
 * Pick the log level: explicit flag, then RETRYKIT_LOG_LEVEL, then info.
 * Unknown values fall back to info.
 */
export function resolveLogLevel(
  flag?: string,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  const candidate = flag ?? env[LOG_LEVEL_ENV];
  return candidate && isLogLevel(candidate) ? candidate : 'info';
}

export function createCliLogger(options: CliLoggerOptions = {}): Logger {
  return pino(
    {
      name: 'retrykit',
      level: options.level ?? 'info',
      base: undefined,
      formatters: {
        level: (label) => ({ level: label })
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    options.destination ?? pino.destination({ dest: 2, sync: true })
  );
}
