/**
 * pino-backed Logger for the CLI
 *
 * Logs go to stderr so command output on stdout stays parseable.
 */

import pino from 'pino';
import type { DestinationStream } from 'pino';
import { ENV_KEYS } from '@slotwarden/ipc';
import type { LogLevel, Logger } from '@slotwarden/ipc';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env, verbose = false): LogLevel {
  if (verbose) return 'debug';
  const raw = env[ENV_KEYS.LOG_LEVEL]?.toLowerCase();
  return LEVELS.find((l) => l === raw) ?? 'warn';
}

export function createCliLogger(level: LogLevel, destination: DestinationStream = pino.destination(2)): Logger {
  const logger = pino(
    {
      level,
      base: undefined,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    destination,
  );

  return {
    debug: (message, data) => (data ? logger.debug(data, message) : logger.debug(message)),
    info: (message, data) => (data ? logger.info(data, message) : logger.info(message)),
    warn: (message, data) => (data ? logger.warn(data, message) : logger.warn(message)),
    error: (message, data) => (data ? logger.error(data, message) : logger.error(message)),
  };
}
