/**
 * Logger contract shared by the engine and storage layers.
 *
 * Libraries accept an optional Logger and fall back to `noopLogger`; the CLI
 * supplies a pino-backed implementation.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export const noopLogger: Logger = {
  debug() { /* no-op */ },
  info() { /* no-op */ },
  warn() { /* no-op */ },
  error() { /* no-op */ },
};
