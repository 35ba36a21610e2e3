/**
 * Thin promise wrapper over `child_process.execFile`.
 *
 * Every call carries a timeout; a non-zero exit (outside `allowExitCodes`)
 * or a timeout rejects with CommandFailedError.
 */

import { execFile } from 'node:child_process';
import { CommandFailedError, TIMEOUTS } from '@slotwarden/ipc';

export interface RunOptions {
  timeoutMs?: number;
  /** Exit codes treated as success besides 0 */
  allowExitCodes?: number[];
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (file: string, args: string[], options?: RunOptions) => Promise<RunResult>;

const MAX_BUFFER = 16 * 1024 * 1024;

export const runCommand: CommandRunner = (file, args, options = {}) => {
  const timeout = options.timeoutMs ?? TIMEOUTS.RUNTIME_CALL_MS;
  const display = [file, ...args].join(' ');

  return new Promise((resolve, reject) => {
    execFile(file, args, { timeout, maxBuffer: MAX_BUFFER, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ stdout, stderr, exitCode: 0 });
        return;
      }

      const exitCode = typeof error.code === 'number' ? error.code : null;
      if (exitCode !== null && options.allowExitCodes?.includes(exitCode)) {
        resolve({ stdout, stderr, exitCode });
        return;
      }

      const timedOut = error.killed === true && exitCode === null;
      const detail = stderr.trim() || (typeof error.code === 'string' ? error.code : '');
      reject(new CommandFailedError(display, exitCode, detail, timedOut, { cause: error }));
    });
  });
};
