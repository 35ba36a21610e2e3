/**
 * Exit codes and top-level error reporting
 */

import { ConfigurationIncompleteError, InvalidInputError, UnownedSlotRequestedError, describeError } from '@slotwarden/ipc';
import { ProfileExistsError, ProfileNotFoundError, ValidationError } from '@slotwarden/storage';

export const EXIT = {
  OK: 0,
  FAILURE: 1,
  INVALID_INPUT: 2,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(err: unknown): ExitCode {
  if (
    err instanceof InvalidInputError ||
    err instanceof ValidationError ||
    err instanceof ConfigurationIncompleteError ||
    err instanceof UnownedSlotRequestedError ||
    err instanceof ProfileNotFoundError ||
    err instanceof ProfileExistsError
  ) {
    return EXIT.INVALID_INPUT;
  }
  return EXIT.FAILURE;
}

/** Print the error and set the process exit code */
export function reportError(err: unknown, stderr: NodeJS.WritableStream = process.stderr): ExitCode {
  const code = exitCodeFor(err);
  stderr.write(`Error: ${describeError(err)}\n`);
  process.exitCode = code;
  return code;
}
