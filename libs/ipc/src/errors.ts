/**
 * Error taxonomy
 *
 * Every failure the engine reports carries a stable `code` so batch
 * summaries and the CLI can classify it without string matching.
 */

export type SlotwardenErrorCode =
  | 'LEDGER_UNREACHABLE'
  | 'INVALID_INPUT'
  | 'RESOURCE_ALLOCATION_EXHAUSTED'
  | 'START_FAILURE'
  | 'TEARDOWN_TIMEOUT'
  | 'TEARDOWN_FORCE_FAILED'
  | 'CONFIGURATION_INCOMPLETE'
  | 'UNOWNED_SLOT_REQUESTED'
  | 'COMMAND_FAILED';

export abstract class SlotwardenError extends Error {
  abstract readonly code: SlotwardenErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Error.captureStackTrace?.(this, new.target);
  }
}

/** The ownership ledger could not be asked. Never means "owns nothing". */
export class LedgerUnreachableError extends SlotwardenError {
  readonly code = 'LEDGER_UNREACHABLE';

  constructor(
    public readonly chain: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Ledger for chain "${chain}" unreachable: ${message}`, options);
  }
}

/** Malformed address, slot id, range or name. Rejected before any side effect. */
export class InvalidInputError extends SlotwardenError {
  readonly code = 'INVALID_INPUT';

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

export class ResourceAllocationExhaustedError extends SlotwardenError {
  readonly code = 'RESOURCE_ALLOCATION_EXHAUSTED';

  constructor(
    public readonly resource: 'subnet' | 'ports',
    public readonly slotId: number,
  ) {
    super(`No free ${resource === 'subnet' ? 'subnet' : 'port block'} left for slot ${slotId}`);
  }
}

export class StartFailureError extends SlotwardenError {
  readonly code = 'START_FAILURE';

  constructor(
    public readonly slotId: number,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Slot ${slotId} failed to start: ${reason}`, options);
  }
}

export class TeardownTimeoutError extends SlotwardenError {
  readonly code = 'TEARDOWN_TIMEOUT';

  constructor(
    public readonly resource: string,
    public readonly timeoutSec: number,
  ) {
    super(`${resource} did not stop within ${timeoutSec}s`);
  }
}

export class TeardownForceFailedError extends SlotwardenError {
  readonly code = 'TEARDOWN_FORCE_FAILED';

  constructor(
    public readonly resource: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`${resource} could not be force-killed: ${reason}`, options);
  }
}

/** A profile bundle is missing or has invalid fields. */
export class ConfigurationIncompleteError extends SlotwardenError {
  readonly code = 'CONFIGURATION_INCOMPLETE';

  constructor(
    public readonly profile: string,
    public readonly chain: string,
    public readonly market: string,
    public readonly issues: string[] = [],
  ) {
    super(
      issues.length > 0
        ? `Configuration for ${profile}/${chain}/${market} is incomplete: ${issues.join('; ')}`
        : `No configuration stored for ${profile}/${chain}/${market}`,
    );
  }
}

export class UnownedSlotRequestedError extends SlotwardenError {
  readonly code = 'UNOWNED_SLOT_REQUESTED';

  constructor(
    public readonly slotIds: readonly number[],
    public readonly wallet: string,
  ) {
    super(`Slot(s) ${slotIds.join(', ')} not owned by ${wallet}`);
  }
}

/** A runtime command (docker, screen) exited non-zero or timed out. */
export class CommandFailedError extends SlotwardenError {
  readonly code = 'COMMAND_FAILED';

  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly timedOut: boolean,
    options?: { cause?: unknown },
  ) {
    super(
      timedOut
        ? `\`${command}\` timed out`
        : `\`${command}\` exited with ${exitCode ?? 'signal'}${stderr ? `: ${stderr}` : ''}`,
      options,
    );
  }
}

export function isSlotwardenError(err: unknown): err is SlotwardenError {
  return err instanceof SlotwardenError;
}

/** Render any thrown value as a one-line reason. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
