/**
 * Ownership Resolver
 *
 * Asks the ledger which slots a wallet holds. An unreachable ledger is a
 * distinct result, never an empty list.
 */

import {
  InvalidInputError,
  LedgerUnreachableError,
  TIMEOUTS,
  describeError,
  noopLogger,
  parseIdentifier,
  parseWalletAddress,
} from '@slotwarden/ipc';
import type { Logger, SlotId } from '@slotwarden/ipc';
import { withTimeout } from '../timeout';
import type { SlotLedger } from './ledger';

export type OwnershipResolution =
  | { ok: true; wallet: string; chain: string; slots: readonly SlotId[] }
  | { ok: false; error: LedgerUnreachableError | InvalidInputError };

export interface OwnershipResolverOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export class OwnershipResolver {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly ledger: SlotLedger,
    options: OwnershipResolverOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.LEDGER_CALL_MS;
    this.logger = options.logger ?? noopLogger;
  }

  async resolveOwnedSlots(walletInput: string, chainInput: string): Promise<OwnershipResolution> {
    let wallet: string;
    let chain: string;
    try {
      wallet = parseWalletAddress(walletInput);
      chain = parseIdentifier(chainInput, 'chain');
    } catch (err) {
      if (err instanceof InvalidInputError) return { ok: false, error: err };
      throw err;
    }

    let raw: readonly bigint[];
    try {
      raw = await withTimeout(
        (signal) => this.ledger.getOwnedSlotIds(wallet, chain, signal),
        this.timeoutMs,
        () => new LedgerUnreachableError(chain, `no response within ${this.timeoutMs}ms`),
      );
    } catch (err) {
      const error =
        err instanceof LedgerUnreachableError ? err : new LedgerUnreachableError(chain, describeError(err), { cause: err });
      this.logger.warn('Ownership lookup failed', { chain, wallet, error: error.message });
      return { ok: false, error };
    }

    const slots = new Set<SlotId>();
    for (const id of raw) {
      if (id < 0n || id > BigInt(Number.MAX_SAFE_INTEGER)) {
        return { ok: false, error: new LedgerUnreachableError(chain, `malformed slot id ${id.toString()}`) };
      }
      slots.add(Number(id));
    }

    const sorted = [...slots].sort((a, b) => a - b);
    this.logger.debug('Resolved owned slots', { chain, wallet, count: sorted.length });
    return { ok: true, wallet, chain, slots: sorted };
  }
}
