/**
 * Slot domain types
 *
 * A slot is an on-chain work-assignment right. It is identified by a
 * non-negative integer, unique per chain, and owned by one wallet.
 */

export type SlotId = number;

/** (slot, chain, market): the key that names at most one live instance */
export interface SlotRef {
  slotId: SlotId;
  chain: string;
  market: string;
}

export interface Slot extends SlotRef {
  owner: string;
}

/** What the caller asked for: explicit ids, or every owned slot */
export type SlotSelection = readonly SlotId[] | 'all';
