/**
 * Reconciliation plan types
 */

import type { SlotId } from '../slots/slots.types';

/**
 * How to classify an owned slot that is running under a different
 * profile or wallet than the active one.
 * - `orphan`: report it as orphaned (it must be torn down before redeploying)
 * - `adopt`: treat it as already running
 */
export type ForeignBindingPolicy = 'orphan' | 'adopt';

/** The active context a plan is computed for */
export interface ProfileScope {
  profile: string;
  wallet: string;
  chain: string;
  /** Omitted for chain-wide reports */
  market?: string;
}

export interface ActionPlan {
  toStart: SlotId[];
  alreadyRunning: SlotId[];
  orphaned: SlotId[];
  unownedRequested: SlotId[];
}
