/**
 * Reconciler
 *
 * Pure set arithmetic over owned slots, the user's request and the live
 * inventory. Performs no I/O.
 */

import type {
  ActionPlan,
  ForeignBindingPolicy,
  ProfileScope,
  RuntimeInstance,
  SlotId,
  SlotSelection,
} from '@slotwarden/ipc';

export interface PlanInput {
  owned: readonly SlotId[];
  requested: SlotSelection;
  running: readonly RuntimeInstance[];
  scope: ProfileScope;
  foreignBinding?: ForeignBindingPolicy;
}

function sorted(ids: Iterable<SlotId>): SlotId[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}

/** An instance matches when it carries no binding or the scope's own */
export function bindingMatches(instance: RuntimeInstance, scope: ProfileScope): boolean {
  const binding = instance.binding;
  if (!binding) return true;
  if (binding.profile !== undefined && binding.profile !== scope.profile) return false;
  if (binding.wallet !== undefined && binding.wallet.toLowerCase() !== scope.wallet.toLowerCase()) return false;
  return true;
}

export function plan(input: PlanInput): ActionPlan {
  const { scope } = input;
  const policy = input.foreignBinding ?? 'orphan';
  const owned = new Set(input.owned);

  const unownedRequested = new Set<SlotId>();
  let candidates: Set<SlotId>;
  if (input.requested === 'all') {
    candidates = new Set(owned);
  } else {
    candidates = new Set<SlotId>();
    for (const id of input.requested) {
      if (owned.has(id)) candidates.add(id);
      else unownedRequested.add(id);
    }
  }

  // slot id → does any in-scope instance for it match the active binding
  const runningById = new Map<SlotId, boolean>();
  for (const instance of input.running) {
    if (instance.chain !== scope.chain) continue;
    if (scope.market !== undefined && instance.market !== scope.market) continue;
    const matches = policy === 'adopt' || bindingMatches(instance, scope);
    runningById.set(instance.slotId, (runningById.get(instance.slotId) ?? false) || matches);
  }

  const toStart: SlotId[] = [];
  const alreadyRunning: SlotId[] = [];
  const orphaned: SlotId[] = [];

  for (const id of candidates) {
    const matches = runningById.get(id);
    if (matches === undefined) toStart.push(id);
    else if (matches) alreadyRunning.push(id);
    else orphaned.push(id);
  }

  for (const [id, matches] of runningById) {
    if (candidates.has(id) || unownedRequested.has(id)) continue;
    if (!owned.has(id)) orphaned.push(id);
    else if (matches) alreadyRunning.push(id);
    else orphaned.push(id);
  }

  return {
    toStart: sorted(toStart),
    alreadyRunning: sorted(alreadyRunning),
    orphaned: sorted(orphaned),
    unownedRequested: sorted(unownedRequested),
  };
}
