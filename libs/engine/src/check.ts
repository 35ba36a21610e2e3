/**
 * Reconciliation report
 *
 * Composes ownership, inventory and the reconciler into the `check` view.
 * Keeps no state of its own.
 */

import { formatSlotRanges } from '@slotwarden/ipc';
import type {
  ForeignBindingPolicy,
  InventorySnapshot,
  LedgerUnreachableError,
  InvalidInputError,
  ProfileScope,
  SlotId,
} from '@slotwarden/ipc';
import type { RuntimeInventory } from './inventory';
import type { OwnershipResolver } from './ledger/resolver';
import { plan } from './reconciler';

export interface CheckReport {
  profile: string;
  wallet: string;
  chain: string;
  market?: string;
  ownedCount: number;
  /** Owned slots with a matching live instance */
  runningCount: number;
  running: SlotId[];
  notRunning: SlotId[];
  orphaned: SlotId[];
  /** Percentage of owned slots running, one decimal; null when nothing is owned */
  coverage: number | null;
  /** Command line that starts the missing slots */
  deployHint?: string;
  containersWithoutSessions: SlotId[];
  sessionsWithoutContainers: SlotId[];
  unparsed: string[];
}

export interface CheckReportInput {
  scope: ProfileScope;
  owned: readonly SlotId[];
  snapshot: InventorySnapshot;
  policy?: ForeignBindingPolicy;
}

function ids(values: Iterable<SlotId>): SlotId[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

export function buildDeployHint(scope: ProfileScope, slots: readonly SlotId[]): string | undefined {
  if (slots.length === 0) return undefined;
  const parts = ['slotwarden deploy', `--chain ${scope.chain}`, `--market ${scope.market ?? '<market>'}`];
  parts.push(`--slot ${formatSlotRanges(slots)}`, `--profile ${scope.profile}`);
  return parts.join(' ');
}

export function buildCheckReport(input: CheckReportInput): CheckReport {
  const { scope, owned, snapshot } = input;
  const inScope = (ref: { chain: string; market: string }) =>
    ref.chain === scope.chain && (scope.market === undefined || ref.market === scope.market);

  const instances = snapshot.instances.filter(inScope);
  const result = plan({ owned, requested: 'all', running: instances, scope, foreignBinding: input.policy });
  const ownedSet = new Set(owned);

  const withoutSession = instances.filter((i) => i.session === undefined).map((i) => i.slotId);
  const containerIds = new Set(instances.map((i) => i.slotId));
  const orphanSessions = snapshot.sessions.filter((s) => inScope(s) && !containerIds.has(s.slotId)).map((s) => s.slotId);

  const running = result.alreadyRunning;
  const report: CheckReport = {
    profile: scope.profile,
    wallet: scope.wallet,
    chain: scope.chain,
    ownedCount: ownedSet.size,
    runningCount: running.length,
    running,
    notRunning: result.toStart,
    orphaned: result.orphaned,
    coverage: ownedSet.size === 0 ? null : Math.round((running.length / ownedSet.size) * 1000) / 10,
    containersWithoutSessions: ids(withoutSession),
    sessionsWithoutContainers: ids(orphanSessions),
    unparsed: [...snapshot.unparsed],
  };
  if (scope.market !== undefined) report.market = scope.market;
  const hint = buildDeployHint(scope, result.toStart);
  if (hint) report.deployHint = hint;
  return report;
}

export type CheckResult =
  | { ok: true; report: CheckReport }
  | { ok: false; error: LedgerUnreachableError | InvalidInputError };

export interface CheckDeps {
  resolver: OwnershipResolver;
  inventory: RuntimeInventory;
}

export interface CheckArgs {
  profile: string;
  wallet: string;
  chain: string;
  market?: string;
  policy?: ForeignBindingPolicy;
}

export async function check(deps: CheckDeps, args: CheckArgs): Promise<CheckResult> {
  const ownership = await deps.resolver.resolveOwnedSlots(args.wallet, args.chain);
  if (!ownership.ok) return ownership;

  const scope: ProfileScope = { profile: args.profile, wallet: ownership.wallet, chain: ownership.chain };
  if (args.market !== undefined) scope.market = args.market;
  const snapshot = await deps.inventory.listRunningInstances(
    args.market !== undefined ? { chain: ownership.chain, market: args.market } : { chain: ownership.chain },
  );

  return {
    ok: true,
    report: buildCheckReport({ scope, owned: ownership.slots, snapshot, policy: args.policy }),
  };
}
