/**
 * Diagnose command
 *
 * Finds every resource belonging to slot instances (optionally narrowed to
 * a slot, chain or market), shows it, and tears down what the user confirms.
 */

import { Command } from 'commander';
import { DEFAULT_WORKLOAD, InvalidInputError, TIMEOUTS, parseIdentifier, parseSlotSelection } from '@slotwarden/ipc';
import type { InventoryFilter, ResourceKind } from '@slotwarden/ipc';
import { CANCELLED, SlotNaming, TeardownEngine, discoverResources, handlesFor, isEmpty } from '@slotwarden/engine';
import type { DiscoveredResources } from '@slotwarden/engine';
import { lookupChain } from '../utils/catalog';
import { confirm } from '../utils/confirm';
import { openContext, withContext } from '../utils/context';
import type { AppContext, ContextFactory } from '../utils/context';
import { EXIT, reportError } from '../utils/exit';
import { formatDiscovery, formatTeardownOutcome, formatTeardownSummary, styleFor } from '../utils/format';
import { parsePositiveInt } from './deploy';

export interface DiagnoseOptions {
  slot?: string;
  chain?: string;
  market?: string;
  yes?: boolean;
  dryRun?: boolean;
  stopTimeout: number;
}

const CATEGORIES: Array<{ kind: ResourceKind; label: string; count: (r: DiscoveredResources) => number }> = [
  { kind: 'container', label: 'containers', count: (r) => r.containers.length },
  { kind: 'session', label: 'sessions', count: (r) => r.sessions.length },
  { kind: 'network', label: 'networks', count: (r) => r.networks.length },
  { kind: 'workspace', label: 'workspace directories', count: (r) => r.workspaces.length },
];

function filterFrom(options: DiagnoseOptions): InventoryFilter {
  const filter: InventoryFilter = {};
  if (options.slot !== undefined) {
    const selection = parseSlotSelection(options.slot);
    if (selection === 'all' || selection.length !== 1) {
      throw new InvalidInputError('--slot takes a single slot id', 'slot');
    }
    filter.slotId = selection[0];
  }
  if (options.chain !== undefined) filter.chain = parseIdentifier(options.chain, 'chain');
  if (options.market !== undefined) filter.market = parseIdentifier(options.market, 'market');
  return filter;
}

async function runDiagnose(ctx: AppContext, options: DiagnoseOptions): Promise<number> {
  const style = styleFor();
  const filter = filterFrom(options);
  const workload = filter.chain !== undefined ? lookupChain(ctx.catalog, filter.chain).workload : DEFAULT_WORKLOAD;
  const naming = new SlotNaming(workload);
  const { containers, sessions, workspaces, logger } = ctx;

  const found = await discoverResources({ containers, sessions, workspaces, naming }, filter);
  for (const line of formatDiscovery(found, style)) console.log(line);

  if (isEmpty(found)) {
    console.log('\nNothing to clean up.');
    return EXIT.OK;
  }

  const kinds: ResourceKind[] = [];
  for (const category of CATEGORIES) {
    const n = category.count(found);
    if (n === 0) continue;
    if (await confirm(`\nRemove ${n} ${category.label}?`, { assumeYes: options.yes })) kinds.push(category.kind);
  }
  if (kinds.length === 0) {
    console.log('\nNothing selected.');
    return EXIT.OK;
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);
  try {
    const engine = new TeardownEngine({ containers, sessions, workspaces, logger });
    console.log('');
    const outcomes = await engine.teardown(handlesFor(found, kinds), {
      dryRun: options.dryRun,
      stopTimeoutSec: options.stopTimeout,
      signal: controller.signal,
      onOutcome: (outcome) => console.log(formatTeardownOutcome(outcome, style)),
    });
    for (const line of formatTeardownSummary(outcomes, style)) console.log(line);
    const incomplete = outcomes.some((o) => o.status === 'failed' || o.status === 'skipped' || o.advisory === CANCELLED);
    return incomplete ? EXIT.FAILURE : EXIT.OK;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

/**
 * Create the diagnose command
 */
export function createDiagnoseCommand(contextFactory: ContextFactory = openContext): Command {
  return new Command('diagnose')
    .description('Find and clean up slot containers, sessions, networks and workspaces')
    .option('-s, --slot <id>', 'Only resources of this slot')
    .option('-c, --chain <chain>', 'Only resources on this chain')
    .option('-m, --market <market>', 'Only resources of this market')
    .option('-y, --yes', 'Remove everything found without asking')
    .option('--dry-run', 'Show what would be removed')
    .option('--stop-timeout <seconds>', 'Graceful stop window per container', parsePositiveInt, TIMEOUTS.STOP_GRACE_SEC)
    .action(async (options: DiagnoseOptions) => {
      try {
        process.exitCode = await withContext(contextFactory, (ctx) => runDiagnose(ctx, options));
      } catch (err) {
        reportError(err);
      }
    });
}
