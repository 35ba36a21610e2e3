/**
 * Deploy command
 *
 * Resolves the wallet's owned slots, reconciles them against what is
 * running, and starts the missing ones.
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  CONCURRENCY,
  ConfigurationIncompleteError,
  UnownedSlotRequestedError,
  parseIdentifier,
  parseSlotSelection,
} from '@slotwarden/ipc';
import { plan } from '@slotwarden/engine';
import type { DeployContext } from '@slotwarden/engine';
import { lookupMarket } from '../utils/catalog';
import { confirm } from '../utils/confirm';
import { engineFor, openContext, withContext } from '../utils/context';
import type { AppContext, ContextFactory } from '../utils/context';
import { EXIT, reportError } from '../utils/exit';
import { formatDeployBatch, formatDeployResult, formatPlan, styleFor } from '../utils/format';

export interface DeployOptions {
  chain: string;
  market: string;
  slot: string;
  profile?: string;
  concurrency: number;
  session: boolean;
  yes?: boolean;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

async function runDeploy(ctx: AppContext, options: DeployOptions): Promise<number> {
  const style = styleFor();
  const chain = parseIdentifier(options.chain, 'chain');
  const market = parseIdentifier(options.market, 'market');
  const requested = parseSlotSelection(options.slot);
  const { chainConfig, marketConfig } = lookupMarket(ctx.catalog, chain, market);

  const active = ctx.profiles.activeProfile(options.profile);
  const bundle = ctx.profiles.get(active.name, chain, market);
  if (!bundle) throw new ConfigurationIncompleteError(active.name, chain, market);

  const engine = engineFor(ctx, chain, bundle.ledgerRpcUrl);
  const ownership = await engine.resolver.resolveOwnedSlots(bundle.walletAddress, chain);
  if (!ownership.ok) throw ownership.error;

  const snapshot = await engine.inventory.listRunningInstances({ chain, market });
  const scope = { profile: active.name, wallet: ownership.wallet, chain, market };
  const actions = plan({ owned: ownership.slots, requested, running: snapshot.instances, scope });

  console.log(`Profile ${active.name} (${active.source}), wallet ${ownership.wallet}`);
  console.log(`${chain}/${market}: ${ownership.slots.length} owned slot(s)\n`);
  for (const line of formatPlan(actions, style)) console.log(line);

  if (requested !== 'all' && actions.unownedRequested.length === requested.length) {
    throw new UnownedSlotRequestedError(actions.unownedRequested, ownership.wallet);
  }

  if (actions.toStart.length === 0) {
    console.log('\nNothing to start.');
    return actions.unownedRequested.length > 0 ? EXIT.FAILURE : EXIT.OK;
  }

  const proceed = await confirm(`\nStart ${actions.toStart.length} slot(s)?`, { assumeYes: options.yes });
  if (!proceed) {
    console.log('Deploy cancelled.');
    return EXIT.OK;
  }

  const controller = new AbortController();
  const onSigint = () => {
    console.error('\nCancelling: waiting for in-flight slots to finish...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const context: DeployContext = {
    profile: active.name,
    bundle,
    chainConfig,
    marketConfig,
    attachSession: options.session,
  };
  try {
    const batch = await engine.executor.deployMany(
      actions.toStart.map((slotId) => ({ slotId, chain, market })),
      context,
      {
        concurrency: options.concurrency,
        signal: controller.signal,
        onResult: (result) => console.log(formatDeployResult(result, style)),
      },
    );
    ctx.profiles.markUsed(active.name);
    for (const line of formatDeployBatch(batch, style)) console.log(line);

    const incomplete = batch.failed.length > 0 || batch.skipped.length > 0 || actions.unownedRequested.length > 0;
    return incomplete ? EXIT.FAILURE : EXIT.OK;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

/**
 * Create the deploy command
 */
export function createDeployCommand(contextFactory: ContextFactory = openContext): Command {
  return new Command('deploy')
    .description('Start owned slots that are not running')
    .requiredOption('-c, --chain <chain>', 'Chain the slots live on')
    .requiredOption('-m, --market <market>', 'Data market to run')
    .option('-s, --slot <selection>', 'Slot id, range (3-7), list (1,4-6) or "all"', 'all')
    .option('-p, --profile <name>', 'Profile to deploy with')
    .option('--concurrency <n>', 'Slots started in parallel', parsePositiveInt, CONCURRENCY.DEPLOY)
    .option('--no-session', 'Do not attach a log session to each slot')
    .option('-y, --yes', 'Start without asking for confirmation')
    .action(async (options: DeployOptions) => {
      try {
        process.exitCode = await withContext(contextFactory, (ctx) => runDeploy(ctx, options));
      } catch (err) {
        reportError(err);
      }
    });
}
