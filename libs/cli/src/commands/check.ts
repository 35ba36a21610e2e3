/**
 * Check command
 *
 * Read-only report: owned versus running slots for a wallet.
 */

import { Command, Option } from 'commander';
import { ConfigurationIncompleteError, parseIdentifier } from '@slotwarden/ipc';
import type { ForeignBindingPolicy } from '@slotwarden/ipc';
import { check } from '@slotwarden/engine';
import { lookupChain } from '../utils/catalog';
import { engineFor, openContext, withContext } from '../utils/context';
import type { AppContext, ContextFactory } from '../utils/context';
import { EXIT, reportError } from '../utils/exit';
import { formatCheckReport, styleFor } from '../utils/format';

export interface CheckOptions {
  chain: string;
  market?: string;
  wallet?: string;
  profile?: string;
  foreign: ForeignBindingPolicy;
  json?: boolean;
}

/** Wallet and ledger endpoint from the flag or the profile's bundles */
function walletFor(ctx: AppContext, profile: string, chain: string, options: CheckOptions) {
  const bundles = ctx.profiles.bundlesOf(profile).filter((b) => b.chain === chain);
  const stored = options.market ? bundles.find((b) => b.market === options.market) : bundles[0];
  const wallet = options.wallet ?? stored?.bundle.walletAddress;
  if (!wallet) throw new ConfigurationIncompleteError(profile, chain, options.market ?? '*');
  return { wallet, ledgerRpcUrl: stored?.bundle.ledgerRpcUrl };
}

async function runCheck(ctx: AppContext, options: CheckOptions): Promise<number> {
  const chain = parseIdentifier(options.chain, 'chain');
  const market = options.market === undefined ? undefined : parseIdentifier(options.market, 'market');
  lookupChain(ctx.catalog, chain);

  const active = ctx.profiles.activeProfile(options.profile);
  const { wallet, ledgerRpcUrl } = walletFor(ctx, active.name, chain, { ...options, market });
  const engine = engineFor(ctx, chain, ledgerRpcUrl);

  const result = await check(engine, { profile: active.name, wallet, chain, market, policy: options.foreign });
  if (!result.ok) throw result.error;

  const { report } = result;
  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatCheckReport(report, styleFor())) console.log(line);
  }
  return report.notRunning.length > 0 ? EXIT.FAILURE : EXIT.OK;
}

/**
 * Create the check command
 */
export function createCheckCommand(contextFactory: ContextFactory = openContext): Command {
  return new Command('check')
    .description('Compare owned slots with running instances')
    .requiredOption('-c, --chain <chain>', 'Chain to check')
    .option('-m, --market <market>', 'Restrict to one data market')
    .option('-w, --wallet <address>', 'Wallet to check (defaults to the profile\'s)')
    .option('-p, --profile <name>', 'Profile to check against')
    .addOption(
      new Option('--foreign <policy>', 'How to count slots running under another profile')
        .choices(['orphan', 'adopt'])
        .default('orphan'),
    )
    .option('-j, --json', 'Output as JSON')
    .action(async (options: CheckOptions) => {
      try {
        process.exitCode = await withContext(contextFactory, (ctx) => runCheck(ctx, options));
      } catch (err) {
        reportError(err);
      }
    });
}
