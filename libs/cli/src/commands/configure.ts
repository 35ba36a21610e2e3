/**
 * Configure command
 *
 * Stores (or updates) a profile's credentials for one chain and market.
 * Only the flags given are changed.
 */

import { Command, InvalidArgumentError } from 'commander';
import { parseIdentifier } from '@slotwarden/ipc';
import type { ConfigBundlePatch } from '@slotwarden/ipc';
import { lookupMarket } from '../utils/catalog';
import { openContext, withContext } from '../utils/context';
import type { AppContext, ContextFactory } from '../utils/context';
import { EXIT, reportError } from '../utils/exit';
import { formatBundle } from '../utils/format';
import { parsePositiveInt } from './deploy';

export interface ConfigureOptions {
  chain: string;
  market: string;
  profile?: string;
  wallet?: string;
  signer?: string;
  signerKey?: string;
  sourceRpc?: string;
  ledgerRpc?: string;
  telegramChat?: string;
  telegramUrl?: string;
  streamPool?: number;
  refreshInterval?: number;
  set: Record<string, string>;
}

export function collectEnv(value: string, previous: Record<string, string>): Record<string, string> {
  const eq = value.indexOf('=');
  if (eq <= 0) throw new InvalidArgumentError(`Expected KEY=VALUE, got "${value}".`);
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) };
}

export function buildPatch(options: ConfigureOptions): ConfigBundlePatch {
  const patch: ConfigBundlePatch = {};
  if (options.wallet !== undefined) patch.walletAddress = options.wallet;
  if (options.signer !== undefined) patch.signerAddress = options.signer;
  if (options.signerKey !== undefined) patch.signerPrivateKey = options.signerKey;
  if (options.sourceRpc !== undefined) patch.sourceRpcUrl = options.sourceRpc;
  if (options.ledgerRpc !== undefined) patch.ledgerRpcUrl = options.ledgerRpc;
  if (options.telegramChat !== undefined) patch.telegramChatId = options.telegramChat;
  if (options.telegramUrl !== undefined) patch.telegramReportingUrl = options.telegramUrl;
  if (options.streamPool !== undefined) patch.maxStreamPoolSize = options.streamPool;
  if (options.refreshInterval !== undefined) patch.connectionRefreshInterval = options.refreshInterval;
  if (Object.keys(options.set).length > 0) patch.extraEnv = options.set;
  return patch;
}

async function runConfigure(ctx: AppContext, options: ConfigureOptions): Promise<number> {
  const chain = parseIdentifier(options.chain, 'chain');
  const market = parseIdentifier(options.market, 'market');
  lookupMarket(ctx.catalog, chain, market);

  const active = ctx.profiles.activeProfile(options.profile);
  const bundle = ctx.profiles.update(active.name, chain, market, buildPatch(options));

  console.log(`Saved ${chain}/${market} for profile ${active.name}:`);
  for (const line of formatBundle(bundle)) console.log(`  ${line}`);
  return EXIT.OK;
}

/**
 * Create the configure command
 */
export function createConfigureCommand(contextFactory: ContextFactory = openContext): Command {
  return new Command('configure')
    .description('Store credentials for a chain and market in a profile')
    .requiredOption('-c, --chain <chain>', 'Chain')
    .requiredOption('-m, --market <market>', 'Data market')
    .option('-p, --profile <name>', 'Profile to write to')
    .option('--wallet <address>', 'Wallet holding the slots')
    .option('--signer <address>', 'Signer account address')
    .option('--signer-key <key>', 'Signer account private key')
    .option('--source-rpc <url>', 'Source chain RPC URL')
    .option('--ledger-rpc <url>', 'Override the catalog ledger RPC URL')
    .option('--telegram-chat <id>', 'Telegram chat id for reports')
    .option('--telegram-url <url>', 'Telegram reporting endpoint')
    .option('--stream-pool <n>', 'Max stream pool size', parsePositiveInt)
    .option('--refresh-interval <seconds>', 'Connection refresh interval', parsePositiveInt)
    .option('--set <KEY=VALUE>', 'Extra workload variable (repeatable)', collectEnv, {})
    .action(async (options: ConfigureOptions) => {
      try {
        process.exitCode = await withContext(contextFactory, (ctx) => runConfigure(ctx, options));
      } catch (err) {
        reportError(err);
      }
    });
}
