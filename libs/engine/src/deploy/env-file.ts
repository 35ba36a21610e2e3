/**
 * Workload `.env` rendering
 *
 * Keys appear in a fixed order: the credential keys first, the slot's
 * runtime placement next, then any extra keys sorted by name. Extra keys
 * never override a fixed one.
 */

import { CONTAINER_PORTS, InvalidInputError } from '@slotwarden/ipc';
import type { ConfigBundle, ChainConfig, MarketConfig, SlotRef } from '@slotwarden/ipc';
import type { Allocation } from '../allocator';

export type EnvEntries = Array<[key: string, value: string]>;

export interface WorkloadEnvInput {
  slot: SlotRef;
  name: string;
  bundle: ConfigBundle;
  chain: ChainConfig;
  market: MarketConfig;
  allocation: Allocation;
}

export function buildWorkloadEnv(input: WorkloadEnvInput): EnvEntries {
  const { slot, name, bundle, chain, market, allocation } = input;
  const entries: EnvEntries = [
    ['WALLET_HOLDER_ADDRESS', bundle.walletAddress],
    ['SIGNER_ACCOUNT_ADDRESS', bundle.signerAddress],
    ['SIGNER_ACCOUNT_PRIVATE_KEY', bundle.signerPrivateKey],
    ['SOURCE_RPC_URL', bundle.sourceRpcUrl],
    ['POWERLOOM_RPC_URL', bundle.ledgerRpcUrl ?? chain.rpcUrl],
  ];
  if (bundle.telegramChatId !== undefined) entries.push(['TELEGRAM_CHAT_ID', bundle.telegramChatId]);
  if (bundle.telegramReportingUrl !== undefined) entries.push(['TELEGRAM_REPORTING_URL', bundle.telegramReportingUrl]);
  if (bundle.maxStreamPoolSize !== undefined) entries.push(['MAX_STREAM_POOL_SIZE', String(bundle.maxStreamPoolSize)]);
  if (bundle.connectionRefreshInterval !== undefined) {
    entries.push(['CONNECTION_REFRESH_INTERVAL_SEC', String(bundle.connectionRefreshInterval)]);
  }

  entries.push(
    ['SLOT_ID', String(slot.slotId)],
    ['POWERLOOM_CHAIN', slot.chain.toUpperCase()],
    ['DATA_MARKET', slot.market.toUpperCase()],
    ['SOURCE_CHAIN', market.sourceChain],
    ['CORE_API_PORT', String(allocation.ports[0] ?? CONTAINER_PORTS.CORE_API)],
    ['LOCAL_COLLECTOR_P2P_PORT', String(allocation.ports[1] ?? CONTAINER_PORTS.LOCAL_COLLECTOR_P2P)],
    ['DOCKER_NETWORK_NAME', name],
    ['DOCKER_NETWORK_SUBNET', allocation.subnet],
  );

  const fixed = new Set(entries.map(([key]) => key));
  const extras = Object.keys(bundle.extraEnv)
    .filter((key) => !fixed.has(key))
    .sort();
  for (const key of extras) {
    entries.push([key, bundle.extraEnv[key]]);
  }
  return entries;
}

export function renderEnvFile(entries: EnvEntries): string {
  return entries
    .map(([key, value]) => {
      if (/[\r\n]/.test(value)) {
        throw new InvalidInputError(`Value for ${key} must be a single line`, key);
      }
      return `${key}=${value}\n`;
    })
    .join('');
}
