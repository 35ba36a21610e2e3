/**
 * Bundle model -- Row mappers (DB row <-> domain shape)
 *
 * Mapping does not validate; the repository runs the result through
 * ConfigBundleSchema so a corrupt row surfaces at load time.
 */

import type { ConfigBundle } from '@slotwarden/ipc';
import type { DbBundleRow } from '../../types';

function parseExtraEnv(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    // Left for schema validation to report
    return json;
  }
}

export function bundleRowToInput(row: DbBundleRow): Record<string, unknown> {
  return {
    walletAddress: row.wallet_address,
    signerAddress: row.signer_address,
    signerPrivateKey: row.signer_private_key,
    sourceRpcUrl: row.source_rpc_url,
    ledgerRpcUrl: row.ledger_rpc_url ?? undefined,
    telegramChatId: row.telegram_chat_id ?? undefined,
    telegramReportingUrl: row.telegram_reporting_url ?? undefined,
    maxStreamPoolSize: row.max_stream_pool_size ?? undefined,
    connectionRefreshInterval: row.connection_refresh_interval ?? undefined,
    extraEnv: parseExtraEnv(row.extra_env_json),
  };
}

export function bundleToParams(bundle: ConfigBundle): Record<string, string | number | null> {
  return {
    walletAddress: bundle.walletAddress,
    signerAddress: bundle.signerAddress,
    signerPrivateKey: bundle.signerPrivateKey,
    sourceRpcUrl: bundle.sourceRpcUrl,
    ledgerRpcUrl: bundle.ledgerRpcUrl ?? null,
    telegramChatId: bundle.telegramChatId ?? null,
    telegramReportingUrl: bundle.telegramReportingUrl ?? null,
    maxStreamPoolSize: bundle.maxStreamPoolSize ?? null,
    connectionRefreshInterval: bundle.connectionRefreshInterval ?? null,
    extraEnvJson: JSON.stringify(bundle.extraEnv),
  };
}
