/**
 * Internal DB row types
 *
 * These represent the raw SQLite row shapes (snake_case columns).
 * Domain types from @slotwarden/ipc use camelCase.
 */

export interface DbProfileRow {
  name: string;
  description: string | null;
  created_at: string;
  updated_at: string;
}

export interface DbProfileSummaryRow extends DbProfileRow {
  bundle_count: number;
}

export interface DbBundleRow {
  profile_name: string;
  chain: string;
  market: string;
  wallet_address: string;
  signer_address: string;
  signer_private_key: string;
  source_rpc_url: string;
  ledger_rpc_url: string | null;
  telegram_chat_id: string | null;
  telegram_reporting_url: string | null;
  max_stream_pool_size: number | null;
  connection_refresh_interval: number | null;
  extra_env_json: string;
  created_at: string;
  updated_at: string;
}

export interface DbSettingRow {
  key: string;
  value: string;
}
