/**
 * Bundle SQL queries
 */

const TABLE = 'bundles';

export const Q = {
  upsert: `
    INSERT INTO ${TABLE} (profile_name, chain, market, wallet_address, signer_address,
      signer_private_key, source_rpc_url, ledger_rpc_url, telegram_chat_id,
      telegram_reporting_url, max_stream_pool_size, connection_refresh_interval,
      extra_env_json, created_at, updated_at)
    VALUES (@profileName, @chain, @market, @walletAddress, @signerAddress,
      @signerPrivateKey, @sourceRpcUrl, @ledgerRpcUrl, @telegramChatId,
      @telegramReportingUrl, @maxStreamPoolSize, @connectionRefreshInterval,
      @extraEnvJson, @now, @now)
    ON CONFLICT(profile_name, chain, market) DO UPDATE SET
      wallet_address = excluded.wallet_address,
      signer_address = excluded.signer_address,
      signer_private_key = excluded.signer_private_key,
      source_rpc_url = excluded.source_rpc_url,
      ledger_rpc_url = excluded.ledger_rpc_url,
      telegram_chat_id = excluded.telegram_chat_id,
      telegram_reporting_url = excluded.telegram_reporting_url,
      max_stream_pool_size = excluded.max_stream_pool_size,
      connection_refresh_interval = excluded.connection_refresh_interval,
      extra_env_json = excluded.extra_env_json,
      updated_at = excluded.updated_at`,
  select: `SELECT * FROM ${TABLE} WHERE profile_name = ? AND chain = ? AND market = ?`,
  selectByProfile: `SELECT * FROM ${TABLE} WHERE profile_name = ? ORDER BY chain, market`,
  delete: `DELETE FROM ${TABLE} WHERE profile_name = ? AND chain = ? AND market = ?`,
  copyProfile: `
    INSERT INTO ${TABLE} (profile_name, chain, market, wallet_address, signer_address,
      signer_private_key, source_rpc_url, ledger_rpc_url, telegram_chat_id,
      telegram_reporting_url, max_stream_pool_size, connection_refresh_interval,
      extra_env_json, created_at, updated_at)
    SELECT @target, chain, market, wallet_address, signer_address,
      signer_private_key, source_rpc_url, ledger_rpc_url, telegram_chat_id,
      telegram_reporting_url, max_stream_pool_size, connection_refresh_interval,
      extra_env_json, @now, @now
    FROM ${TABLE} WHERE profile_name = @source`,
} as const;
