/**
 * Migration 001 — Initial schema
 *
 * Profiles, one config bundle per (profile, chain, market), and a small
 * settings table for the default / last-used profile.
 */

import type Database from 'better-sqlite3';
import type { Migration } from './types';

export class InitialSchemaMigration implements Migration {
  readonly version = 1;
  readonly name = '001-initial-schema';

  up(db: Database.Database): void {
    db.exec(`
      CREATE TABLE profiles (
        name         TEXT PRIMARY KEY,
        description  TEXT,
        created_at   TEXT NOT NULL,
        updated_at   TEXT NOT NULL
      );

      -- Every required column is NOT NULL: a bundle row is complete or absent
      CREATE TABLE bundles (
        profile_name                 TEXT NOT NULL REFERENCES profiles(name) ON DELETE CASCADE,
        chain                        TEXT NOT NULL,
        market                       TEXT NOT NULL,
        wallet_address               TEXT NOT NULL,
        signer_address               TEXT NOT NULL,
        signer_private_key           TEXT NOT NULL,
        source_rpc_url               TEXT NOT NULL,
        ledger_rpc_url               TEXT,
        telegram_chat_id             TEXT,
        telegram_reporting_url       TEXT,
        max_stream_pool_size         INTEGER,
        connection_refresh_interval  INTEGER,
        extra_env_json               TEXT NOT NULL DEFAULT '{}',
        created_at                   TEXT NOT NULL,
        updated_at                   TEXT NOT NULL,
        PRIMARY KEY (profile_name, chain, market)
      );

      CREATE INDEX idx_bundles_chain_market ON bundles(chain, market);

      CREATE TABLE settings (
        key    TEXT PRIMARY KEY,
        value  TEXT NOT NULL
      );
    `);
  }
}
