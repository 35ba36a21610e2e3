/**
 * Storage — Main entry point for the Slotwarden storage layer
 *
 * Opens the SQLite database, runs migrations and exposes the repositories.
 * `ProfileStore` layers the profile-selection rules on top.
 */

import type Database from 'better-sqlite3';
import { openDatabase, closeDatabase } from './database';
import { runMigrations } from './migrations/index';
import { ProfileRepository } from './repositories/profile';
import { BundleRepository } from './repositories/bundle';
import { SettingsRepository } from './repositories/settings';

export class Storage {
  readonly profiles: ProfileRepository;
  readonly bundles: BundleRepository;
  readonly settings: SettingsRepository;

  private constructor(private readonly db: Database.Database) {
    this.profiles = new ProfileRepository(db);
    this.bundles = new BundleRepository(db);
    this.settings = new SettingsRepository(db);
  }

  /**
   * Open (or create) the database at the given path and run migrations.
   */
  static open(dbPath: string): Storage {
    const db = openDatabase(dbPath);
    runMigrations(db);
    return new Storage(db);
  }

  /**
   * Wrap an already-open database (tests use an in-memory one).
   */
  static fromDatabase(db: Database.Database): Storage {
    runMigrations(db);
    return new Storage(db);
  }

  /**
   * Run `fn` inside a single transaction.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    closeDatabase(this.db);
  }
}
