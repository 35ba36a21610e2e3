/**
 * Slotwarden Storage Library
 *
 * SQLite-based profile store with migrations and validated repositories.
 *
 * @packageDocumentation
 */

// Core
export { Storage } from './storage';
export { ProfileStore } from './profile-store';
export type { ProfileImportResult } from './profile-store';

// Errors
export { ValidationError, ProfileNotFoundError, ProfileExistsError, DatabaseTamperError } from './errors';

// Constants
export { APPLICATION_ID, SETTINGS_KEYS } from './constants';

// Database
export { openDatabase, closeDatabase } from './database';

// Repositories
export { BaseRepository } from './repositories/base.repository';
export { ProfileRepository } from './repositories/profile';
export type { ProfileWithCount } from './repositories/profile';
export { BundleRepository } from './repositories/bundle';
export { SettingsRepository } from './repositories/settings';

// Migrations
export { runMigrations, getCurrentVersion, getDbVersion, ALL_MIGRATIONS } from './migrations/index';
export type { Migration } from './migrations/types';
