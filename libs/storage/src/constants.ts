/**
 * Storage constants
 */

export const DB_PRAGMAS = {
  JOURNAL_MODE: 'WAL',
  FOREIGN_KEYS: 'ON',
  BUSY_TIMEOUT: 5000,
} as const;

export const FILE_PERMISSIONS = {
  DB_FILE: 0o600,
  DB_DIR: 0o700,
} as const;

/** SQLite application_id for tamper detection ("SLTW" in hex). */
export const APPLICATION_ID = 0x534c5457;

/** Keys of the settings table */
export const SETTINGS_KEYS = {
  DEFAULT_PROFILE: 'default_profile',
  LAST_USED_PROFILE: 'last_used_profile',
} as const;

export type SettingsKey = (typeof SETTINGS_KEYS)[keyof typeof SETTINGS_KEYS];
