/**
 * Settings SQL queries
 */

const TABLE = 'settings';

export const Q = {
  select: `SELECT value FROM ${TABLE} WHERE key = ?`,
  upsert: `INSERT INTO ${TABLE} (key, value) VALUES (@key, @value)
    ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
  delete: `DELETE FROM ${TABLE} WHERE key = ?`,
  deleteByValue: `DELETE FROM ${TABLE} WHERE value = ?`,
} as const;
