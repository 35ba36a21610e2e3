/**
 * Profile SQL queries
 */

const TABLE = 'profiles';

export const Q = {
  insert: `
    INSERT INTO ${TABLE} (name, description, created_at, updated_at)
    VALUES (@name, @description, @createdAt, @updatedAt)`,
  selectByName: `SELECT * FROM ${TABLE} WHERE name = ?`,
  selectAllWithCounts: `
    SELECT p.*, (SELECT COUNT(*) FROM bundles b WHERE b.profile_name = p.name) AS bundle_count
    FROM ${TABLE} p ORDER BY p.name`,
  delete: `DELETE FROM ${TABLE} WHERE name = ?`,
} as const;
