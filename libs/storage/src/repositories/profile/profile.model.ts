/**
 * Profile model -- Row mappers (DB row -> domain type)
 */

import type { Profile } from '@slotwarden/ipc';
import type { DbProfileRow } from '../../types';

export function mapProfile(row: DbProfileRow): Profile {
  return {
    name: row.name,
    description: row.description ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
