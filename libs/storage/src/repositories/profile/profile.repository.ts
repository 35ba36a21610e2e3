/**
 * Profile repository
 */

import type { Profile } from '@slotwarden/ipc';
import type { DbProfileRow, DbProfileSummaryRow } from '../../types';
import { BaseRepository } from '../base.repository';
import { ProfileExistsError } from '../../errors';
import { CreateProfileSchema, ProfileSchema } from './profile.schema';
import { mapProfile } from './profile.model';
import { Q } from './profile.query';

export interface ProfileWithCount extends Profile {
  bundleCount: number;
}

export class ProfileRepository extends BaseRepository {
  create(input: unknown): Profile {
    const data = this.validate(CreateProfileSchema, input);
    if (this.exists(data.name)) throw new ProfileExistsError(data.name);

    const now = this.now();
    const full = this.validate(ProfileSchema, { ...data, createdAt: now, updatedAt: now });

    this.db.prepare(Q.insert).run({
      name: full.name,
      description: full.description ?? null,
      createdAt: full.createdAt,
      updatedAt: full.updatedAt,
    });
    return full;
  }

  get(name: string): Profile | null {
    const row = this.db.prepare(Q.selectByName).get(name) as DbProfileRow | undefined;
    return row ? mapProfile(row) : null;
  }

  exists(name: string): boolean {
    return this.db.prepare(Q.selectByName).get(name) !== undefined;
  }

  getAll(): ProfileWithCount[] {
    return (this.db.prepare(Q.selectAllWithCounts).all() as DbProfileSummaryRow[]).map((row) => ({
      ...mapProfile(row),
      bundleCount: row.bundle_count,
    }));
  }

  /**
   * Delete a profile. Its bundles go with it (ON DELETE CASCADE).
   */
  delete(name: string): boolean {
    return this.db.prepare(Q.delete).run(name).changes > 0;
  }
}
