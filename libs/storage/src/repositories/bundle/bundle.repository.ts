/**
 * Bundle repository
 *
 * One ConfigBundle per (profile, chain, market).
 */

import { ConfigBundleSchema, ConfigBundlePatchSchema, ConfigurationIncompleteError } from '@slotwarden/ipc';
import type { ConfigBundle, StoredBundle } from '@slotwarden/ipc';
import type { DbBundleRow } from '../../types';
import { BaseRepository } from '../base.repository';
import { ProfileNotFoundError } from '../../errors';
import { bundleRowToInput, bundleToParams } from './bundle.model';
import { Q } from './bundle.query';

export class BundleRepository extends BaseRepository {
  /**
   * Load a bundle. Returns null when none is stored; throws
   * ConfigurationIncompleteError when the stored row does not validate.
   */
  get(profile: string, chain: string, market: string): ConfigBundle | null {
    const row = this.db.prepare(Q.select).get(profile, chain, market) as DbBundleRow | undefined;
    return row ? this.load(row) : null;
  }

  listForProfile(profile: string): StoredBundle[] {
    return (this.db.prepare(Q.selectByProfile).all(profile) as DbBundleRow[]).map((row) => ({
      profile: row.profile_name,
      chain: row.chain,
      market: row.market,
      bundle: this.load(row),
      updatedAt: row.updated_at,
    }));
  }

  /**
   * Store a complete bundle, replacing any existing one.
   */
  set(profile: string, chain: string, market: string, input: unknown): ConfigBundle {
    const bundle = this.validate(ConfigBundleSchema, input);
    this.assertProfile(profile);
    this.db.prepare(Q.upsert).run({
      profileName: profile,
      chain,
      market,
      ...bundleToParams(bundle),
      now: this.now(),
    });
    return bundle;
  }

  /**
   * Merge a partial bundle over the stored one (if any) and store the result.
   * `extraEnv` keys are merged; everything else is replaced field by field.
   */
  merge(profile: string, chain: string, market: string, patch: unknown): ConfigBundle {
    const data = this.validate(ConfigBundlePatchSchema, patch);
    const existing = this.get(profile, chain, market);
    const defined = Object.fromEntries(Object.entries(data).filter(([, v]) => v !== undefined));
    return this.set(profile, chain, market, {
      ...existing,
      ...defined,
      extraEnv: { ...existing?.extraEnv, ...data.extraEnv },
    });
  }

  delete(profile: string, chain: string, market: string): boolean {
    return this.db.prepare(Q.delete).run(profile, chain, market).changes > 0;
  }

  /**
   * Copy every bundle of `source` to `target`. Returns the number copied.
   */
  copyAll(source: string, target: string): number {
    return this.db.prepare(Q.copyProfile).run({ source, target, now: this.now() }).changes;
  }

  private load(row: DbBundleRow): ConfigBundle {
    const result = ConfigBundleSchema.safeParse(bundleRowToInput(row));
    if (!result.success) {
      throw new ConfigurationIncompleteError(
        row.profile_name,
        row.chain,
        row.market,
        result.error.issues.map((i) => `${i.path.map(String).join('.')}: ${i.message}`),
      );
    }
    return result.data;
  }

  private assertProfile(profile: string): void {
    if (this.db.prepare('SELECT 1 FROM profiles WHERE name = ?').get(profile) === undefined) {
      throw new ProfileNotFoundError(profile);
    }
  }
}
