/**
 * Settings repository -- small key/value table
 */

import type { SettingsKey } from '../../constants';
import type { DbSettingRow } from '../../types';
import { BaseRepository } from '../base.repository';
import { Q } from './settings.query';

export class SettingsRepository extends BaseRepository {
  get(key: SettingsKey): string | null {
    const row = this.db.prepare(Q.select).get(key) as Pick<DbSettingRow, 'value'> | undefined;
    return row?.value ?? null;
  }

  set(key: SettingsKey, value: string): void {
    this.db.prepare(Q.upsert).run({ key, value });
  }

  delete(key: SettingsKey): boolean {
    return this.db.prepare(Q.delete).run(key).changes > 0;
  }

  /** Drop every setting pointing at `value` (e.g. a deleted profile) */
  deleteByValue(value: string): number {
    return this.db.prepare(Q.deleteByValue).run(value).changes;
  }
}
