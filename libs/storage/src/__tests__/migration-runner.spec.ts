import Database from 'better-sqlite3';
import { runMigrations, getCurrentVersion, getDbVersion, ALL_MIGRATIONS } from '../migrations/index';
import type { Migration } from '../migrations/types';

describe('MigrationRunner', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    db.pragma('foreign_keys = ON');
  });

  afterEach(() => {
    db.close();
  });

  it('getCurrentVersion returns 0 for fresh DB', () => {
    expect(getCurrentVersion(db)).toBe(0);
  });

  it('runs migrations in version order and records them', () => {
    const order: number[] = [];
    const migrations: Migration[] = [
      { version: 2, name: 'second', up() { order.push(2); } },
      { version: 1, name: 'first', up() { order.push(1); } },
    ];

    expect(runMigrations(db, migrations)).toBe(2);
    expect(order).toEqual([1, 2]);
    expect(getCurrentVersion(db)).toBe(2);
    expect(getDbVersion(db)).toBe(2);
  });

  it('skips already-applied migrations', () => {
    runMigrations(db);
    expect(runMigrations(db)).toBe(0);
    expect(getCurrentVersion(db)).toBe(ALL_MIGRATIONS.length);
  });

  it('rolls back every pending migration when one fails', () => {
    const migrations: Migration[] = [
      { version: 1, name: 'ok', up(d) { d.exec('CREATE TABLE t1 (id INTEGER)'); } },
      { version: 2, name: 'boom', up() { throw new Error('boom'); } },
    ];

    expect(() => runMigrations(db, migrations)).toThrow('boom');
    expect(getCurrentVersion(db)).toBe(0);
    const table = db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='t1'").get();
    expect(table).toBeUndefined();
  });

  it('creates the profile schema', () => {
    runMigrations(db);
    const tables = (db.prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name").all() as Array<{ name: string }>)
      .map((r) => r.name);
    expect(tables).toEqual(expect.arrayContaining(['bundles', 'profiles', 'settings']));
  });
});
