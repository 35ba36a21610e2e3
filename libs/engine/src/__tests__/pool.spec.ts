import { runPool } from '../pool';
import { KeyedMutex, Mutex } from '../mutex';
import { tick } from './helpers/fakes';

describe('runPool', () => {
  it('returns one result per item in input order', async () => {
    const results = await runPool(
      [3, 1, 2],
      async (n) => {
        for (let i = 0; i < n; i++) await tick();
        if (n === 1) throw new Error('one');
        return n * 10;
      },
      { concurrency: 2 },
    );

    expect(results).toEqual([
      { status: 'fulfilled', value: 30 },
      { status: 'rejected', reason: new Error('one') },
      { status: 'fulfilled', value: 20 },
    ]);
  });

  it('never exceeds the concurrency cap', async () => {
    let active = 0;
    let peak = 0;
    await runPool(
      Array.from({ length: 10 }, (_, i) => i),
      async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        await tick();
        active--;
      },
      { concurrency: 3 },
    );
    expect(peak).toBe(3);
  });

  it('skips items not yet started once the signal aborts', async () => {
    const controller = new AbortController();
    const results = await runPool(
      [0, 1, 2, 3],
      async (n) => {
        if (n === 0) controller.abort();
        await tick();
        return n;
      },
      { concurrency: 1, signal: controller.signal },
    );
    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'skipped', 'skipped', 'skipped']);
  });

  it('handles an empty list', async () => {
    expect(await runPool([], async () => 1, { concurrency: 4 })).toEqual([]);
  });
});

describe('Mutex', () => {
  it('runs critical sections one at a time', async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    const section = async (id: string) => {
      const release = await mutex.acquire();
      try {
        order.push(`${id}:in`);
        await tick();
        order.push(`${id}:out`);
      } finally {
        release();
      }
    };
    await Promise.all([section('a'), section('b')]);
    expect(order).toEqual(['a:in', 'a:out', 'b:in', 'b:out']);
    expect(mutex.isLocked()).toBe(false);
  });
});

describe('KeyedMutex', () => {
  it('serializes per key and lets other keys through', async () => {
    const locks = new KeyedMutex();
    const releaseA = await locks.acquire('a');
    const releaseB = await locks.acquire('b');
    expect(locks.isLocked('a')).toBe(true);
    expect(locks.isLocked('b')).toBe(true);

    let secondA = false;
    const pending = locks.acquire('a').then((release) => {
      secondA = true;
      release();
    });
    await tick();
    expect(secondA).toBe(false);

    releaseA();
    await pending;
    expect(secondA).toBe(true);
    releaseB();
    expect(locks.isLocked('a')).toBe(false);
    expect(locks.isLocked('b')).toBe(false);
  });
});
