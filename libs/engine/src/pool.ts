/**
 * Bounded worker pool
 *
 * Runs `worker` over `items` with at most `concurrency` in flight and
 * returns one structured result per item, in input order. A rejected item
 * never stops the others. Once `signal` aborts, items not yet started are
 * reported as skipped while in-flight ones finish.
 */

export type PoolResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<PoolResult<R>[]> {
  const results: PoolResult<R>[] = new Array<PoolResult<R>>(items.length);
  const lanes = Math.max(1, Math.min(Math.floor(options.concurrency), items.length));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      if (options.signal?.aborted) {
        results[index] = { status: 'skipped' };
        continue;
      }
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: items.length === 0 ? 0 : lanes }, () => lane()));
  return results;
}
