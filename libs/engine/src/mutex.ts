/**
 * Async mutexes
 *
 * @example
 * ```ts
 * const release = await mutex.acquire();
 * try {
 *   // critical section
 * } finally {
 *   release();
 * }
 * ```
 */

export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  private release(): void {
    this.locked = false;
    const next = this.queue.shift();
    if (next) next();
  }

  isLocked(): boolean {
    return this.locked;
  }
}

/**
 * One mutex per key. Entries are dropped once nobody holds or waits on them.
 */
export class KeyedMutex {
  private mutexes = new Map<string, { mutex: Mutex; users: number }>();

  async acquire(key: string): Promise<() => void> {
    let entry = this.mutexes.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), users: 0 };
      this.mutexes.set(key, entry);
    }
    entry.users++;
    const held = entry;
    const release = await held.mutex.acquire();
    return () => {
      release();
      held.users--;
      if (held.users === 0) this.mutexes.delete(key);
    };
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.mutex.isLocked() ?? false;
  }
}
