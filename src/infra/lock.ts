/**
 * Locks
 * =====
 *
 * FIFO async mutex and a per-key variant for serialising writes to one path
 * while letting other keys proceed.
 */

// =============================================================================
// Mutex
// =============================================================================

/**
 * Async mutual-exclusion lock. Waiters are admitted in arrival order.
 */
export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Whether the lock is held.
   */
  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Number of callers waiting for the lock.
   */
  pending(): number {
    return this.queue.length;
  }

  /**
   * Acquire the lock. Resolves with the release function.
   */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = (): void => {
        this.locked = true;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };

      if (!this.locked) {
        grant();
      } else {
        this.queue.push(grant);
      }
    });
  }

  /**
   * Run fn while holding the lock.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}

// =============================================================================
// Keyed Mutex
// =============================================================================

/**
 * One mutex per key. Entries are dropped once nobody holds or waits on them.
 */
export class KeyedMutex {
  private locks: Map<string, Mutex> = new Map();

  /**
   * Run fn while holding the lock for key.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }

    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.isLocked() && mutex.pending() === 0) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Number of keys with a live lock.
   */
  size(): number {
    return this.locks.size;
  }
}
