/**
 * Mutex implementation for coordinating async operations
 *
 * Registry operations await filesystem and watcher I/O, so two of them for the
 * same root can interleave. The keyed variant serializes work per key without
 * a process-wide lock.
 */

export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Acquire the mutex lock
   * Waits if already locked
   */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Release the mutex lock
   * Hands the lock straight to the next queued caller
   */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  /**
   * Run a function with automatic acquire/release
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getQueueLength(): number {
    return this.queue.length;
  }
}

/**
 * One lazily created Mutex per key. Idle entries are dropped on release.
 */
export class KeyedMutex<K = string> {
  private locks = new Map<K, Mutex>();

  async runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }

    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.isLocked() && mutex.getQueueLength() === 0 && this.locks.get(key) === mutex) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: K): boolean {
    return this.locks.get(key)?.isLocked() ?? false;
  }

  get size(): number {
    return this.locks.size;
  }
}
