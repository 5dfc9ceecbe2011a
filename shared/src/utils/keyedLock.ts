// In-process lock manager keyed by resource name. Callers for the same key
// queue up in arrival order; different keys never wait on each other.

export type ReleaseFn = () => void;

export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Acquire the lock for a key
   * @returns Promise that resolves to a release function once every earlier
   * holder of the key has released
   */
  async acquire(key: string): Promise<ReleaseFn> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: ReleaseFn = () => undefined;
    const current = new Promise<void>(resolve => {
      release = () => resolve();
    });

    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      release();
      // Last holder in the queue cleans up after itself
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  /**
   * Run an operation while holding the lock for a key
   */
  async runExclusive<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await operation();
    } finally {
      release();
    }
  }

  /**
   * Check if a key is currently held or queued
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
