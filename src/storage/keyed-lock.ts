/**
 * Keyed Lock
 *
 * Serializes async work per key while letting different keys proceed in
 * parallel. Used for cache puts (per cache key) and store commits (per
 * variant).
 *
 * @module storage/keyed-lock
 */

export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run fn once every earlier holder of the same key has finished
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Run fn while holding every given key. Keys are acquired in sorted
   * order so overlapping multi-key holders cannot deadlock.
   */
  async runAll<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const sorted = [...new Set(keys)].sort();
    const acquire = (index: number): Promise<T> => {
      const key = sorted[index];
      if (key === undefined) {
        return fn();
      }
      return this.run(key, () => acquire(index + 1));
    };
    return acquire(0);
  }

  /**
   * Number of keys currently held or waited on
   */
  get size(): number {
    return this.tails.size;
  }
}
