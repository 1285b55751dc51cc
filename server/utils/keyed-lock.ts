/**
 * Keyed async lock
 *
 * Serializes async work per key: two tasks holding the same key never
 * interleave, tasks on different keys run concurrently. Tasks needing several
 * keys acquire them in sorted order so two multi-key tasks can't deadlock.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(keys: string | string[], task: () => Promise<T> | T): Promise<T> {
    const ordered = [...new Set(Array.isArray(keys) ? keys : [keys])].sort();
    const releases: Array<() => void> = [];

    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await task();
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  /** Number of keys with queued or running work */
  get size(): number {
    return this.tails.size;
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    return () => {
      release();
      // Drop the entry once nobody queued behind us
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
  }
}
