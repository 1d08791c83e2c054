/**
 * KeyedMutex - serializes async critical sections that share a key.
 *
 * Tasks for the same key run one after another in call order; tasks for
 * different keys never wait on each other. A key's entry is dropped once
 * its queue drains, so idle keys cost nothing.
 */
export class KeyedMutex {
  /** key -> promise that settles when the last queued task for that key finishes */
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** True while any task for the key is running or queued */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with running or queued tasks */
  get size(): number {
    return this.tails.size;
  }
}
