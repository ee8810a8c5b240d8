/**
 * Keyed async mutex: one in-flight critical section per site.
 * Different keys never wait on each other. Entries are dropped once a key's queue drains.
 */
export class SiteLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const mine = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => mine);
    this.tails.set(key, tail);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  // Number of keys with a queued or running section.
  get size(): number {
    return this.tails.size;
  }
}
