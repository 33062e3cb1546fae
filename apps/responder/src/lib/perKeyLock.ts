/**
 * Serializes async work per key. Work on different keys runs concurrently;
 * work on the same key runs in arrival order.
 */
export class PerKeyLock<K> {
  private readonly chains = new Map<K, Promise<void>>();

  async runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = prev.then(() => next);
    this.chains.set(key, chain);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      queueMicrotask(() => {
        if (this.chains.get(key) === chain) this.chains.delete(key);
      });
    }
  }

  get activeCount(): number {
    return this.chains.size;
  }
}
