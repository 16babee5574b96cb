// =============================================================================
// Calmpoint API — Per-key mutual exclusion
// A promise chain per key: work for one key runs strictly in arrival order,
// work for different keys never waits on each other.
// =============================================================================

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      // Last holder cleans up so idle keys don't accumulate
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Number of keys with queued or running work. */
  get pending(): number {
    return this.tails.size;
  }
}
