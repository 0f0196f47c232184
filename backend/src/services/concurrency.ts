// services/concurrency.ts
// Per-key mutual exclusion, no external dependencies

/**
 * Serializes async sections that share a key. Sections on different keys run
 * in parallel. A section that throws releases the key for the next waiter.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
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
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Keys with a section running or queued. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
