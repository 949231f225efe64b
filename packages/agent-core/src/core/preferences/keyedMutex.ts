/**
 * Serializes async work per key with a promise chain; different keys never wait on
 * each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const pending = previous.then(work, work);
    const tail = pending.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await pending;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
