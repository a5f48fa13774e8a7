/**
 * Keyed mutex: promise-chained lock per key
 *
 * Work for the same key runs strictly one after another in call order;
 * work for different keys is not ordered. Settled keys are dropped so the
 * map only holds keys with queued or running work.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier task for `key` has settled.
   * Resolves or rejects with `fn`'s own outcome.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
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
   * Keys with queued or running work
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}
