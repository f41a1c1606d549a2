/**
 * Keyed promise-chain mutex.
 *
 * Work submitted under the same key runs strictly one after another, in
 * submission order. Different keys never wait on each other.
 */
export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  /** Run `fn` once every earlier holder of `key` has settled. */
  async run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
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
      // Drop the entry once nobody queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** True while some holder of `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
