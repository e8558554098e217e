/**
 * Serialises async work per key. Each caller queues behind the tail promise
 * for its key; the entry is dropped once the last holder settles.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  public async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
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
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  public isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
