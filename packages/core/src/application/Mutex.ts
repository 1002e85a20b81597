/**
 * Async mutual exclusion.
 *
 * Callers run one at a time in the order they called `runExclusive`. The
 * critical section may await (the rate limiter sleeps while holding it).
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release!: () => void;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
