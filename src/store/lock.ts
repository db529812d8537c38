/**
 * In-process mutual exclusion for a record collection.
 *
 * Callers queue in arrival order. Not reentrant: a task that calls back into
 * `runExclusive` on the same lock waits on itself forever.
 */
export class Lock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}
