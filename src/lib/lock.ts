/**
 * FIFO mutual exclusion for async critical sections.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => released);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
