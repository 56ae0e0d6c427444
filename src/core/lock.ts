/**
 * FIFO mutual exclusion built on a promise chain. Each caller waits for the
 * previous holder to settle before running.
 */
export class TapeLock {
  private tail: Promise<void> = Promise.resolve();
  private held = 0;

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = next;
    this.held++;

    await previous;

    try {
      return await fn();
    } finally {
      this.held--;
      release();
    }
  }

  /**
   * Number of callers holding or waiting for the lock
   */
  pending(): number {
    return this.held;
  }
}
