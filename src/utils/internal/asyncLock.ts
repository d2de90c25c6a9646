/**
 * Exclusive lock for async critical sections.
 * Waiters are served in FIFO order; a rejected section releases the lock.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Runs `fn` once every previously queued section has settled.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Whether a section is running or waiting. */
  isLocked(): boolean {
    return this.pending > 0;
  }
}
