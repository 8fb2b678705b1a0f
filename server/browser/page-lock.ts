/**
 * Serializes work on the browser tab. Each operation waits for the previous
 * one to finish, whether it resolved or rejected.
 */
export class PageLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Operations queued or running */
  get size(): number {
    return this.waiting;
  }

  async run<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.tail;

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = current;
    this.waiting++;

    try {
      await previous;
      return await operation();
    } finally {
      this.waiting--;
      release();
    }
  }
}
