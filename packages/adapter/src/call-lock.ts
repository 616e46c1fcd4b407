/**
 * FIFO mutex. `acquire()` resolves with a release function once every earlier
 * holder has released.
 */
export class CallLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Callers holding or queued for the lock. */
  get pending(): number {
    return this.waiting;
  }

  acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.waiting++;

    let released = false;
    const releaseOnce = () => {
      if (released) return;
      released = true;
      this.waiting--;
      release();
    };
    return previous.then(() => releaseOnce);
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
