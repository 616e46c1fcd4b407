type Grant = () => void;

/**
 * Async reader/writer lock. Readers share the lock; a writer holds it alone.
 * Once a writer is waiting, new readers queue behind it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private pendingReaders: Grant[] = [];
  private readonly pendingWriters: Grant[] = [];

  get activeReaders(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  async read<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async write<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  private acquireRead(): Promise<void> {
    if (!this.writing && this.pendingWriters.length === 0) {
      this.readers++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.pendingReaders.push(resolve));
  }

  private acquireWrite(): Promise<void> {
    if (!this.writing && this.readers === 0) {
      this.writing = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.pendingWriters.push(resolve));
  }

  private releaseRead(): void {
    this.readers--;
    this.wake();
  }

  private releaseWrite(): void {
    this.writing = false;
    this.wake();
  }

  private wake(): void {
    if (this.writing || this.readers > 0) return;

    const writer = this.pendingWriters.shift();
    if (writer) {
      this.writing = true;
      writer();
      return;
    }

    const readers = this.pendingReaders;
    this.pendingReaders = [];
    this.readers += readers.length;
    for (const grant of readers) grant();
  }
}
