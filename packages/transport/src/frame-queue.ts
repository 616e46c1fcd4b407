import { toError } from '@agentwire/core';

interface Waiter {
  resolve: (frame: Uint8Array) => void;
  reject: (err: Error) => void;
}

/**
 * Bridges push-based socket callbacks into promise-based `shift()` calls.
 * Frames buffered before a failure are still handed out; after that every
 * `shift()` rejects with the failure.
 */
export class FrameQueue {
  private buffer: Uint8Array[] = [];
  private waiting: Waiter[] = [];
  private failure: Error | null = null;

  get failed(): boolean {
    return this.failure !== null;
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Producer: enqueue a frame (or resolve the oldest waiting consumer). */
  push(frame: Uint8Array): void {
    if (this.failure) return;
    const waiter = this.waiting.shift();
    if (waiter) waiter.resolve(frame);
    else this.buffer.push(frame);
  }

  /** Fail the queue. Only the first failure is kept. */
  error(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    const waiters = this.waiting;
    this.waiting = [];
    for (const waiter of waiters) waiter.reject(err);
  }

  shift(signal?: AbortSignal): Promise<Uint8Array> {
    const frame = this.buffer.shift();
    if (frame) return Promise.resolve(frame);
    if (this.failure) return Promise.reject(this.failure);
    if (signal?.aborted) return Promise.reject(toError(signal.reason));

    return new Promise<Uint8Array>((resolve, reject) => {
      const onAbort = () => {
        this.waiting = this.waiting.filter((w) => w !== waiter);
        reject(toError(signal?.reason));
      };
      const waiter: Waiter = {
        resolve: (value) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(value);
        },
        reject: (err) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        },
      };
      this.waiting.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
