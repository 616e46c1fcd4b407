import { describe, it, expect } from 'vitest';
import { CallLock } from '../src/call-lock.js';

describe('CallLock', () => {
  it('runs callers one at a time in arrival order', async () => {
    const lock = new CallLock();
    const order: string[] = [];
    let inside = 0;
    let maxInside = 0;

    const task = (label: string) =>
      lock.run(async () => {
        inside++;
        maxInside = Math.max(maxInside, inside);
        await new Promise<void>((resolve) => setImmediate(resolve));
        order.push(label);
        inside--;
      });

    await Promise.all([task('a'), task('b'), task('c')]);
    expect(order).toEqual(['a', 'b', 'c']);
    expect(maxInside).toBe(1);
    expect(lock.pending).toBe(0);
  });

  it('releases the lock when the holder throws', async () => {
    const lock = new CallLock();
    await expect(
      lock.run(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(lock.run(async () => 'next')).resolves.toBe('next');
  });

  it('ignores a second release', async () => {
    const lock = new CallLock();
    const release = await lock.acquire();
    release();
    release();
    expect(lock.pending).toBe(0);
  });
});
