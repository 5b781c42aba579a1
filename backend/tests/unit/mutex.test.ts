/**
 * KeyedMutex Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { TransientConflictError } from '../../src/lib/errors';
import { KeyedMutex } from '../../src/lib/mutex';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('should grant waiters in FIFO order', async () => {
    const mutex = new KeyedMutex();
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map((n) =>
        mutex.runExclusive('account:a', 1000, async () => {
          order.push(n);
          await new Promise((r) => setTimeout(r, 2));
        })
      )
    );

    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked('account:a')).toBe(false);
  });

  it('should never let two holders overlap', async () => {
    const mutex = new KeyedMutex();
    let inside = 0;
    let maxInside = 0;

    await Promise.all(
      Array.from({ length: 10 }, () =>
        mutex.runExclusive('k', 1000, async () => {
          inside++;
          maxInside = Math.max(maxInside, inside);
          await Promise.resolve();
          inside--;
        })
      )
    );

    expect(maxInside).toBe(1);
  });

  it('should not block other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const holder = mutex.runExclusive('account:a', 1000, () => gate.promise);

    await expect(mutex.runExclusive('account:b', 50, async () => 'b done')).resolves.toBe('b done');

    gate.resolve();
    await holder;
  });

  it('should time out a waiter with TransientConflictError and drop it from the queue', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const holder = mutex.runExclusive('k', 1000, () => gate.promise);

    const waiter = mutex.acquire('k', 10);
    expect(mutex.pending('k')).toBe(1);
    await expect(waiter).rejects.toBeInstanceOf(TransientConflictError);
    expect(mutex.pending('k')).toBe(0);

    gate.resolve();
    await holder;
    expect(mutex.isLocked('k')).toBe(false);
  });

  it('should release on error', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('k', 100, async () => {
        throw new Error('rollback');
      })
    ).rejects.toThrow('rollback');
    expect(mutex.isLocked('k')).toBe(false);
  });

  it('should ignore a second release call', async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire('k', 100);
    const next = mutex.acquire('k', 100);
    release();
    release();
    const releaseNext = await next;
    expect(mutex.isLocked('k')).toBe(true);
    releaseNext();
    expect(mutex.isLocked('k')).toBe(false);
  });
});
