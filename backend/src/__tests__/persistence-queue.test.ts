import { describe, it, expect, vi } from 'vitest';
import { PersistenceQueue } from '../stores/PersistenceQueue.js';

describe('PersistenceQueue', () => {
  it('retries a failed write until it succeeds', async () => {
    const queue = new PersistenceQueue({ timeoutMs: 1000, retries: 3, backoffMs: 0 });
    const write = vi.fn<[], Promise<void>>().mockRejectedValueOnce(new Error('busy')).mockResolvedValueOnce(undefined);

    queue.enqueue('turn a#1', write);
    await queue.drain();

    expect(write).toHaveBeenCalledTimes(2);
    expect(queue.failureCount).toBe(0);
  });

  it('gives up after the configured attempts without surfacing the error', async () => {
    const queue = new PersistenceQueue({ timeoutMs: 1000, retries: 3, backoffMs: 0 });
    const write = vi.fn(async () => Promise.reject(new Error('disk full')));

    expect(() => queue.enqueue('turn a#1', write)).not.toThrow();
    await queue.drain();

    expect(write).toHaveBeenCalledTimes(3);
    expect(queue.failureCount).toBe(1);
    expect(queue.pendingCount).toBe(0);
  });

  it('treats a write that throws synchronously as a failed attempt', async () => {
    const queue = new PersistenceQueue({ timeoutMs: 1000, retries: 1, backoffMs: 0 });

    queue.enqueue('turn a#1', () => {
      throw new Error('not open');
    });
    await queue.drain();

    expect(queue.failureCount).toBe(1);
  });

  it('abandons an attempt that outlives its timeout', async () => {
    const queue = new PersistenceQueue({ timeoutMs: 10, retries: 1, backoffMs: 0 });

    queue.enqueue('turn a#1', () => new Promise<void>(() => undefined));
    await queue.drain();

    expect(queue.failureCount).toBe(1);
  });

  it('drains writes enqueued while draining', async () => {
    const queue = new PersistenceQueue({ timeoutMs: 1000, retries: 1, backoffMs: 0 });
    const written: string[] = [];

    queue.enqueue('first', async () => {
      written.push('first');
      queue.enqueue('second', async () => {
        written.push('second');
      });
    });
    expect(queue.pendingCount).toBe(1);
    await queue.drain();

    expect(written).toEqual(['first', 'second']);
    expect(queue.pendingCount).toBe(0);
  });
});
