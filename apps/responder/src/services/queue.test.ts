import { describe, expect, it } from 'vitest';
import { BoundedQueue } from './queue.js';

describe('BoundedQueue', () => {
  it('rejects offers beyond capacity', () => {
    const q = new BoundedQueue<string>(2);
    expect([q.offer('a'), q.offer('b'), q.offer('c')]).toEqual([true, true, false]);
    expect(q.size).toBe(2);
  });

  it('hands items out in order', async () => {
    const q = new BoundedQueue<string>(4);
    q.offer('a');
    q.offer('b');
    expect([await q.take(), await q.take()]).toEqual(['a', 'b']);
  });

  it('wakes a waiting consumer without using capacity', async () => {
    const q = new BoundedQueue<string>(1);
    const waiting = q.take();
    expect(q.offer('a')).toBe(true);
    expect(q.size).toBe(0);
    expect(await waiting).toBe('a');
  });

  it('drains queued items after close, then yields null', async () => {
    const q = new BoundedQueue<string>(2);
    q.offer('a');
    q.close();
    expect(q.offer('b')).toBe(false);
    expect(await q.take()).toBe('a');
    expect(await q.take()).toBeNull();
  });

  it('releases waiting consumers on close', async () => {
    const q = new BoundedQueue<number>(1);
    const waiting = q.take();
    q.close();
    expect(await waiting).toBeNull();
  });

  it('requires a positive capacity', () => {
    expect(() => new BoundedQueue(0)).toThrow(RangeError);
  });
});
