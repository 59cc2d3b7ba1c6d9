import { describe, expect, it } from 'vitest';

import { createKeyedMutex } from '@/common/utils/keyed-mutex.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('createKeyedMutex', () => {
  it('runs operations on one key in submission order', async () => {
    const mutex = createKeyedMutex<string>();
    const order: string[] = [];

    const slow = mutex.runExclusive('a', async () => {
      await tick();
      await tick();
      order.push('first');
    });
    const fast = mutex.runExclusive('a', async () => {
      order.push('second');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['first', 'second']);
  });

  it('lets different keys run concurrently', async () => {
    const mutex = createKeyedMutex<string>();
    const order: string[] = [];

    const slow = mutex.runExclusive('a', async () => {
      await tick();
      await tick();
      order.push('a');
    });
    const other = mutex.runExclusive('b', async () => {
      order.push('b');
    });

    await Promise.all([slow, other]);
    expect(order).toEqual(['b', 'a']);
  });

  it('keeps the chain going after a rejected operation', async () => {
    const mutex = createKeyedMutex<number>();

    const failing = mutex.runExclusive(1, async () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive(1, async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('drops the key once idle', async () => {
    const mutex = createKeyedMutex<number>();

    const running = mutex.runExclusive(7, async () => {
      await tick();
    });
    expect(mutex.activeKeys).toBe(1);

    await running;
    expect(mutex.activeKeys).toBe(0);
  });
});
