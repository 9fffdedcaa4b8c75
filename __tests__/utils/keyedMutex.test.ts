import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../src/utils/keyedMutex';
import { RateLimiter } from '../../src/utils/rateLimiter';

describe('KeyedMutex', () => {
  it('should serialize work on the same key in arrival order', async () => {
    const mutex = new KeyedMutex('test');
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive('a', async () => {
      await gate;
      order.push('first');
    });
    const second = mutex.runExclusive('a', () => {
      order.push('second');
    });

    expect(mutex.isLocked('a')).toBe(true);
    release();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
    expect(mutex.isLocked('a')).toBe(false);
  });

  it('should let different keys run independently', async () => {
    const mutex = new KeyedMutex('test');
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const blocked = mutex.runExclusive('a', () => gate);
    const other = await mutex.runExclusive('b', () => 'done');

    expect(other).toBe('done');
    expect(mutex.isLocked('b')).toBe(false);
    release();
    await blocked;
  });

  it('should release the lock when the callback throws', async () => {
    const mutex = new KeyedMutex('test');

    await expect(
      mutex.runExclusive('a', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(mutex.isLocked('a')).toBe(false);
    expect(await mutex.runExclusive('a', () => 1)).toBe(1);
  });
});

describe('RateLimiter', () => {
  it('should space out bursts', async () => {
    const limiter = new RateLimiter(20); // 50ms apart
    const started: number[] = [];

    await Promise.all([0, 1, 2].map(() => limiter.execute(() => started.push(Date.now()))));

    // Timers can fire a millisecond early
    expect(started[2] - started[0]).toBeGreaterThanOrEqual(95);
  });

  it('should return the result of the call', async () => {
    const limiter = new RateLimiter(1000);

    expect(await limiter.execute(async () => 'value')).toBe('value');
  });
});
