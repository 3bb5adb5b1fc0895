import { describe, it, expect, vi } from 'vitest';
import { FixedWindowRateLimiter } from '../../src/infrastructure/redis/rate-limiter.js';
import type { CounterStore } from '../../src/infrastructure/redis/rate-limiter.js';

function memoryCounter() {
  const counts = new Map<string, number>();
  return {
    counts,
    incr: vi.fn(async (key: string) => {
      const n = (counts.get(key) ?? 0) + 1;
      counts.set(key, n);
      return n;
    }),
    pexpire: vi.fn(async () => 1),
  } satisfies CounterStore & { counts: Map<string, number> };
}

const POLICY = { scope: 'webhook', limit: 2, window_ms: 60_000 };

describe('FixedWindowRateLimiter', () => {
  it('allows requests up to the limit', async () => {
    const store = memoryCounter();
    const limiter = new FixedWindowRateLimiter(store, POLICY, () => 30_000);

    expect(await limiter.hit('10.0.0.1')).toEqual({ allowed: true, remaining: 1 });
    expect(await limiter.hit('10.0.0.1')).toEqual({ allowed: true, remaining: 0 });
  });

  it('rejects past the limit with the time left in the window', async () => {
    const store = memoryCounter();
    const limiter = new FixedWindowRateLimiter(store, POLICY, () => 30_000);

    await limiter.hit('10.0.0.1');
    await limiter.hit('10.0.0.1');

    expect(await limiter.hit('10.0.0.1')).toEqual({ allowed: false, retry_after_seconds: 30 });
  });

  it('never asks to wait less than a second', async () => {
    const store = memoryCounter();
    const limiter = new FixedWindowRateLimiter(store, { ...POLICY, limit: 0 }, () => 59_999);

    expect(await limiter.hit('10.0.0.1')).toEqual({ allowed: false, retry_after_seconds: 1 });
  });

  it('sets the expiry only on the first hit of a window', async () => {
    const store = memoryCounter();
    const limiter = new FixedWindowRateLimiter(store, POLICY, () => 120_500);

    await limiter.hit('10.0.0.1');
    await limiter.hit('10.0.0.1');

    expect(store.pexpire).toHaveBeenCalledOnce();
    expect(store.pexpire).toHaveBeenCalledWith('ratelimit:webhook:10.0.0.1:2', 60_000);
  });

  it('counts clients separately', async () => {
    const store = memoryCounter();
    const limiter = new FixedWindowRateLimiter(store, { ...POLICY, limit: 1 }, () => 0);

    await limiter.hit('10.0.0.1');

    expect(await limiter.hit('10.0.0.2')).toEqual({ allowed: true, remaining: 0 });
  });

  it('starts a fresh count in the next window', async () => {
    const store = memoryCounter();
    let now = 10_000;
    const limiter = new FixedWindowRateLimiter(store, { ...POLICY, limit: 1 }, () => now);

    await limiter.hit('10.0.0.1');
    now = 70_000;

    expect(await limiter.hit('10.0.0.1')).toEqual({ allowed: true, remaining: 0 });
  });

  it('propagates store failures to the caller', async () => {
    const store = memoryCounter();
    store.incr.mockRejectedValue(new Error('Connection is closed.'));
    const limiter = new FixedWindowRateLimiter(store, POLICY);

    await expect(limiter.hit('10.0.0.1')).rejects.toThrow('Connection is closed.');
  });
});
