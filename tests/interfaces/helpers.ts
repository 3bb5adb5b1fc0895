import { vi } from 'vitest';
import fp from 'fastify-plugin';
import type Redis from 'ioredis';
import type { FastifyInstance } from 'fastify';
import { FixedWindowRateLimiter } from '../../src/infrastructure/redis/rate-limiter.js';
import type { CounterStore } from '../../src/infrastructure/redis/rate-limiter.js';
import type { CacheStore } from '../../src/infrastructure/redis/stats-cache.js';
import type { Database } from '../../src/infrastructure/db/index.js';

export const SECRET = 'test-secret-test-secret-test-secret';

/** Stands in for the real db plugin; queries are mocked at the barrel. */
export const fakeDbPlugin = fp(async (fastify: FastifyInstance) => {
  fastify.decorate('db', {} as Database);
}, { name: 'db' });

/** Stands in for the real redis plugin; only `ping` is reachable. */
export function fakeRedisPlugin(ping: () => Promise<string>) {
  return fp(async (fastify: FastifyInstance) => {
    fastify.decorate('redis', { ping } as unknown as Redis);
  }, { name: 'redis' });
}

export function memoryCounter(): CounterStore {
  const counts = new Map<string, number>();
  return {
    incr: async (key: string) => {
      const n = (counts.get(key) ?? 0) + 1;
      counts.set(key, n);
      return n;
    },
    pexpire: async () => 1,
  };
}

export function memoryCache() {
  const data = new Map<string, string>();
  return {
    data,
    get: vi.fn(async (key: string) => data.get(key) ?? null),
    set: vi.fn(async (key: string, value: string) => {
      data.set(key, value);
      return 'OK';
    }),
    del: vi.fn(async (key: string) => (data.delete(key) ? 1 : 0)),
  } satisfies CacheStore & { data: Map<string, string> };
}

/** Limiter with a frozen clock at 30s into the first window. */
export function makeLimiter(limit = 100, store: CounterStore = memoryCounter()): FixedWindowRateLimiter {
  return new FixedWindowRateLimiter(store, { scope: 'test', limit, window_ms: 60_000 }, () => 30_000);
}

export const silentLog = { warn: vi.fn(), debug: vi.fn() };
