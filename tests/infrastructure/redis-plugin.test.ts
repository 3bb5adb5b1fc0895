import { describe, it, expect, vi, beforeEach } from 'vitest';

const redis = vi.hoisted(() => ({
  status: 'wait',
  connect: vi.fn(),
  quit: vi.fn(),
  disconnect: vi.fn(),
  on: vi.fn(),
}));

vi.mock('ioredis', () => ({
  default: vi.fn(function FakeRedis() {
    return redis;
  }),
}));

import Fastify from 'fastify';
import redisPlugin from '../../src/infrastructure/redis/redis-plugin.js';

beforeEach(() => {
  vi.clearAllMocks();
});

describe('redisPlugin', () => {
  it('starts without Redis and keeps the client for later reconnects', async () => {
    redis.status = 'reconnecting';
    redis.connect.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6379'));

    const app = Fastify({ logger: false });
    await app.register(redisPlugin, { url: 'redis://localhost:6379' });
    await app.ready();

    expect(redis.connect).toHaveBeenCalledTimes(1);
    expect(app.redis).toBe(redis);

    await app.close();

    expect(redis.disconnect).toHaveBeenCalledTimes(1);
    expect(redis.quit).not.toHaveBeenCalled();
  });

  it('quits a ready connection on close', async () => {
    redis.status = 'ready';
    redis.connect.mockResolvedValue(undefined);
    redis.quit.mockResolvedValue('OK');

    const app = Fastify({ logger: false });
    await app.register(redisPlugin, { url: 'redis://localhost:6379' });
    await app.ready();
    await app.close();

    expect(redis.quit).toHaveBeenCalledTimes(1);
    expect(redis.disconnect).not.toHaveBeenCalled();
  });
});
