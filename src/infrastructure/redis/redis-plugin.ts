import fp from 'fastify-plugin';
import Redis from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  url: string;
}

/**
 * Fastify plugin that manages the ioredis connection lifecycle.
 *
 * - Connects on server start, disconnects on close.
 * - Decorates `fastify.redis` for the rate limiter and the stats cache.
 * - A failed first connect is logged and start-up continues; ioredis
 *   keeps reconnecting in the background.
 *
 * Commands fail fast instead of queueing while Redis is away, so both
 * collaborators can fall back without stalling requests.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  const redis = new Redis(opts.url, {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  redis.on('error', (err: unknown) => {
    fastify.log.warn({ err }, 'Redis connection error');
  });

  try {
    await redis.connect();
    fastify.log.info('Redis connected');
  } catch (err: unknown) {
    fastify.log.warn({ err }, 'Redis unavailable at start-up, continuing degraded');
  }

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    if (redis.status === 'ready') {
      await redis.quit();
    } else {
      redis.disconnect();
    }
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.redis` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
