import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { pingDatabase } from '../../infrastructure/db/index.js';
import type { FixedWindowRateLimiter } from '../../infrastructure/redis/index.js';
import { rateLimit } from './rate-limit.js';

export interface HealthRoutesOptions {
  name: string;
  version: string;
  limiter: FixedWindowRateLimiter;
}

type ComponentState = 'connected' | 'disconnected';

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  database: ComponentState;
  redis: ComponentState;
  degraded: string[];
  timestamp: string;
  version: string;
}

/**
 * GET /api/v1/health — dependency probe. Only a database outage turns
 * the status code into 503; Redis is reported but optional.
 *
 * GET / — service name, version and endpoint map.
 */
async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  fastify.get(
    '/api/v1/health',
    { onRequest: rateLimit(opts.limiter) },
    async (request: FastifyRequest, reply: FastifyReply) => {
      let database: ComponentState = 'connected';
      try {
        await pingDatabase(fastify.db);
      } catch (err: unknown) {
        request.log.error({ err }, 'Database health check failed');
        database = 'disconnected';
      }

      let redis: ComponentState = 'connected';
      try {
        await fastify.redis.ping();
      } catch (err: unknown) {
        request.log.warn({ err }, 'Redis health check failed');
        redis = 'disconnected';
      }

      const degraded: string[] = [];
      if (database === 'disconnected') degraded.push('database');
      if (redis === 'disconnected') degraded.push('redis');

      const body: HealthResponse = {
        status: degraded.length === 0 ? 'healthy' : 'degraded',
        database,
        redis,
        degraded,
        timestamp: new Date().toISOString(),
        version: opts.version,
      };

      return reply.status(database === 'connected' ? 200 : 503).send(body);
    },
  );

  fastify.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({
      name: opts.name,
      version: opts.version,
      endpoints: {
        ingest: 'POST /api/v1/webhook/ingest',
        current_stats: 'GET /api/v1/stats/current',
        daily_stats: 'GET /api/v1/stats/daily?days=7',
        health: 'GET /api/v1/health',
      },
    });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['db', 'redis'],
  fastify: '5.x',
});
