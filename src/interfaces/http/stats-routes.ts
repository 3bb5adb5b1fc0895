import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ValidationError } from '../../domain/index.js';
import { getCurrentStats, getDailyStats, resolveDays, MIN_DAYS, MAX_DAYS } from '../../application/index.js';
import type { DerivedStats } from '../../application/index.js';
import type { FixedWindowRateLimiter, StatsCache } from '../../infrastructure/redis/index.js';
import { rateLimit } from './rate-limit.js';

export interface StatsRoutesOptions {
  limiter: FixedWindowRateLimiter;
  statsCache: StatsCache<DerivedStats>;
}

/**
 * Read-only stats API.
 *
 * GET /api/v1/stats/current — totals, level and rank over all events
 * GET /api/v1/stats/daily   — per-day totals for the last `days` days
 */
async function statsRoutes(fastify: FastifyInstance, opts: StatsRoutesOptions): Promise<void> {
  const limit = rateLimit(opts.limiter);

  fastify.get(
    '/api/v1/stats/current',
    { onRequest: limit },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const stats = await opts.statsCache.getOrCompute(() => getCurrentStats(fastify.db));
      return reply.status(200).send(stats);
    },
  );

  fastify.get<{ Querystring: { days?: string } }>(
    '/api/v1/stats/daily',
    { onRequest: limit },
    async (
      request: FastifyRequest<{ Querystring: { days?: string } }>,
      reply: FastifyReply,
    ) => {
      const raw = request.query.days;
      const days = resolveDays(raw === undefined ? undefined : Number(raw));

      if (days === null) {
        throw new ValidationError('Validation failed', [
          { path: ['days'], message: `days must be an integer between ${MIN_DAYS} and ${MAX_DAYS}` },
        ]);
      }

      const result = await getDailyStats(fastify.db, days);
      return reply.status(200).send(result);
    },
  );
}

export default fp(statsRoutes, {
  name: 'stats-routes',
  dependencies: ['db', 'error-handler'],
  fastify: '5.x',
});
