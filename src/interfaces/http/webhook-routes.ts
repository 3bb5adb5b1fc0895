import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { admitEvent, ingestPayloadSchema } from '../../application/index.js';
import type { DerivedStats, RuleTable } from '../../application/index.js';
import type { FixedWindowRateLimiter, StatsCache } from '../../infrastructure/redis/index.js';
import { requireWebhookSecret } from './auth.js';
import { rateLimit } from './rate-limit.js';
import { validationFailed } from './error-handler.js';

export interface WebhookRoutesOptions {
  secret: string;
  duplicate_window_seconds: number;
  rules: RuleTable;
  limiter: FixedWindowRateLimiter;
  statsCache: StatsCache<DerivedStats>;
}

export interface IngestResponse {
  status: 'success';
  event_id: string;
  gold_earned: number;
  xp_earned: number;
  message: string;
  duplicate: boolean;
}

/**
 * POST /api/v1/webhook/ingest — authenticated, rate-limited event admission.
 *
 * Rate limit → secret → payload validation → rule lookup → admission.
 * A duplicate answers 201 like a new event, with zero rewards.
 */
async function webhookRoutes(fastify: FastifyInstance, opts: WebhookRoutesOptions): Promise<void> {
  fastify.post(
    '/api/v1/webhook/ingest',
    {
      onRequest: [rateLimit(opts.limiter), requireWebhookSecret(opts.secret)],
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = ingestPayloadSchema.safeParse(request.body);

      if (!parsed.success) {
        throw validationFailed(parsed.error);
      }

      const { source, event_type, metadata } = parsed.data;

      const result = await admitEvent(
        fastify.db,
        opts.rules,
        { source, event_type, metadata },
        { duplicate_window_seconds: opts.duplicate_window_seconds },
      );

      if (result.duplicate) {
        request.log.info({ source, event_type }, 'Duplicate event ignored');
        return reply.status(201).send({
          status: 'success',
          event_id: 'duplicate',
          gold_earned: 0,
          xp_earned: 0,
          message: 'Duplicate event ignored (idempotency check)',
          duplicate: true,
        } satisfies IngestResponse);
      }

      await opts.statsCache.invalidate();

      request.log.info(
        { event_id: result.event_id, source, event_type, gold: result.reward.gold, xp: result.reward.xp },
        'Event admitted',
      );

      return reply.status(201).send({
        status: 'success',
        event_id: result.event_id,
        gold_earned: result.reward.gold,
        xp_earned: result.reward.xp,
        message: 'Event processed successfully',
        duplicate: false,
      } satisfies IngestResponse);
    },
  );
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['db', 'error-handler'],
  fastify: '5.x',
});
