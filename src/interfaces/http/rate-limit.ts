import type { FastifyReply, FastifyRequest } from 'fastify';
import { RateLimitedError } from '../../domain/index.js';
import type { FixedWindowRateLimiter, RateLimitDecision } from '../../infrastructure/redis/index.js';

/**
 * `onRequest` hook counting requests per client IP.
 *
 * When Redis cannot be reached the request is let through and the
 * failure is logged.
 */
export function rateLimit(limiter: FixedWindowRateLimiter) {
  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    let decision: RateLimitDecision;
    try {
      decision = await limiter.hit(request.ip);
    } catch (err: unknown) {
      request.log.warn({ err }, 'Rate limiter unavailable, allowing request');
      return;
    }

    if (!decision.allowed) {
      request.log.warn({ ip: request.ip, retry_after: decision.retry_after_seconds }, 'Rate limit exceeded');
      throw new RateLimitedError(decision.retry_after_seconds);
    }

    reply.header('x-ratelimit-remaining', decision.remaining);
  };
}
