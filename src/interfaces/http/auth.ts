import { createHash, timingSafeEqual } from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import { AuthError } from '../../domain/index.js';

export const WEBHOOK_SECRET_HEADER = 'x-webhook-secret';

function sha256(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Constant-time comparison. Both sides are hashed first so the buffers
 * always have equal length and the secret's length does not leak.
 */
export function secretsMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(sha256(provided), sha256(expected));
}

/**
 * `onRequest` hook guarding the webhook. Runs before the body is parsed,
 * so unauthenticated callers never reach validation or the store.
 */
export function requireWebhookSecret(expected: string) {
  return async (request: FastifyRequest): Promise<void> => {
    const provided = request.headers[WEBHOOK_SECRET_HEADER];

    if (provided === undefined || provided === '') {
      throw new AuthError('Missing webhook secret');
    }

    if (typeof provided !== 'string' || !secretsMatch(provided, expected)) {
      request.log.warn({ ip: request.ip }, 'Rejected webhook with invalid secret');
      throw new AuthError('Invalid webhook secret');
    }
  };
}
