import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance } from 'fastify';
import type { ZodError } from 'zod';
import {
  AppError,
  AuthError,
  RateLimitedError,
  ValidationError,
} from '../../domain/index.js';
import type { ValidationIssue } from '../../domain/index.js';

/** Body of every error response. */
export interface ErrorBody {
  error: string;
  code: string;
  issues?: readonly ValidationIssue[];
}

/** Wraps a failed zod parse into the 422 the API answers with. */
export function validationFailed(error: ZodError): ValidationError {
  return new ValidationError(
    'Validation failed',
    error.issues.map((i) => ({ path: i.path, message: i.message })),
  );
}

function bodyOf(err: AppError): ErrorBody {
  const body: ErrorBody = { error: err.message, code: err.code };
  if (err instanceof ValidationError) {
    body.issues = err.issues;
  }
  return body;
}

/**
 * Maps errors to `{ error, code, issues? }`.
 *
 * - `AppError` subclasses answer with their own status and code.
 * - Fastify's 400s (unparsable or empty JSON body) become 422
 *   VALIDATION_FAILED; its other 4xx keep their status.
 * - Anything else is logged and answered with a generic 500.
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Request failed');
      } else {
        request.log.warn({ code: error.code, reason: error.message }, 'Request rejected');
      }

      if (error instanceof RateLimitedError) {
        reply.header('retry-after', String(error.retryAfterSeconds));
      }
      if (error instanceof AuthError) {
        reply.header('www-authenticate', 'Secret header="X-Webhook-Secret"');
      }

      return reply.status(error.statusCode).send(bodyOf(error));
    }

    const status = error.statusCode;

    if (status === 400) {
      request.log.warn({ code: error.code, reason: error.message }, 'Malformed request');
      return reply.status(422).send({
        error: 'Validation failed',
        code: 'VALIDATION_FAILED',
        issues: [{ path: [], message: error.message }],
      } satisfies ErrorBody);
    }

    if (status !== undefined && status > 400 && status < 500) {
      return reply.status(status).send({ error: error.message, code: error.code } satisfies ErrorBody);
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal server error', code: 'INTERNAL_ERROR' } satisfies ErrorBody);
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: `Route ${request.method} ${request.url} not found`,
      code: 'NOT_FOUND',
    } satisfies ErrorBody);
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
