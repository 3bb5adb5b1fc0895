/**
 * Error taxonomy shared by the core and the HTTP boundary.
 *
 * Every error the service raises on purpose extends `AppError`, which
 * carries a machine-readable `code` and the HTTP status the boundary
 * answers with. Anything else reaching the boundary is an internal fault.
 */

export interface ValidationIssue {
  readonly path: ReadonlyArray<string | number>;
  readonly message: string;
}

export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or wrong shared secret. */
export class AuthError extends AppError {
  readonly code = 'UNAUTHORIZED';
  readonly statusCode = 401;
}

/** Malformed or out-of-range payload. */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_FAILED';
  readonly statusCode = 422;

  constructor(
    message: string,
    readonly issues: readonly ValidationIssue[] = [],
  ) {
    super(message);
  }
}

/** No reward rule is configured for a (valid) event type. */
export class RuleNotFoundError extends AppError {
  readonly code = 'RULE_NOT_FOUND';
  readonly statusCode = 422;

  constructor(readonly eventType: string) {
    super(`No reward rule configured for event type: ${eventType}`);
  }
}

/** Persistence failed; the unit of work has been rolled back. */
export class StoreError extends AppError {
  readonly code: string = 'STORE_ERROR';
  readonly statusCode = 500;
}

/** No pooled connection could be obtained in time. */
export class PoolExhaustedError extends StoreError {
  override readonly code = 'POOL_EXHAUSTED';
}

export class RateLimitedError extends AppError {
  readonly code = 'RATE_LIMITED';
  readonly statusCode = 429;

  constructor(readonly retryAfterSeconds: number) {
    super(`Rate limit exceeded, retry in ${retryAfterSeconds}s`);
  }
}

/** Invalid process configuration; raised before the server starts. */
export class ConfigError extends AppError {
  readonly code = 'INVALID_CONFIG';
  readonly statusCode = 500;

  constructor(
    message: string,
    readonly issues: readonly ValidationIssue[] = [],
  ) {
    super(message);
  }
}
