import { AppError, PoolExhaustedError, StoreError } from '../../domain/index.js';

/** postgres.js error codes raised when no pooled connection could be opened. */
const CONNECTION_CODES = new Set(['CONNECT_TIMEOUT', 'ECONNREFUSED', 'ECONNRESET', 'CONNECTION_DESTROYED']);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Normalises anything thrown by the driver into the store taxonomy.
 * Errors that are already `AppError`s pass through untouched.
 */
export function toStoreError(err: unknown): AppError {
  if (err instanceof AppError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const code = errorCode(err);

  if (code !== undefined && CONNECTION_CODES.has(code)) {
    return new PoolExhaustedError(`Could not obtain a database connection (${code})`, { cause: err });
  }

  return new StoreError(`Database operation failed: ${message}`, { cause: err });
}
