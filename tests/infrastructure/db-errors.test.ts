import { describe, it, expect } from 'vitest';
import { toStoreError } from '../../src/infrastructure/db/errors.js';
import { PoolExhaustedError, RuleNotFoundError, StoreError } from '../../src/domain/index.js';

function driverError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('toStoreError', () => {
  it('passes application errors through', () => {
    const err = new RuleNotFoundError('call_dial');
    expect(toStoreError(err)).toBe(err);
  });

  it.each(['CONNECT_TIMEOUT', 'ECONNREFUSED', 'ECONNRESET', 'CONNECTION_DESTROYED'])(
    'maps %s to PoolExhaustedError',
    (code) => {
      const mapped = toStoreError(driverError('connection failed', code));
      expect(mapped).toBeInstanceOf(PoolExhaustedError);
      expect(mapped.message).toBe(`Could not obtain a database connection (${code})`);
    },
  );

  it('maps query failures to StoreError', () => {
    const cause = driverError('duplicate key value violates unique constraint "events_pkey"', '23505');
    const mapped = toStoreError(cause);

    expect(mapped).toBeInstanceOf(StoreError);
    expect(mapped).not.toBeInstanceOf(PoolExhaustedError);
    expect(mapped.code).toBe('STORE_ERROR');
    expect(mapped.cause).toBe(cause);
  });

  it('handles non-Error values', () => {
    expect(toStoreError('boom').message).toBe('Database operation failed: boom');
  });
});
