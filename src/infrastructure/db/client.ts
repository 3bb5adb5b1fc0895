import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  url: string;
  pool_max: number;
  idle_timeout_seconds: number;
  connect_timeout_seconds: number;
  /** Session time zone; decides where "today" starts for stats. */
  timezone: string;
}

/**
 * Creates a Drizzle client backed by a postgres.js pool.
 *
 * Returns both the raw `sql` connection (for lifecycle management and
 * bootstrap DDL) and the typed `db` instance (for queries).
 */
export function createDbClient(options: DbClientOptions) {
  const sql = postgres(options.url, {
    max: options.pool_max,
    idle_timeout: options.idle_timeout_seconds,
    connect_timeout: options.connect_timeout_seconds,
    connection: {
      TimeZone: options.timezone,
    },
    onnotice: () => {},
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type Sql = ReturnType<typeof createDbClient>['sql'];

/**
 * Anything that can run a query: the pool-backed `db` or an open
 * transaction. Both share this base, including `transaction()`, which
 * becomes a savepoint inside an open transaction.
 */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;
