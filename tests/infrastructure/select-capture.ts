import { getTableName, is, SQL } from 'drizzle-orm';
import type { Table } from 'drizzle-orm';
import { PgDialect } from 'drizzle-orm/pg-core';
import type { Executor } from '../../src/infrastructure/db/index.js';

type Row = Record<string, unknown>;

export interface CapturedSelect {
  fields: Record<string, unknown>;
  table: string | null;
  where: unknown;
  groupBy: unknown[];
  orderBy: unknown[];
  limit: number | null;
}

const dialect = new PgDialect();

/** Renders a captured drizzle fragment the way the Postgres driver receives it. */
export function render(fragment: unknown): { sql: string; params: unknown[] } {
  if (!is(fragment, SQL)) {
    throw new Error('Expected an SQL fragment');
  }
  const query = dialect.sqlToQuery(fragment);
  return { sql: query.sql, params: query.params };
}

/**
 * Stand-in for `db.select(...)` that records every builder call and
 * resolves with `rows` once awaited.
 */
export function captureSelect(rows: Row[]): { db: Executor; captured: CapturedSelect } {
  const captured: CapturedSelect = {
    fields: {},
    table: null,
    where: undefined,
    groupBy: [],
    orderBy: [],
    limit: null,
  };

  const chain = {
    from(table: Table) {
      captured.table = getTableName(table);
      return chain;
    },
    where(condition: unknown) {
      captured.where = condition;
      return chain;
    },
    groupBy(...columns: unknown[]) {
      captured.groupBy = columns;
      return chain;
    },
    orderBy(...columns: unknown[]) {
      captured.orderBy = columns;
      return chain;
    },
    limit(n: number) {
      captured.limit = n;
      return chain;
    },
    then<T>(resolve: (value: Row[]) => T, reject: (err: unknown) => T) {
      return Promise.resolve(rows).then(resolve, reject);
    },
  };

  const db = {
    select(fields: Record<string, unknown>) {
      captured.fields = fields;
      return chain;
    },
  };

  return { db: db as unknown as Executor, captured };
}
