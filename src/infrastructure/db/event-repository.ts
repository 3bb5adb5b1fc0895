import { randomUUID } from 'node:crypto';
import { and, eq, gte, sql } from 'drizzle-orm';
import type { Executor } from './client.js';
import { events, eventLog } from './schema.js';
import { StoreError } from '../../domain/index.js';
import type { EventMetadata, EventSource, SalesEvent, SalesEventType } from '../../domain/index.js';

export interface DuplicateQuery {
  source: EventSource;
  event_type: SalesEventType;
  metadata_hash: string;
  window_seconds: number;
}

export interface NewEventInput {
  source: EventSource;
  event_type: SalesEventType;
  gold_value: number;
  xp_value: number;
  metadata: EventMetadata;
  metadata_hash: string;
}

export type InsertedEvent = Pick<SalesEvent, 'id' | 'created_at'>;

/**
 * Runs `work` in a transaction that first takes a transaction-scoped
 * advisory lock on `key`.
 *
 * Admissions sharing a key are serialized: the second one only reaches
 * its duplicate check after the first has committed or rolled back.
 * The lock is released by Postgres when the transaction ends.
 */
export async function withAdmissionLock<T>(
  db: Executor,
  key: string,
  work: (tx: Executor) => Promise<T>,
): Promise<T> {
  return db.transaction(async (tx) => {
    await tx.execute(sql`select pg_advisory_xact_lock(hashtextextended(${key}, 0))`);
    return work(tx);
  });
}

/**
 * True when an event with the same source, type and canonical metadata
 * was admitted within the trailing window (database clock).
 */
export async function hasRecentDuplicate(
  db: Executor,
  query: DuplicateQuery,
): Promise<boolean> {
  const rows = await db
    .select({ id: events.id })
    .from(events)
    .where(and(
      eq(events.source, query.source),
      eq(events.event_type, query.event_type),
      eq(events.metadata_hash, query.metadata_hash),
      gte(events.created_at, sql`clock_timestamp() - make_interval(secs => ${query.window_seconds})`),
    ))
    .limit(1);

  return rows.length > 0;
}

/**
 * Writes an event and its "created" audit entry as one unit.
 *
 * Always opens its own transaction (a savepoint when `db` is already a
 * transaction), so either both rows become visible or neither does.
 * `created_at` is taken from `clock_timestamp()` at write time.
 */
export async function insertEventWithAudit(
  db: Executor,
  input: NewEventInput,
): Promise<InsertedEvent> {
  return db.transaction(async (tx) => {
    const eventId = randomUUID();

    const [row] = await tx
      .insert(events)
      .values({
        id: eventId,
        source: input.source,
        event_type: input.event_type,
        gold_value: input.gold_value,
        xp_value: input.xp_value,
        metadata: input.metadata,
        metadata_hash: input.metadata_hash,
        created_at: sql`clock_timestamp()`,
      })
      .returning({ id: events.id, created_at: events.created_at });

    if (row === undefined) {
      throw new StoreError(`Insert of event ${eventId} returned no row`);
    }

    await tx.insert(eventLog).values({
      event_id: row.id,
      action: 'created',
      details: {
        source: input.source,
        event_type: input.event_type,
        gold_value: input.gold_value,
        xp_value: input.xp_value,
      },
    });

    return row;
  });
}
