import { count, lt } from 'drizzle-orm';
import type { Executor } from './client.js';
import { events } from './schema.js';

/** Number of events created strictly before `cutoff`. */
export async function countEventsBefore(db: Executor, cutoff: Date): Promise<number> {
  const [row] = await db
    .select({ n: count() })
    .from(events)
    .where(lt(events.created_at, cutoff));

  return row?.n ?? 0;
}

/**
 * Deletes events created strictly before `cutoff`; their audit rows
 * cascade. Returns the number of events removed.
 */
export async function deleteEventsBefore(db: Executor, cutoff: Date): Promise<number> {
  const deleted = await db
    .delete(events)
    .where(lt(events.created_at, cutoff))
    .returning({ id: events.id });

  return deleted.length;
}
