import { sql } from 'drizzle-orm';
import type { Executor } from './client.js';

/** Round-trips `SELECT 1`; rejects when the pool cannot reach Postgres. */
export async function pingDatabase(db: Executor): Promise<void> {
  await db.execute(sql`select 1`);
}
