import { asc } from 'drizzle-orm';
import type { Executor } from './client.js';
import { rules } from './schema.js';

/** Row shape returned by rule queries. */
export type RuleRow = typeof rules.$inferSelect;

/** Fields accepted when seeding a rule (timestamps are server-assigned). */
export interface RuleSeed {
  event_type: string;
  gold_value: number;
  xp_value: number;
  display_name: string;
  description: string;
}

export async function findAllRules(db: Executor): Promise<RuleRow[]> {
  return db.select().from(rules).orderBy(asc(rules.event_type));
}

/**
 * Inserts seed rules that are not in the table yet.
 * Existing rows win, so operator edits survive a restart.
 * Returns the event types that were inserted.
 */
export async function seedRules(db: Executor, seeds: readonly RuleSeed[]): Promise<string[]> {
  if (seeds.length === 0) return [];

  const inserted = await db
    .insert(rules)
    .values(seeds.map((s) => ({
      event_type: s.event_type,
      gold_value: s.gold_value,
      xp_value: s.xp_value,
      display_name: s.display_name,
      description: s.description,
    })))
    .onConflictDoNothing({ target: rules.event_type })
    .returning({ event_type: rules.event_type });

  return inserted.map((r) => r.event_type);
}
