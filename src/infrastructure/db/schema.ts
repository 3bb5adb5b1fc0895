import { pgTable, uuid, varchar, integer, timestamp, jsonb, char, serial, text, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `events` table.
 *
 * Append-only. `gold_value` / `xp_value` are copied from the rule table
 * at admission. `metadata_hash` is the SHA-256 of the canonical metadata
 * serialization and backs the duplicate lookup index.
 */
export const events = pgTable('events', {
  id: uuid('id').primaryKey(),
  source: varchar('source', { length: 20 }).notNull(),
  event_type: varchar('event_type', { length: 50 }).notNull(),
  gold_value: integer('gold_value').notNull(),
  xp_value: integer('xp_value').notNull().default(0),
  metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
  metadata_hash: char('metadata_hash', { length: 64 }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_events_created_at').on(table.created_at),
  index('idx_events_event_type').on(table.event_type),
  index('idx_events_source').on(table.source),
  index('idx_events_duplicate_lookup').on(table.source, table.event_type, table.metadata_hash, table.created_at),
]);

/**
 * Drizzle schema for the `rules` table.
 *
 * One row per event type. Seeded from the rules file on boot; rows an
 * operator has edited are left alone.
 */
export const rules = pgTable('rules', {
  event_type: varchar('event_type', { length: 50 }).primaryKey(),
  gold_value: integer('gold_value').notNull().default(0),
  xp_value: integer('xp_value').notNull().default(0),
  display_name: varchar('display_name', { length: 100 }).notNull(),
  description: text('description').notNull().default(''),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

/**
 * Drizzle schema for the `event_log` audit table.
 *
 * Written in the same transaction as its event. Rows cascade away with
 * the event when the retention job deletes it.
 */
export const eventLog = pgTable('event_log', {
  id: serial('id').primaryKey(),
  event_id: uuid('event_id').notNull().references(() => events.id, { onDelete: 'cascade' }),
  action: varchar('action', { length: 50 }).notNull(),
  details: jsonb('details').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_event_log_event_id').on(table.event_id),
  index('idx_event_log_created_at').on(table.created_at),
]);
