import type { Sql } from './client.js';

/**
 * Idempotent DDL run at start-up so a fresh database is usable without
 * a separate migration step. Mirrors `schema.ts`; drizzle-kit can
 * generate proper migrations from that file when they are wanted.
 */
const STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS rules (
    event_type   VARCHAR(50)  PRIMARY KEY,
    gold_value   INTEGER      NOT NULL DEFAULT 0 CHECK (gold_value >= 0),
    xp_value     INTEGER      NOT NULL DEFAULT 0 CHECK (xp_value >= 0),
    display_name VARCHAR(100) NOT NULL,
    description  TEXT         NOT NULL DEFAULT '',
    created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    updated_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS events (
    id            UUID         PRIMARY KEY,
    source        VARCHAR(20)  NOT NULL CHECK (source IN ('outreach', 'nooks', 'manual', 'zapier')),
    event_type    VARCHAR(50)  NOT NULL,
    gold_value    INTEGER      NOT NULL CHECK (gold_value >= 0),
    xp_value      INTEGER      NOT NULL DEFAULT 0 CHECK (xp_value >= 0),
    metadata      JSONB        NOT NULL DEFAULT '{}',
    metadata_hash CHAR(64)     NOT NULL,
    created_at    TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS event_log (
    id         SERIAL       PRIMARY KEY,
    event_id   UUID         NOT NULL REFERENCES events(id) ON DELETE CASCADE,
    action     VARCHAR(50)  NOT NULL,
    details    JSONB        NOT NULL DEFAULT '{}',
    created_at TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_events_created_at ON events (created_at)`,
  `CREATE INDEX IF NOT EXISTS idx_events_event_type ON events (event_type)`,
  `CREATE INDEX IF NOT EXISTS idx_events_source ON events (source)`,
  `CREATE INDEX IF NOT EXISTS idx_events_duplicate_lookup ON events (source, event_type, metadata_hash, created_at)`,
  `CREATE INDEX IF NOT EXISTS idx_event_log_event_id ON event_log (event_id)`,
  `CREATE INDEX IF NOT EXISTS idx_event_log_created_at ON event_log (created_at)`,
];

export async function ensureSchema(sql: Sql): Promise<void> {
  for (const statement of STATEMENTS) {
    await sql.unsafe(statement);
  }
}
