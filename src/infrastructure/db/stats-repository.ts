import { count, desc, gte, sql } from 'drizzle-orm';
import type { Executor } from './client.js';
import { events } from './schema.js';

export interface EventTotals {
  total_gold: number;
  total_xp: number;
  total_events: number;
  events_today: number;
  calls_made: number;
  calls_connected: number;
  meetings_booked: number;
}

export interface DailyTotals {
  date: string;
  total_events: number;
  total_gold: number;
  total_xp: number;
  calls_made: number;
  calls_connected: number;
  meetings_booked: number;
}

function countOfType(eventType: string) {
  return sql<number>`count(*) filter (where ${events.event_type} = ${eventType})`.mapWith(Number);
}

/**
 * Aggregates the whole `events` table in a single pass.
 *
 * "Today" starts at midnight in the session time zone of the pool
 * (see `DbClientOptions.timezone`). Cost is linear in table size.
 */
export async function aggregateEventTotals(db: Executor): Promise<EventTotals> {
  const [row] = await db
    .select({
      total_gold: sql<number>`coalesce(sum(${events.gold_value}), 0)`.mapWith(Number),
      total_xp: sql<number>`coalesce(sum(${events.xp_value}), 0)`.mapWith(Number),
      total_events: count(),
      events_today: sql<number>`count(*) filter (where ${events.created_at} >= date_trunc('day', now()))`.mapWith(Number),
      calls_made: countOfType('call_dial'),
      calls_connected: countOfType('call_connect'),
      meetings_booked: countOfType('meeting_booked'),
    })
    .from(events);

  return {
    total_gold: row?.total_gold ?? 0,
    total_xp: row?.total_xp ?? 0,
    total_events: row?.total_events ?? 0,
    events_today: row?.events_today ?? 0,
    calls_made: row?.calls_made ?? 0,
    calls_connected: row?.calls_connected ?? 0,
    meetings_booked: row?.meetings_booked ?? 0,
  };
}

/**
 * Per-day totals for the trailing `days` calendar days (today included),
 * newest first. Days without events are absent.
 */
export async function aggregateDailyTotals(db: Executor, days: number): Promise<DailyTotals[]> {
  const day = sql<string>`to_char(date_trunc('day', ${events.created_at}), 'YYYY-MM-DD')`;

  const rows = await db
    .select({
      date: day,
      total_events: count(),
      total_gold: sql<number>`coalesce(sum(${events.gold_value}), 0)`.mapWith(Number),
      total_xp: sql<number>`coalesce(sum(${events.xp_value}), 0)`.mapWith(Number),
      calls_made: countOfType('call_dial'),
      calls_connected: countOfType('call_connect'),
      meetings_booked: countOfType('meeting_booked'),
    })
    .from(events)
    .where(gte(events.created_at, sql`date_trunc('day', now()) - make_interval(days => ${days - 1})`))
    .groupBy(day)
    .orderBy(desc(day));

  return rows.map((r) => ({
    date: r.date,
    total_events: Number(r.total_events),
    total_gold: r.total_gold,
    total_xp: r.total_xp,
    calls_made: r.calls_made,
    calls_connected: r.calls_connected,
    meetings_booked: r.meetings_booked,
  }));
}
