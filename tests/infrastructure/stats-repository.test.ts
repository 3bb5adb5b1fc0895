import { describe, it, expect } from 'vitest';
import { aggregateDailyTotals, aggregateEventTotals } from '../../src/infrastructure/db/stats-repository.js';
import { captureSelect, render } from './select-capture.js';

const TOTALS_ROW = {
  total_gold: 415,
  total_xp: 155,
  total_events: 4,
  events_today: 3,
  calls_made: 2,
  calls_connected: 1,
  meetings_booked: 1,
};

describe('aggregateEventTotals', () => {
  it('aggregates the events table without a filter', async () => {
    const { db, captured } = captureSelect([TOTALS_ROW]);

    await aggregateEventTotals(db);

    expect(captured.table).toBe('events');
    expect(captured.where).toBeUndefined();
    expect(Object.keys(captured.fields)).toEqual([
      'total_gold', 'total_xp', 'total_events', 'events_today',
      'calls_made', 'calls_connected', 'meetings_booked',
    ]);
  });

  it('counts each activity counter from its own event type', async () => {
    const { db, captured } = captureSelect([TOTALS_ROW]);

    await aggregateEventTotals(db);

    const filter = 'count(*) filter (where "events"."event_type" = $1)';
    expect(render(captured.fields['calls_made'])).toEqual({ sql: filter, params: ['call_dial'] });
    expect(render(captured.fields['calls_connected'])).toEqual({ sql: filter, params: ['call_connect'] });
    expect(render(captured.fields['meetings_booked'])).toEqual({ sql: filter, params: ['meeting_booked'] });
  });

  it('counts events_today from the start of the current day', async () => {
    const { db, captured } = captureSelect([TOTALS_ROW]);

    await aggregateEventTotals(db);

    expect(render(captured.fields['events_today'])).toEqual({
      sql: `count(*) filter (where "events"."created_at" >= date_trunc('day', now()))`,
      params: [],
    });
  });

  it('sums rewards with a zero fallback', async () => {
    const { db, captured } = captureSelect([TOTALS_ROW]);

    await aggregateEventTotals(db);

    expect(render(captured.fields['total_gold']).sql).toBe('coalesce(sum("events"."gold_value"), 0)');
    expect(render(captured.fields['total_xp']).sql).toBe('coalesce(sum("events"."xp_value"), 0)');
  });

  it('returns the aggregate row', async () => {
    const { db } = captureSelect([TOTALS_ROW]);

    expect(await aggregateEventTotals(db)).toEqual(TOTALS_ROW);
  });

  it('returns zeros when no row comes back', async () => {
    const { db } = captureSelect([]);

    expect(await aggregateEventTotals(db)).toEqual({
      total_gold: 0,
      total_xp: 0,
      total_events: 0,
      events_today: 0,
      calls_made: 0,
      calls_connected: 0,
      meetings_booked: 0,
    });
  });
});

describe('aggregateDailyTotals', () => {
  const DAY = `to_char(date_trunc('day', "events"."created_at"), 'YYYY-MM-DD')`;

  it('limits the window to the trailing calendar days, today included', async () => {
    const { db, captured } = captureSelect([]);

    await aggregateDailyTotals(db, 7);

    expect(captured.table).toBe('events');
    expect(render(captured.where)).toEqual({
      sql: `"events"."created_at" >= date_trunc('day', now()) - make_interval(days => $1)`,
      params: [6],
    });
  });

  it('groups by day, newest first', async () => {
    const { db, captured } = captureSelect([]);

    await aggregateDailyTotals(db, 1);

    expect(captured.groupBy.map((c) => render(c).sql)).toEqual([DAY]);
    expect(captured.orderBy.map((c) => render(c).sql)).toEqual([`${DAY} desc`]);
    expect(render(captured.where).params).toEqual([0]);
  });

  it('uses the same per-type counters as the totals', async () => {
    const { db, captured } = captureSelect([]);

    await aggregateDailyTotals(db, 7);

    expect(render(captured.fields['meetings_booked'])).toEqual({
      sql: 'count(*) filter (where "events"."event_type" = $1)',
      params: ['meeting_booked'],
    });
  });

  it('maps each row to a numeric day entry', async () => {
    const { db } = captureSelect([{
      date: '2026-03-02',
      total_events: '2',
      total_gold: 30,
      total_xp: 10,
      calls_made: 2,
      calls_connected: 0,
      meetings_booked: 0,
    }]);

    expect(await aggregateDailyTotals(db, 7)).toEqual([{
      date: '2026-03-02',
      total_events: 2,
      total_gold: 30,
      total_xp: 10,
      calls_made: 2,
      calls_connected: 0,
      meetings_booked: 0,
    }]);
  });
});
