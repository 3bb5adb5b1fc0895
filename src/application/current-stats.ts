import { z } from 'zod';
import { aggregateEventTotals, toStoreError } from '../infrastructure/db/index.js';
import type { Executor, EventTotals } from '../infrastructure/db/index.js';
import { RANK_LADDER, deriveLevel, rankForMeetings } from '../domain/index.js';

const count = z.number().int().min(0);

/** Shape of `GET /stats/current`; also validates cached snapshots. */
export const derivedStatsSchema = z.object({
  total_gold: count,
  total_xp: count,
  total_events: count,
  events_today: count,
  calls_made: count,
  calls_connected: count,
  meetings_booked: count,
  current_level: z.number().int().min(1),
  xp_in_current_level: count,
  xp_to_next_level: count,
  rank: z.enum(RANK_LADDER),
});

export type DerivedStats = z.infer<typeof derivedStatsSchema>;

/**
 * Pure derivation of level progression and rank from raw totals.
 * Field order is fixed so equal inputs serialize identically.
 */
export function deriveStats(totals: EventTotals): DerivedStats {
  const level = deriveLevel(totals.total_xp);

  return {
    total_gold: totals.total_gold,
    total_xp: totals.total_xp,
    total_events: totals.total_events,
    events_today: totals.events_today,
    calls_made: totals.calls_made,
    calls_connected: totals.calls_connected,
    meetings_booked: totals.meetings_booked,
    current_level: level.current_level,
    xp_in_current_level: level.xp_in_current_level,
    xp_to_next_level: level.xp_to_next_level,
    rank: rankForMeetings(totals.meetings_booked),
  };
}

/**
 * Use case: current session stats, recomputed from the full event log
 * on every call. No state is kept between calls.
 */
export async function getCurrentStats(db: Executor): Promise<DerivedStats> {
  let totals: EventTotals;
  try {
    totals = await aggregateEventTotals(db);
  } catch (err: unknown) {
    throw toStoreError(err);
  }
  return deriveStats(totals);
}
