import { aggregateDailyTotals, toStoreError } from '../infrastructure/db/index.js';
import type { DailyTotals, Executor } from '../infrastructure/db/index.js';

export const DEFAULT_DAYS = 7;
export const MIN_DAYS = 1;
export const MAX_DAYS = 90;

export interface DailyStatsResult {
  days: number;
  stats: DailyTotals[];
}

/**
 * Validates the `days` parameter.
 * Returns the default when absent, `null` when not an integer in range.
 */
export function resolveDays(raw: number | undefined): number | null {
  if (raw === undefined) return DEFAULT_DAYS;
  if (!Number.isFinite(raw) || raw !== Math.floor(raw)) return null;
  if (raw < MIN_DAYS || raw > MAX_DAYS) return null;
  return raw;
}

/**
 * Use case: per-day activity for the trailing `days` calendar days,
 * newest first.
 */
export async function getDailyStats(db: Executor, days: number): Promise<DailyStatsResult> {
  try {
    const stats = await aggregateDailyTotals(db, days);
    return { days, stats };
  } catch (err: unknown) {
    throw toStoreError(err);
  }
}
