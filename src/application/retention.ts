import { countEventsBefore, deleteEventsBefore, toStoreError } from '../infrastructure/db/index.js';
import type { Executor } from '../infrastructure/db/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PurgeOptions {
  days: number;
  dry_run: boolean;
  now?: Date;
}

export interface PurgeResult {
  cutoff: string;
  dry_run: boolean;
  /** Events older than the cutoff when the job ran. */
  matched: number;
  deleted: number;
}

export function retentionCutoff(days: number, now: Date): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

/**
 * Use case: remove events older than `days` (audit rows cascade).
 * In dry-run mode only counts what would go.
 */
export async function purgeExpiredEvents(db: Executor, options: PurgeOptions): Promise<PurgeResult> {
  const cutoff = retentionCutoff(options.days, options.now ?? new Date());

  try {
    if (options.dry_run) {
      const matched = await countEventsBefore(db, cutoff);
      return { cutoff: cutoff.toISOString(), dry_run: true, matched, deleted: 0 };
    }

    const deleted = await deleteEventsBefore(db, cutoff);
    return { cutoff: cutoff.toISOString(), dry_run: false, matched: deleted, deleted };
  } catch (err: unknown) {
    throw toStoreError(err);
  }
}
