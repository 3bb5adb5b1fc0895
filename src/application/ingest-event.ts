import {
  withAdmissionLock,
  hasRecentDuplicate,
  insertEventWithAudit,
  toStoreError,
} from '../infrastructure/db/index.js';
import type { Executor } from '../infrastructure/db/index.js';
import { admissionKey, hashMetadata } from '../domain/index.js';
import type { EventMetadata, EventSource, Reward, SalesEventType } from '../domain/index.js';
import type { RuleTable } from './rule-table.js';

export interface AdmitEventInput {
  source: EventSource;
  event_type: SalesEventType;
  metadata: EventMetadata;
}

export interface AdmitEventOptions {
  duplicate_window_seconds: number;
}

export type AdmissionResult =
  | { readonly duplicate: false; readonly event_id: string; readonly reward: Reward; readonly created_at: Date }
  | { readonly duplicate: true };

/**
 * Use case: admit one inbound event exactly once.
 *
 * 1. Resolve the reward rule (fails before any store access).
 * 2. In one transaction holding the admission lock for
 *    (source, event_type, metadata): check the duplicate window, then
 *    write the event and its audit entry.
 *
 * A duplicate is a successful outcome, not an error. Store failures
 * have been rolled back when they surface as `StoreError`.
 */
export async function admitEvent(
  db: Executor,
  rules: RuleTable,
  input: AdmitEventInput,
  options: AdmitEventOptions,
): Promise<AdmissionResult> {
  const reward = rules.resolve(input.event_type);
  const metadataHash = hashMetadata(input.metadata);
  const key = admissionKey(input.source, input.event_type, metadataHash);

  try {
    return await withAdmissionLock(db, key, async (tx): Promise<AdmissionResult> => {
      const duplicate = await hasRecentDuplicate(tx, {
        source: input.source,
        event_type: input.event_type,
        metadata_hash: metadataHash,
        window_seconds: options.duplicate_window_seconds,
      });

      if (duplicate) {
        return { duplicate: true };
      }

      const inserted = await insertEventWithAudit(tx, {
        source: input.source,
        event_type: input.event_type,
        gold_value: reward.gold,
        xp_value: reward.xp,
        metadata: input.metadata,
        metadata_hash: metadataHash,
      });

      return { duplicate: false, event_id: inserted.id, reward, created_at: inserted.created_at };
    });
  } catch (err: unknown) {
    throw toStoreError(err);
  }
}
