/**
 * Core domain types for the sales activity event model.
 *
 * These types define the canonical shape of an event as it flows
 * through the system. They carry no framework dependencies.
 */

/** Integrations allowed to report activity. */
export const EVENT_SOURCES = ['outreach', 'nooks', 'manual', 'zapier'] as const;
export type EventSource = (typeof EVENT_SOURCES)[number];

/** Activity kinds that can earn a reward. */
export const EVENT_TYPES = [
  'call_dial',
  'call_connect',
  'meeting_booked',
  'meeting_attended',
  'email_sent',
] as const;
export type SalesEventType = (typeof EVENT_TYPES)[number];

/** Opaque key/value document supplied by the integration. */
export type EventMetadata = Record<string, unknown>;

/** Reward pair copied onto an event when it is admitted. */
export interface Reward {
  readonly gold: number;
  readonly xp: number;
}

/**
 * Canonical persisted event.
 *
 * `gold_value` / `xp_value` are the rule values at admission time;
 * later rule edits never rewrite them.
 */
export interface SalesEvent {
  readonly id: string;
  readonly source: EventSource;
  readonly event_type: SalesEventType;
  readonly gold_value: number;
  readonly xp_value: number;
  readonly metadata: EventMetadata;
  readonly metadata_hash: string;
  readonly created_at: Date;
}
