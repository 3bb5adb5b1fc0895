export { ingestPayloadSchema } from './event-schema.js';
export type { IngestPayload } from './event-schema.js';
export { RuleTable, loadRuleTable } from './rule-table.js';
export type { RewardRule } from './rule-table.js';
export { admitEvent } from './ingest-event.js';
export type { AdmitEventInput, AdmitEventOptions, AdmissionResult } from './ingest-event.js';
export { getCurrentStats, deriveStats, derivedStatsSchema } from './current-stats.js';
export type { DerivedStats } from './current-stats.js';
export { getDailyStats, resolveDays, MIN_DAYS, MAX_DAYS } from './daily-stats.js';
export type { DailyStatsResult } from './daily-stats.js';
export { purgeExpiredEvents, retentionCutoff } from './retention.js';
export type { PurgeOptions, PurgeResult } from './retention.js';
