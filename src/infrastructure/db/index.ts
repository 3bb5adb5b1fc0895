export { events, rules, eventLog } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, Executor, Sql, DbClientOptions } from './client.js';
export { toStoreError } from './errors.js';
export { ensureSchema } from './bootstrap.js';
export { pingDatabase } from './health.js';
export { withAdmissionLock, hasRecentDuplicate, insertEventWithAudit } from './event-repository.js';
export type { DuplicateQuery, NewEventInput, InsertedEvent } from './event-repository.js';
export { aggregateEventTotals, aggregateDailyTotals } from './stats-repository.js';
export type { EventTotals, DailyTotals } from './stats-repository.js';
export { findAllRules, seedRules } from './rule-repository.js';
export type { RuleRow, RuleSeed } from './rule-repository.js';
export { countEventsBefore, deleteEventsBefore } from './retention-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
