export { redisPlugin, StatsCache, FixedWindowRateLimiter } from './redis/index.js';
export type { CacheStore, CounterStore, RateLimitPolicy, RateLimitDecision } from './redis/index.js';
export { createDbClient, dbPlugin, ensureSchema, seedRules, findAllRules, toStoreError } from './db/index.js';
export type { Database, Executor, RuleRow, RuleSeed } from './db/index.js';
export { loadConfig, loadStoreConfig, loadRuleSeeds } from './config/index.js';
export type { AppConfig, StoreConfig } from './config/index.js';
