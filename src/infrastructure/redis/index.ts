export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { StatsCache } from './stats-cache.js';
export type { CacheStore } from './stats-cache.js';
export { FixedWindowRateLimiter } from './rate-limiter.js';
export type { CounterStore, RateLimitPolicy, RateLimitDecision } from './rate-limiter.js';
