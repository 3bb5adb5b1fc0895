import Fastify from 'fastify';

import {
  redisPlugin,
  dbPlugin,
  loadConfig,
  loadRuleSeeds,
  FixedWindowRateLimiter,
  StatsCache,
} from './infrastructure/index.js';

import { derivedStatsSchema, loadRuleTable } from './application/index.js';

import {
  errorHandler,
  webhookRoutes,
  statsRoutes,
  healthRoutes,
} from './interfaces/http/index.js';

const SERVICE_NAME = 'quota-quest';
const SERVICE_VERSION = '1.0.0';
const RATE_WINDOW_MS = 60_000;

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration (fails fast on invalid env or rule seed)
 * 2) Error handler + infrastructure plugins
 * 3) Rule table snapshot
 * 4) HTTP routes
 * 5) Shutdown hooks, listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const seeds = loadRuleSeeds(config.rules_file);

  const fastify = Fastify({
    logger: {
      level: config.server.log_level,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(errorHandler);
  await fastify.register(redisPlugin, { url: config.redis.url });
  await fastify.register(dbPlugin, { database: config.database });

  const rules = await loadRuleTable(fastify.db, seeds, fastify.log);

  const limiter = (scope: string, limit: number) =>
    new FixedWindowRateLimiter(fastify.redis, { scope, limit, window_ms: RATE_WINDOW_MS });

  const statsCache = new StatsCache(
    fastify.redis,
    derivedStatsSchema,
    config.stats.cache_ttl_seconds,
    fastify.log,
  );

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(webhookRoutes, {
    secret: config.webhook.secret,
    duplicate_window_seconds: config.webhook.duplicate_window_seconds,
    rules,
    limiter: limiter('webhook', config.rate_limits.webhook),
    statsCache,
  });
  await fastify.register(statsRoutes, {
    limiter: limiter('stats', config.rate_limits.stats),
    statsCache,
  });
  await fastify.register(healthRoutes, {
    name: SERVICE_NAME,
    version: SERVICE_VERSION,
    limiter: limiter('health', config.rate_limits.health),
  });

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

  fastify.log.info(
    { environment: config.environment, duplicate_window_seconds: config.webhook.duplicate_window_seconds },
    `${SERVICE_NAME} ${SERVICE_VERSION} started`,
  );
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
