import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient } from './client.js';
import type { Database, DbClientOptions } from './client.js';
import { ensureSchema } from './bootstrap.js';

export interface DbPluginOptions {
  database: DbClientOptions;
}

/**
 * Fastify plugin that manages the Drizzle/postgres.js pool lifecycle.
 *
 * Creates the tables if needed, decorates `fastify.db` for routes and
 * closes the pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(opts.database);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });

  await ensureSchema(sql);
  fastify.log.info({ pool_max: opts.database.pool_max, timezone: opts.database.timezone }, 'Database ready');

  fastify.decorate('db', db);
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.db` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
  }
}
