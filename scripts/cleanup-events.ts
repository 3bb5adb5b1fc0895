/**
 * Event retention job.
 *
 * Usage:
 *   npx tsx scripts/cleanup-events.ts --dry-run
 *   npx tsx scripts/cleanup-events.ts --days 30
 *   npx tsx scripts/cleanup-events.ts --stats
 *
 * Audit rows are removed together with their events.
 */
import pino from 'pino';
import { createDbClient, loadStoreConfig } from '../src/infrastructure/index.js';
import { getCurrentStats, purgeExpiredEvents } from '../src/application/index.js';
import { CLEANUP_USAGE, parseCleanupArgs } from '../src/interfaces/cli/cleanup-args.js';

const config = loadStoreConfig();
const log = pino({ level: config.log_level });

async function main(): Promise<void> {
  const args = parseCleanupArgs(process.argv);

  if (args.help) {
    console.log(CLEANUP_USAGE);
    return;
  }

  const { sql, db } = createDbClient(config.database);

  try {
    if (args.stats) {
      const stats = await getCurrentStats(db);
      log.info({ stats }, 'Current stats');
      return;
    }

    const days = args.days ?? config.retention.days;
    log.info({ days, dry_run: args.dryRun }, 'Purging expired events');

    const result = await purgeExpiredEvents(db, { days, dry_run: args.dryRun });

    if (result.dry_run) {
      log.info({ cutoff: result.cutoff, matched: result.matched }, 'Dry run: nothing deleted');
    } else {
      log.info({ cutoff: result.cutoff, deleted: result.deleted }, 'Expired events deleted');
    }
  } finally {
    await sql.end();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Cleanup failed');
  process.exit(1);
});
