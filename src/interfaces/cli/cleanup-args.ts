export interface CleanupArgs {
  /** Retention in days; falls back to RETENTION_DAYS when absent. */
  days?: number | undefined;
  dryRun: boolean;
  /** Print current stats instead of purging. */
  stats: boolean;
  help: boolean;
}

export const CLEANUP_USAGE = `Usage: cleanup-events [--days N] [--dry-run] [--stats]

  --days N     Delete events older than N days (default: RETENTION_DAYS)
  --dry-run    Count matching events without deleting them
  --stats      Print current stats and exit
  --help       Show this message`;

/**
 * Parses `process.argv`. Throws on unknown flags or a bad `--days`.
 */
export function parseCleanupArgs(argv: readonly string[]): CleanupArgs {
  const args: CleanupArgs = { dryRun: false, stats: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    switch (a) {
      case '--days': {
        const v = argv[i + 1];
        if (v === undefined) throw new Error('Missing value for --days');
        const n = Number(v);
        if (!Number.isInteger(n) || n < 1) {
          throw new Error('--days must be a positive integer');
        }
        args.days = n;
        i++;
        break;
      }
      case '--dry-run':
        args.dryRun = true;
        break;
      case '--stats':
        args.stats = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${a}`);
    }
  }

  return args;
}
