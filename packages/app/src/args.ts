/**
 * Command-line argument parsing for boxoffice-enrich
 */

export const USAGE = `Usage: boxoffice-enrich [options]

Ranks movies by cumulative box-office revenue, enriches the top titles with
OMDb metadata and loads both staging tables into the warehouse.

Options:
  --dry-run       Rank and enrich, but skip the warehouse load
  --top=N         Number of top-grossing titles to enrich (default 800)
  --verbose, -v   Debug logging
  --help, -h      Show this help
  --version       Print the version

Environment:
  OMDB_API_KEY        OMDb API key (required)
  REVENUES_CSV_PATH   Revenue file (default data/raw/revenues_per_day.csv)
  OMDB_CACHE_PATH     Lookup cache (default data/cache/omdb_cache.json)
  WAREHOUSE_URL       sqlite:path or postgresql://... (default sqlite:data/warehouse.db)
  LOG_LEVEL, LOG_FORMAT, LOG_FILE, TOP_N_MOVIES, OMDB_DAILY_LIMIT,
  OMDB_RETRY_ATTEMPTS, OMDB_RETRY_DELAY_MS, OMDB_TIMEOUT_MS, PROGRESS_INTERVAL
`;

export interface RunFlags {
  dryRun: boolean;
  verbose: boolean;
  topN?: number;
}

export type ParsedArgs =
  | { command: 'run'; flags: RunFlags }
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'invalid'; message: string };

/**
 * Parses argv (without the node and script entries). `--help` and
 * `--version` win over everything else.
 *
 * @example
 * ```typescript
 * parseArgs(['--dry-run', '--top=100']);
 * // { command: 'run', flags: { dryRun: true, verbose: false, topN: 100 } }
 * ```
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  if (args.includes('--help') || args.includes('-h')) {
    return { command: 'help' };
  }
  if (args.includes('--version')) {
    return { command: 'version' };
  }

  const flags: RunFlags = { dryRun: false, verbose: false };

  for (const arg of args) {
    if (arg === '--dry-run') {
      flags.dryRun = true;
    } else if (arg === '--verbose' || arg === '-v') {
      flags.verbose = true;
    } else if (arg.startsWith('--top=')) {
      const value = arg.slice('--top='.length);
      if (!/^\d+$/.test(value) || Number(value) < 1) {
        return { command: 'invalid', message: `--top expects a positive integer, got "${value}"` };
      }
      flags.topN = Number(value);
    } else {
      return { command: 'invalid', message: `Unknown option: ${arg}` };
    }
  }

  return { command: 'run', flags };
}
