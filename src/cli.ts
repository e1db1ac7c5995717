import { loadConfig, type AppConfig } from './config';
import { MeterSyncError, describeError } from './errors';
import { FracttalClient } from './services/fracttalClient';
import { runBatch } from './sync/batchRunner';
import { loadReport } from './sync/reportStore';
import { OutcomeKind, type AuthenticatedClient, type PersistMode, type RowLogEntry, type RunSummary } from './types';

const USAGE = 'Usage: meter-sync <report.xlsx> [--persist=each-row|end] [--dry-run]';

const OUTCOME_ICONS: Record<OutcomeKind, string> = {
  [OutcomeKind.SUCCESS]: '✓',
  [OutcomeKind.FAILED]: '✗',
  [OutcomeKind.SKIPPED]: '⏭',
};

export interface CliIo {
  log: (line: string) => void;
  error: (line: string) => void;
}

export interface CliDeps {
  env?: Record<string, string | undefined>;
  io?: CliIo;
  createClient?: (config: AppConfig) => AuthenticatedClient;
  signal?: AbortSignal;
}

interface CliArgs {
  file: string;
  persist?: PersistMode;
  dryRun: boolean;
}

function parseArgs(argv: string[]): CliArgs | string {
  let file: string | undefined;
  let persist: PersistMode | undefined;
  let dryRun = false;

  for (const arg of argv) {
    if (arg === '--dry-run') {
      dryRun = true;
    } else if (arg.startsWith('--persist=')) {
      const value = arg.slice('--persist='.length);
      if (value !== 'each-row' && value !== 'end') return `Unknown persist mode "${value}"`;
      persist = value;
    } else if (arg.startsWith('--')) {
      return `Unknown option ${arg}`;
    } else if (file === undefined) {
      file = arg;
    } else {
      return 'Only one report file can be given';
    }
  }

  if (!file) return 'Missing report file';
  return { file, persist, dryRun };
}

export function formatEntry(entry: RowLogEntry): string {
  const label = entry.assetId || `row ${entry.sheetRow}`;
  const category = entry.category ? ` (${entry.category})` : '';
  return `${OUTCOME_ICONS[entry.outcome]} ${label}${category}: ${entry.message}`;
}

export function formatSummary(summary: RunSummary): string {
  const done = `Done: ${summary.succeeded} updated, ${summary.failed} failed, ${summary.skipped} skipped`;
  return summary.alreadyProcessed > 0 ? `${done} (${summary.alreadyProcessed} already processed)` : done;
}

/** Runs one sync and returns the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io: CliIo = deps.io ?? { log: (line) => console.log(line), error: (line) => console.error(line) };

  const args = parseArgs(argv);
  if (typeof args === 'string') {
    io.error(args);
    io.error(USAGE);
    return 2;
  }

  try {
    const config = loadConfig(deps.env ?? process.env, { requireCredentials: !args.dryRun });
    const client = (deps.createClient ?? ((c: AppConfig) => new FracttalClient(c.fracttal)))(config);

    const report = await loadReport(args.file, config.report);
    io.log(`${report.rows.length} rows found in ${args.file}`);

    if (!args.dryRun) {
      await client.authenticate();
      io.log('Authenticated with Fracttal');
    }

    const summary = await runBatch(report, {
      client,
      defaultKind: config.sync.defaultKind,
      skipZeroDelta: config.sync.skipZeroDelta,
      dryRun: args.dryRun,
      persist: args.persist ?? config.sync.persist,
      save: args.dryRun ? async () => {} : undefined,
      signal: deps.signal,
      onEntry: (entry) => io.log(formatEntry(entry)),
    });

    io.log(formatSummary(summary));
    if (summary.cancelled) {
      io.error('Run cancelled before the last row');
    }
    if (summary.persistenceFailed) {
      io.error(`Report NOT saved (${summary.persistenceError ?? 'unknown error'}).`);
      io.error('Rows updated in this run are not marked OK on disk and would be submitted again on the next run.');
      return 1;
    }
    return 0;
  } catch (err) {
    if (err instanceof MeterSyncError) {
      io.error(`${err.name}: ${err.message}`);
      return 1;
    }
    io.error(`Unexpected error: ${describeError(err)}`);
    return 1;
  }
}
