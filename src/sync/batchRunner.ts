import { ALREADY_PROCESSED, processRow, type RowProcessorOptions } from './rowProcessor';
import { saveReport, type Report } from './reportStore';
import { describeError } from '../errors';
import { OutcomeKind, type PersistMode, type ReportRow, type RowLogEntry, type RunSummary, type SubmissionOutcome } from '../types';

export interface BatchOptions extends RowProcessorOptions {
  /** 'each-row' saves after every confirmed row; 'end' saves once after the last row. */
  persist?: PersistMode;
  save?: (report: Report) => Promise<void>;
  /** Checked between rows. Rows already marked stay marked. */
  signal?: AbortSignal;
  onEntry?: (entry: RowLogEntry) => void;
}

function toLogEntry(row: ReportRow, outcome: SubmissionOutcome): RowLogEntry {
  return {
    sheetRow: row.sheetRow,
    assetId: row.assetId,
    category: row.category,
    outcome: outcome.kind,
    message: outcome.kind === OutcomeKind.SUCCESS ? outcome.message : outcome.reason,
  };
}

/**
 * Processes the report's rows one at a time, in sheet order, yielding one
 * entry per row. Saving is left to the consumer; see {@link runBatch}.
 */
export async function* processRows(
  report: Report,
  options: RowProcessorOptions & { signal?: AbortSignal }
): AsyncGenerator<RowLogEntry> {
  for (const row of report.rows) {
    if (options.signal?.aborted) return;
    const outcome = await processRow(report, row, options);
    yield toLogEntry(row, outcome);
  }
}

export async function runBatch(report: Report, options: BatchOptions): Promise<RunSummary> {
  const persist = options.persist ?? 'each-row';
  const save = options.save ?? ((target: Report) => saveReport(target));

  const summary: RunSummary = {
    succeeded: 0,
    failed: 0,
    skipped: 0,
    alreadyProcessed: 0,
    entries: [],
    cancelled: false,
    persistenceFailed: false,
  };
  let unsaved = false;

  for await (const entry of processRows(report, options)) {
    summary.entries.push(entry);
    options.onEntry?.(entry);

    switch (entry.outcome) {
      case OutcomeKind.SUCCESS:
        summary.succeeded++;
        unsaved = true;
        break;
      case OutcomeKind.FAILED:
        summary.failed++;
        break;
      case OutcomeKind.SKIPPED:
        summary.skipped++;
        if (entry.message === ALREADY_PROCESSED) summary.alreadyProcessed++;
        break;
    }

    if (persist === 'each-row' && entry.outcome === OutcomeKind.SUCCESS) {
      try {
        await save(report);
        unsaved = false;
      } catch (err) {
        // Retried with the final save below.
        console.warn(`Could not save status for row ${entry.sheetRow}:`, describeError(err));
      }
    }
  }

  summary.cancelled = summary.entries.length < report.rows.length;

  if (persist === 'end' || unsaved) {
    try {
      await save(report);
    } catch (err) {
      console.error('Failed to save report:', err);
      summary.persistenceFailed = true;
      summary.persistenceError = describeError(err);
    }
  }

  return summary;
}
