import { classify, COUNTER_UNITS, extractDelta, formatAmount } from './classifier';
import { shouldSkip } from './duplicateGuard';
import { setStatus, type Report } from './reportStore';
import { ClassificationError, InvalidValueError, describeError } from '../errors';
import {
  OutcomeKind,
  STATUS_OK,
  type CounterKind,
  type CounterUpdateClient,
  type ReportRow,
  type SubmissionOutcome,
  type SubmitResult,
} from '../types';

export interface RowProcessorOptions {
  client: CounterUpdateClient;
  defaultKind?: CounterKind | null;
  /** Skip rows whose delta is 0 instead of submitting an unchanged reading. */
  skipZeroDelta?: boolean;
  /** Classify and validate only; nothing is submitted or marked. */
  dryRun?: boolean;
}

export const ALREADY_PROCESSED = 'already processed';

const skipped = (reason: string): SubmissionOutcome => ({ kind: OutcomeKind.SKIPPED, reason });
const failed = (reason: string): SubmissionOutcome => ({ kind: OutcomeKind.FAILED, reason });

function resolveDelta(row: ReportRow, defaultKind: CounterKind | null | undefined) {
  const kind = classify(row, defaultKind);
  return { kind, delta: extractDelta(row, kind) };
}

/**
 * Applies one row: at most one call to the client, and the row is marked
 * "OK" only after the client confirms the update.
 */
export async function processRow(
  report: Report,
  row: ReportRow,
  options: RowProcessorOptions
): Promise<SubmissionOutcome> {
  if (!row.assetId) return skipped('missing asset identifier');
  if (shouldSkip(row)) return skipped(ALREADY_PROCESSED);

  let counter: { kind: CounterKind; delta: number };
  try {
    counter = resolveDelta(row, options.defaultKind);
  } catch (err) {
    if (err instanceof ClassificationError || err instanceof InvalidValueError) {
      return failed(err.message);
    }
    throw err;
  }

  const { kind, delta } = counter;
  if (delta === 0 && options.skipZeroDelta) return skipped('zero value');
  if (options.dryRun) return skipped(`dry run: +${formatAmount(delta)} ${COUNTER_UNITS[kind]}`);

  let result: SubmitResult;
  try {
    result = await options.client.submit(row.assetId, kind, delta);
  } catch (err) {
    return failed(describeError(err));
  }

  if (!result.ok) return failed(result.reason);

  setStatus(report, row, STATUS_OK);
  return { kind: OutcomeKind.SUCCESS, message: result.message };
}
