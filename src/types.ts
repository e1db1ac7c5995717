export enum CounterKind {
  DISTANCE = 'DISTANCE',
  RUNTIME = 'RUNTIME'
}

export enum OutcomeKind {
  SUCCESS = 'SUCCESS',
  FAILED = 'FAILED',
  SKIPPED = 'SKIPPED'
}

/** Status value that marks a row as already applied. */
export const STATUS_OK = 'OK';

export type CellValue = string | number | boolean | null;

export type PersistMode = 'each-row' | 'end';

/** Column headers of the activity report, keyed by the field they hold. */
export interface ReportSchema {
  assetId: string;
  category: string;
  distance: string;
  runtime: string;
  status: string;
}

export interface ReportRow {
  index: number;
  sheetRow: number;
  assetId: string;
  category: string;
  distance: CellValue;
  runtime: CellValue;
  status: string | null;
}

export type SubmissionOutcome =
  | { kind: OutcomeKind.SUCCESS; message: string }
  | { kind: OutcomeKind.FAILED; reason: string }
  | { kind: OutcomeKind.SKIPPED; reason: string };

export interface RowLogEntry {
  sheetRow: number;
  assetId: string;
  category: string;
  outcome: OutcomeKind;
  message: string;
}

export interface RunSummary {
  succeeded: number;
  failed: number;
  skipped: number;
  /** Skipped rows that were already marked OK before this run. */
  alreadyProcessed: number;
  entries: RowLogEntry[];
  cancelled: boolean;
  persistenceFailed: boolean;
  persistenceError?: string;
}

export type SubmitResult =
  | { ok: true; message: string; previous: number; next: number }
  | { ok: false; reason: string };

export interface CounterUpdateClient {
  submit(assetId: string, kind: CounterKind, delta: number): Promise<SubmitResult>;
}

export interface AuthenticatedClient extends CounterUpdateClient {
  authenticate(): Promise<void>;
}
