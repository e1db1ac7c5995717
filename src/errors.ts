export class MeterSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends MeterSyncError {}

/** The report could not be read or parsed as a workbook. */
export class FileFormatError extends MeterSyncError {}

/** The report lacks a column the sync needs. */
export class SchemaError extends MeterSyncError {}

export class ClassificationError extends MeterSyncError {}

export class InvalidValueError extends MeterSyncError {}

export class AuthenticationError extends MeterSyncError {}

/** Fracttal refused or never answered a meter request. */
export class SubmissionError extends MeterSyncError {}

export class PersistenceError extends MeterSyncError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
