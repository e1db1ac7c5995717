import { getStatus } from './reportStore';
import { STATUS_OK, type ReportRow } from '../types';

/** True only for the exact "OK" marker; any other status means the row is still pending. */
export function shouldSkip(row: ReportRow): boolean {
  return getStatus(row) === STATUS_OK;
}
