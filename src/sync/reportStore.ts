import { readFile, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as XLSX from 'xlsx';
import { FileFormatError, PersistenceError, SchemaError, describeError } from '../errors';
import type { CellValue, ReportRow, ReportSchema } from '../types';

export const DEFAULT_SCHEMA: ReportSchema = {
  assetId: 'Interno',
  category: 'Categoría',
  distance: 'Km',
  runtime: 'Tiempo de marcha',
  status: 'Estado',
};

// How far down "auto" looks for the header row. Provider exports carry a title block above it.
const HEADER_SCAN_ROWS = 20;

export interface ReportOptions {
  schema?: Partial<ReportSchema>;
  /** 1-based worksheet row holding the headers, or 'auto' to look for the asset column. */
  headerRow?: number | 'auto';
  sheetName?: string;
}

export interface ReportColumns {
  assetId: number;
  category: number;
  distance: number | null;
  runtime: number | null;
  status: number;
}

export interface Report {
  workbook: XLSX.WorkBook;
  sheetName: string;
  headerRow: number;
  schema: ReportSchema;
  columns: ReportColumns;
  rows: ReportRow[];
  bookType: XLSX.BookType;
  /** Set for CSV sources, which are written back as text. */
  csv?: CsvLayout;
  path?: string;
}

export interface CsvLayout {
  bom: boolean;
  rowSeparator: '\n' | '\r\n';
}

export function bookTypeFor(fileName: string | undefined): XLSX.BookType {
  switch (extname(fileName ?? '').toLowerCase()) {
    case '.xls':
      return 'biff8';
    case '.xlsm':
      return 'xlsm';
    case '.csv':
      return 'csv';
    default:
      return 'xlsx';
  }
}

export async function loadReport(path: string, options: ReportOptions = {}): Promise<Report> {
  let buffer: Buffer;
  try {
    buffer = await readFile(path);
  } catch (err) {
    throw new FileFormatError(`Could not read ${path}: ${describeError(err)}`, { cause: err });
  }

  const report = readReport(buffer, { ...options, fileName: path });
  report.path = path;
  return report;
}

export function readReport(buffer: Buffer, options: ReportOptions & { fileName?: string } = {}): Report {
  const bookType = bookTypeFor(options.fileName);
  if (bookType === 'csv') return readCsvReport(buffer, options);

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', cellNF: true });
  } catch (err) {
    throw new FileFormatError(`Not a readable workbook: ${describeError(err)}`, { cause: err });
  }
  return fromWorkbook(workbook, options, bookType);
}

// CSV cells stay text ("1,5", "05/03/2025", "0012") so they are written back as they came.
function readCsvReport(buffer: Buffer, options: ReportOptions): Report {
  let text = buffer.toString('utf8');
  const bom = text.charCodeAt(0) === 0xfeff;
  if (bom) text = text.slice(1);

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(text, { type: 'string', raw: true });
  } catch (err) {
    throw new FileFormatError(`Not a readable CSV file: ${describeError(err)}`, { cause: err });
  }

  const report = fromWorkbook(workbook, options, 'csv');
  report.csv = { bom, rowSeparator: text.includes('\r\n') ? '\r\n' : '\n' };
  return report;
}

/**
 * Builds the typed view of a workbook. The status column is appended to the
 * header row when missing; nothing is written until the report is saved.
 */
export function fromWorkbook(
  workbook: XLSX.WorkBook,
  options: ReportOptions = {},
  bookType: XLSX.BookType = 'xlsx'
): Report {
  const schema: ReportSchema = { ...DEFAULT_SCHEMA, ...options.schema };
  const sheetName = options.sheetName ?? workbook.SheetNames[0];
  if (!sheetName) {
    throw new FileFormatError('Workbook has no worksheets');
  }
  const sheet: XLSX.WorkSheet | undefined = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new FileFormatError(`Worksheet "${sheetName}" not found`);
  }

  const ref = sheet['!ref'];
  if (typeof ref !== 'string') {
    throw new SchemaError(`Worksheet "${sheetName}" is empty`);
  }
  const range = XLSX.utils.decode_range(ref);

  const headerIndex = resolveHeaderRow(sheet, range, schema, options.headerRow ?? 'auto');
  const headers = new Map<string, number>();
  for (let c = range.s.c; c <= range.e.c; c++) {
    const label = cellText(getCell(sheet, headerIndex, c)).trim();
    if (label && !headers.has(label)) headers.set(label, c);
  }

  const assetId = headers.get(schema.assetId);
  const category = headers.get(schema.category);
  const distance = headers.get(schema.distance) ?? null;
  const runtime = headers.get(schema.runtime) ?? null;
  if (assetId === undefined) {
    throw new SchemaError(`Missing required column "${schema.assetId}"`);
  }
  if (category === undefined) {
    throw new SchemaError(`Missing required column "${schema.category}"`);
  }
  if (distance === null && runtime === null) {
    throw new SchemaError(`Missing counter columns "${schema.distance}" and "${schema.runtime}"`);
  }

  let status = headers.get(schema.status);
  if (status === undefined) {
    status = range.e.c + 1;
    sheet[XLSX.utils.encode_cell({ r: headerIndex, c: status })] = { t: 's', v: schema.status };
    range.e.c = status;
    sheet['!ref'] = XLSX.utils.encode_range(range);
  }

  const columns: ReportColumns = { assetId, category, distance, runtime, status };
  const rows: ReportRow[] = [];

  for (let r = headerIndex + 1; r <= range.e.r; r++) {
    const row: ReportRow = {
      index: rows.length,
      sheetRow: r + 1,
      assetId: cellText(getCell(sheet, r, assetId)).trim(),
      category: cellText(getCell(sheet, r, category)).trim(),
      distance: distance === null ? null : cellValue(getCell(sheet, r, distance)),
      runtime: runtime === null ? null : runtimeValue(getCell(sheet, r, runtime)),
      status: cellText(getCell(sheet, r, status)) || null,
    };

    const blank =
      !row.assetId && !row.category && row.distance === null && row.runtime === null && row.status === null;
    if (!blank) rows.push(row);
  }

  return { workbook, sheetName, headerRow: headerIndex + 1, schema, columns, rows, bookType };
}

export function getStatus(row: ReportRow): string | null {
  return row.status;
}

export function setStatus(report: Report, row: ReportRow, value: string): void {
  row.status = value;
  const sheet = report.workbook.Sheets[report.sheetName];
  sheet[XLSX.utils.encode_cell({ r: row.sheetRow - 1, c: report.columns.status })] = { t: 's', v: value };
}

export function writeReport(report: Report): Buffer {
  if (report.csv) {
    const text = XLSX.utils.sheet_to_csv(report.workbook.Sheets[report.sheetName], { RS: report.csv.rowSeparator });
    return Buffer.from(report.csv.bom ? `\ufeff${text}` : text, 'utf8');
  }

  try {
    const output: Buffer = XLSX.write(report.workbook, {
      type: 'buffer',
      bookType: report.bookType,
      sheet: report.sheetName,
    });
    return output;
  } catch (err) {
    throw new PersistenceError(`Could not serialize the report: ${describeError(err)}`, { cause: err });
  }
}

export async function saveReport(report: Report, path: string | undefined = report.path): Promise<void> {
  if (!path) {
    throw new PersistenceError('Report was not loaded from a file and no path was given');
  }

  const output = writeReport(report);
  try {
    await writeFile(path, output);
  } catch (err) {
    throw new PersistenceError(`Could not write ${path}: ${describeError(err)}`, { cause: err });
  }
}

function resolveHeaderRow(
  sheet: XLSX.WorkSheet,
  range: XLSX.Range,
  schema: ReportSchema,
  headerRow: number | 'auto'
): number {
  if (headerRow !== 'auto') {
    if (!Number.isInteger(headerRow) || headerRow < 1) {
      throw new SchemaError(`Invalid header row ${headerRow}`);
    }
    return headerRow - 1;
  }

  const last = Math.min(range.e.r, range.s.r + HEADER_SCAN_ROWS - 1);
  for (let r = range.s.r; r <= last; r++) {
    for (let c = range.s.c; c <= range.e.c; c++) {
      if (cellText(getCell(sheet, r, c)).trim() === schema.assetId) return r;
    }
  }
  if (range.s.c === range.e.c) {
    // A single column with no header at all is text, not an exported report.
    throw new FileFormatError('File does not look like a report workbook');
  }
  throw new SchemaError(`Column "${schema.assetId}" not found in the first ${HEADER_SCAN_ROWS} rows`);
}

function getCell(sheet: XLSX.WorkSheet, r: number, c: number): XLSX.CellObject | undefined {
  return sheet[XLSX.utils.encode_cell({ r, c })];
}

function cellText(cell: XLSX.CellObject | undefined): string {
  const value = cell?.v;
  if (value === undefined || value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function cellValue(cell: XLSX.CellObject | undefined): CellValue {
  const value = cell?.v;
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' && value.trim() === '') return null;
  return value;
}

function isTimeFormat(format: XLSX.NumberFormat | undefined): boolean {
  return typeof format === 'string' && /h+\]?:m/i.test(format);
}

// Run time exported as an Excel time is a fraction of a day; hand it on as H:MM.
function runtimeValue(cell: XLSX.CellObject | undefined): CellValue {
  if (cell?.t === 'n' && typeof cell.v === 'number' && isTimeFormat(cell.z)) {
    const minutes = Math.round(cell.v * 24 * 60);
    return `${Math.floor(minutes / 60)}:${String(minutes % 60).padStart(2, '0')}`;
  }
  return cellValue(cell);
}
