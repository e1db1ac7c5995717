import { ClassificationError, InvalidValueError } from '../errors';
import { CounterKind, type CellValue, type ReportRow } from '../types';

// Whole words of the normalized category; plurals in -s/-es match too.
const FLEET_TERMS = [
  'flota',
  'camion',
  'camioneta',
  'vehiculo',
  'auto',
  'automovil',
  'utilitario',
  'furgon',
  'pickup',
  'moto',
  'motocicleta',
];

const MACHINERY_TERMS = [
  'maquinaria',
  'excavadora',
  'retroexcavadora',
  'cargadora',
  'motoniveladora',
  'topadora',
  'autoelevador',
  'grua',
  'generador',
  'compresor',
  'motobomba',
  'tractor',
];

export const COUNTER_UNITS: Record<CounterKind, string> = {
  [CounterKind.DISTANCE]: 'km',
  [CounterKind.RUNTIME]: 'h',
};

/**
 * Kind used for blank or unknown categories. Most rows that miss the fleet
 * vocabulary are machines, which report engine hours.
 */
export const DEFAULT_COUNTER_KIND = CounterKind.RUNTIME;

export function normalizeCategory(category: string): string {
  return category
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .toLowerCase();
}

function mentions(words: string[], terms: string[]): boolean {
  return words.some((word) => terms.some((term) => word === term || word === `${term}s` || word === `${term}es`));
}

/**
 * A fleet word makes the row a distance counter ("Camión grúa" is still a
 * truck); anything else is run time.
 *
 * @param defaultKind kind for categories outside both vocabularies; `null`
 * makes them a ClassificationError. Omitted means {@link DEFAULT_COUNTER_KIND}.
 */
export function classify(row: ReportRow, defaultKind?: CounterKind | null): CounterKind {
  const text = normalizeCategory(row.category);
  const words = text.split(/[^a-z0-9]+/).filter(Boolean);

  if (mentions(words, FLEET_TERMS)) return CounterKind.DISTANCE;
  if (mentions(words, MACHINERY_TERMS)) return CounterKind.RUNTIME;

  const fallback = defaultKind === undefined ? DEFAULT_COUNTER_KIND : defaultKind;
  if (fallback === null) {
    throw new ClassificationError(
      text ? `Unrecognized category "${row.category}"` : 'Missing category'
    );
  }
  return fallback;
}

export function extractDelta(row: ReportRow, kind: CounterKind): number {
  const label = kind === CounterKind.DISTANCE ? 'distance' : 'runtime';
  const raw = kind === CounterKind.DISTANCE ? row.distance : row.runtime;

  const value = kind === CounterKind.RUNTIME ? parseDuration(raw) : parseNumber(raw);
  if (value === null) {
    throw new InvalidValueError(
      raw === null ? `invalid value: missing ${label}` : `invalid value: ${label} "${String(raw)}" is not a number`
    );
  }
  if (value < 0) {
    throw new InvalidValueError(`invalid value: ${label} ${value} is negative`);
  }
  return value;
}

export function formatAmount(value: number): string {
  return value.toFixed(1);
}

function parseNumber(raw: CellValue): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw !== 'string') return null;

  const text = raw.trim().replace(/,/g, '.');
  if (!/^-?\d+(\.\d+)?$/.test(text)) return null;
  return Number(text);
}

// "8:30" and "8:30:15" are hours of running time; bare numbers are already hours.
function parseDuration(raw: CellValue): number | null {
  if (typeof raw === 'string') {
    const match = /^(\d+):(\d{1,2})(?::(\d{1,2}))?$/.exec(raw.trim());
    if (match) {
      const hours = Number(match[1]);
      const minutes = Number(match[2]);
      const seconds = match[3] === undefined ? 0 : Number(match[3]);
      return hours + minutes / 60 + seconds / 3600;
    }
  }
  return parseNumber(raw);
}
