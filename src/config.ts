import { ConfigError } from './errors';
import type { FracttalClientOptions } from './services/fracttalClient';
import type { ReportOptions } from './sync/reportStore';
import { CounterKind, type PersistMode } from './types';

export interface SyncSettings {
  persist: PersistMode;
  defaultKind: CounterKind | null;
  skipZeroDelta: boolean;
}

export interface AppConfig {
  fracttal: FracttalClientOptions;
  report: ReportOptions;
  sync: SyncSettings;
}

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function parseUtcOffset(value: string): number {
  const match = /^([+-])(\d{2}):(\d{2})$/.exec(value);
  if (!match) {
    throw new ConfigError(`FRACTTAL_UTC_OFFSET must look like -03:00, got "${value}"`);
  }
  const minutes = Number(match[2]) * 60 + Number(match[3]);
  return match[1] === '-' ? -minutes : minutes;
}

function parsePositiveInt(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${key} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseDefaultKind(value: string): CounterKind | null {
  switch (value.toLowerCase()) {
    case 'runtime':
      return CounterKind.RUNTIME;
    case 'distance':
      return CounterKind.DISTANCE;
    case 'none':
      return null;
    default:
      throw new ConfigError(`SYNC_DEFAULT_KIND must be runtime, distance or none, got "${value}"`);
  }
}

function parsePersist(value: string): PersistMode {
  if (value === 'each-row' || value === 'end') return value;
  throw new ConfigError(`SYNC_PERSIST must be each-row or end, got "${value}"`);
}

function parseFlag(key: string, value: string): boolean {
  if (/^(1|true|yes)$/i.test(value)) return true;
  if (/^(0|false|no)$/i.test(value)) return false;
  throw new ConfigError(`${key} must be true or false, got "${value}"`);
}

/**
 * Reads the whole configuration once. Pass `requireCredentials: false` for
 * runs that never reach the API (dry runs).
 */
export function loadConfig(env: Env = process.env, { requireCredentials = true } = {}): AppConfig {
  const apiKey = read(env, 'FRACTTAL_API_KEY');
  const apiSecret = read(env, 'FRACTTAL_API_SECRET');
  if (requireCredentials && (!apiKey || !apiSecret)) {
    throw new ConfigError('FRACTTAL_API_KEY and FRACTTAL_API_SECRET must be set');
  }

  const offset = read(env, 'FRACTTAL_UTC_OFFSET');
  const timeout = read(env, 'FRACTTAL_TIMEOUT_MS');
  const headerRow = read(env, 'REPORT_HEADER_ROW');
  const defaultKind = read(env, 'SYNC_DEFAULT_KIND');
  const persist = read(env, 'SYNC_PERSIST');
  const skipZero = read(env, 'SYNC_SKIP_ZERO');

  return {
    fracttal: {
      apiKey: apiKey ?? '',
      apiSecret: apiSecret ?? '',
      authUrl: read(env, 'FRACTTAL_AUTH_URL'),
      apiBase: read(env, 'FRACTTAL_API_BASE'),
      utcOffsetMinutes: offset === undefined ? undefined : parseUtcOffset(offset),
      timeoutMs: timeout === undefined ? undefined : parsePositiveInt('FRACTTAL_TIMEOUT_MS', timeout),
    },
    report: {
      headerRow:
        headerRow === undefined || headerRow === 'auto'
          ? 'auto'
          : parsePositiveInt('REPORT_HEADER_ROW', headerRow),
      sheetName: read(env, 'REPORT_SHEET'),
    },
    sync: {
      persist: persist === undefined ? 'each-row' : parsePersist(persist),
      defaultKind: defaultKind === undefined ? CounterKind.RUNTIME : parseDefaultKind(defaultKind),
      skipZeroDelta: skipZero === undefined ? false : parseFlag('SYNC_SKIP_ZERO', skipZero),
    },
  };
}
