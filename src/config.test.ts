import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { ConfigError } from './errors';
import { CounterKind } from './types';

const CREDENTIALS = { FRACTTAL_API_KEY: 'test-key', FRACTTAL_API_SECRET: 'test-secret' };

describe('loadConfig', () => {
  it('fills defaults around the credentials', () => {
    expect(loadConfig(CREDENTIALS)).toEqual({
      fracttal: {
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        authUrl: undefined,
        apiBase: undefined,
        utcOffsetMinutes: undefined,
        timeoutMs: undefined,
      },
      report: { headerRow: 'auto', sheetName: undefined },
      sync: { persist: 'each-row', defaultKind: CounterKind.RUNTIME, skipZeroDelta: false },
    });
  });

  it('reads every override', () => {
    const config = loadConfig({
      ...CREDENTIALS,
      FRACTTAL_API_BASE: 'https://sandbox.example.test',
      FRACTTAL_UTC_OFFSET: '+05:30',
      FRACTTAL_TIMEOUT_MS: '5000',
      REPORT_HEADER_ROW: '9',
      REPORT_SHEET: 'Actividad',
      SYNC_PERSIST: 'end',
      SYNC_DEFAULT_KIND: 'none',
      SYNC_SKIP_ZERO: 'true',
    });

    expect(config.fracttal.apiBase).toBe('https://sandbox.example.test');
    expect(config.fracttal.utcOffsetMinutes).toBe(330);
    expect(config.fracttal.timeoutMs).toBe(5000);
    expect(config.report).toEqual({ headerRow: 9, sheetName: 'Actividad' });
    expect(config.sync).toEqual({ persist: 'end', defaultKind: null, skipZeroDelta: true });
  });

  it('requires credentials unless told otherwise', () => {
    expect(() => loadConfig({ FRACTTAL_API_KEY: 'test-key' })).toThrow(ConfigError);
    expect(loadConfig({}, { requireCredentials: false }).fracttal.apiKey).toBe('');
  });

  it.each([
    ['FRACTTAL_UTC_OFFSET', '-3'],
    ['FRACTTAL_TIMEOUT_MS', '0'],
    ['REPORT_HEADER_ROW', 'first'],
    ['SYNC_PERSIST', 'never'],
    ['SYNC_DEFAULT_KIND', 'hours'],
    ['SYNC_SKIP_ZERO', 'maybe'],
  ])('rejects %s=%s', (key, value) => {
    expect(() => loadConfig({ ...CREDENTIALS, [key]: value })).toThrow(ConfigError);
  });
});
