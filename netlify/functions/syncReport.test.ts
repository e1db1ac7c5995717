import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { syncReport, type SyncReportDeps } from './syncReport';
import { loadConfig } from '../../src/config';
import { AuthenticationError, ConfigError } from '../../src/errors';
import { FakeCounterClient, HEADERS, sheetRows, workbookBuffer } from '../../src/test/workbooks';

const config = loadConfig({ FRACTTAL_API_KEY: 'test-key', FRACTTAL_API_SECRET: 'test-secret' });

function deps(client = new FakeCounterClient()): SyncReportDeps {
  return { getConfig: () => config, createClient: () => client };
}

function post(payload: unknown) {
  return { httpMethod: 'POST', body: JSON.stringify(payload) };
}

const REPORT = workbookBuffer([
  HEADERS,
  ['T-100', 'Camión', 120, null, 'Ana'],
  ['M-9', 'Excavadora', null, 3, 'Luis'],
]).toString('base64');

describe('syncReport function', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('only accepts POST', async () => {
    const res = await syncReport({ httpMethod: 'GET', body: null }, deps());
    expect(res.statusCode).toBe(405);
  });

  it('requires the file and its name', async () => {
    const res = await syncReport(post({ fileName: 'reporte.xlsx' }), deps());
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body ?? '')).toEqual({ error: 'Missing fileName or base64File' });
  });

  it('rejects a workbook without the report columns', async () => {
    const base64File = workbookBuffer([['Interno', 'Categoría'], ['T-1', 'Camión']]).toString('base64');

    const res = await syncReport(post({ fileName: 'reporte.xlsx', base64File }), deps());

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body ?? '')).toEqual({ error: 'Missing counter columns "Km" and "Tiempo de marcha"' });
  });

  it('answers 500 when the server has no credentials', async () => {
    const res = await syncReport(post({ fileName: 'reporte.xlsx', base64File: REPORT }), {
      getConfig: () => {
        throw new ConfigError('FRACTTAL_API_KEY and FRACTTAL_API_SECRET must be set');
      },
      createClient: () => new FakeCounterClient(),
    });

    expect(res.statusCode).toBe(500);
  });

  it('answers 502 when Fracttal refuses the credentials', async () => {
    const client = new FakeCounterClient();
    client.authenticate = async () => {
      throw new AuthenticationError('Authentication failed with HTTP 401');
    };

    const res = await syncReport(post({ fileName: 'reporte.xlsx', base64File: REPORT }), deps(client));

    expect(res.statusCode).toBe(502);
    expect(client.calls).toEqual([]);
  });

  it('returns the summary and the workbook with its status column filled in', async () => {
    const client = new FakeCounterClient({ 'M-9': 'asset not found' });

    const res = await syncReport(
      post({ fileName: 'reporte.xlsx', base64File: `data:application/octet-stream;base64,${REPORT}` }),
      deps(client)
    );

    expect(res.statusCode).toBe(200);
    const body = JSON.parse(res.body ?? '');
    expect(body.fileName).toBe('reporte.xlsx');
    expect(body.summary).toMatchObject({ succeeded: 1, failed: 1, skipped: 0, persistenceFailed: false });
    expect(sheetRows(Buffer.from(body.base64File, 'base64'))).toEqual([
      [...HEADERS, 'Estado'],
      ['T-100', 'Camión', 120, null, 'Ana', 'OK'],
      ['M-9', 'Excavadora', null, 3, 'Luis', null],
    ]);
  });
});
