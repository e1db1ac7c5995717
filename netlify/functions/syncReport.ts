import type { Handler, HandlerEvent, HandlerResponse } from '@netlify/functions';
import { createFracttalClient, getConfig } from './_fracttal';
import type { AppConfig } from '../../src/config';
import { AuthenticationError, ConfigError, FileFormatError, SchemaError } from '../../src/errors';
import { runBatch } from '../../src/sync/batchRunner';
import { readReport, writeReport, type Report } from '../../src/sync/reportStore';
import type { AuthenticatedClient } from '../../src/types';

export interface SyncReportDeps {
  getConfig: () => AppConfig;
  createClient: (config: AppConfig) => AuthenticatedClient;
}

const json = (statusCode: number, payload: unknown): HandlerResponse => ({
  statusCode,
  headers: { 'Content-Type': 'application/json' },
  body: JSON.stringify(payload),
});

export async function syncReport(
  event: Pick<HandlerEvent, 'httpMethod' | 'body'>,
  deps: SyncReportDeps
): Promise<HandlerResponse> {
  if (event.httpMethod !== 'POST') {
    return { statusCode: 405, body: 'Method Not Allowed' };
  }

  let body: unknown;
  try {
    body = JSON.parse(event.body || '{}');
  } catch {
    return json(400, { error: 'Body is not valid JSON' });
  }

  const fileName = typeof body === 'object' && body !== null && 'fileName' in body ? body.fileName : undefined;
  const base64File = typeof body === 'object' && body !== null && 'base64File' in body ? body.base64File : undefined;
  if (typeof fileName !== 'string' || typeof base64File !== 'string' || !fileName || !base64File) {
    return json(400, { error: 'Missing fileName or base64File' });
  }

  let config: AppConfig;
  try {
    config = deps.getConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error('syncReport config error:', err.message);
      return json(500, { error: 'Server is not configured' });
    }
    throw err;
  }

  // Accept data URLs as well as bare base64
  const buffer = Buffer.from(base64File.replace(/^data:[^;]+;base64,/, ''), 'base64');

  let report: Report;
  try {
    report = readReport(buffer, { ...config.report, fileName });
  } catch (err) {
    if (err instanceof FileFormatError || err instanceof SchemaError) {
      return json(400, { error: err.message });
    }
    throw err;
  }

  const client = deps.createClient(config);
  try {
    await client.authenticate();
  } catch (err) {
    if (err instanceof AuthenticationError) {
      console.error('Fracttal authentication failed:', err.message);
      return json(502, { error: 'Authentication with Fracttal failed' });
    }
    throw err;
  }

  // The updated workbook goes back in the response instead of to disk.
  const written: { buffer?: Buffer } = {};
  const summary = await runBatch(report, {
    client,
    defaultKind: config.sync.defaultKind,
    skipZeroDelta: config.sync.skipZeroDelta,
    persist: 'end',
    save: async (target) => {
      written.buffer = writeReport(target);
    },
  });

  console.log(`syncReport ${fileName}: ${summary.succeeded} updated, ${summary.failed} failed, ${summary.skipped} skipped`);

  if (!written.buffer) {
    return json(500, { error: 'Could not serialize the updated report', summary });
  }

  return json(200, {
    summary,
    fileName,
    base64File: written.buffer.toString('base64'),
  });
}

export const handler: Handler = async (event) => {
  try {
    return await syncReport(event, {
      getConfig,
      createClient: createFracttalClient,
    });
  } catch (err) {
    console.error('syncReport error:', err);
    return json(500, { error: 'Failed to sync report' });
  }
};
