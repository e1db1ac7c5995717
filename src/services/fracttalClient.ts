import { AuthenticationError, SubmissionError, describeError } from '../errors';
import { COUNTER_UNITS, formatAmount } from '../sync/classifier';
import type { AuthenticatedClient, CounterKind, SubmitResult } from '../types';

export const FRACTTAL_AUTH_URL = 'https://one.fracttal.com/oauth/token';
export const FRACTTAL_API_BASE = 'https://app.fracttal.com';

const DEFAULT_TIMEOUT_MS = 25000;
const DEFAULT_UTC_OFFSET_MINUTES = -180;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface FracttalClientOptions {
  apiKey: string;
  apiSecret: string;
  authUrl?: string;
  apiBase?: string;
  /** Offset written on reading dates, in minutes east of UTC. */
  utcOffsetMinutes?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  now?: () => Date;
}

export interface MeterReading {
  date?: Date;
  isHistorical?: boolean;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `YYYY-MM-DDTHH:mm:ss±HH:MM` in the given offset, the format meter readings are dated with. */
export function formatReadingDate(date: Date, utcOffsetMinutes: number): string {
  const local = new Date(date.getTime() + utcOffsetMinutes * 60_000);
  const sign = utcOffsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(utcOffsetMinutes);
  const hours = String(Math.floor(abs / 60)).padStart(2, '0');
  const minutes = String(abs % 60).padStart(2, '0');
  return `${local.toISOString().slice(0, 19)}${sign}${hours}:${minutes}`;
}

/**
 * Fracttal meters API. Readings are accumulated values, so a delta is applied
 * by reading the current value first and writing current + delta.
 */
export class FracttalClient implements AuthenticatedClient {
  private token: string | null = null;
  private readonly authUrl: string;
  private readonly apiBase: string;
  private readonly utcOffsetMinutes: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(private readonly options: FracttalClientOptions) {
    this.authUrl = options.authUrl ?? FRACTTAL_AUTH_URL;
    this.apiBase = (options.apiBase ?? FRACTTAL_API_BASE).replace(/\/+$/, '');
    this.utcOffsetMinutes = options.utcOffsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? (() => new Date());
  }

  get authenticated(): boolean {
    return this.token !== null;
  }

  async authenticate(): Promise<void> {
    const credentials = Buffer.from(`${this.options.apiKey}:${this.options.apiSecret}`).toString('base64');

    let res: Response;
    try {
      res = await this.request(this.authUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: `Basic ${credentials}`,
        },
        body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
      });
    } catch (err) {
      throw new AuthenticationError(`Authentication request failed: ${describeError(err)}`, { cause: err });
    }

    if (!res.ok) {
      throw new AuthenticationError(`Authentication failed with HTTP ${res.status}`);
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (err) {
      throw new AuthenticationError(`Authentication response is not JSON: ${describeError(err)}`, { cause: err });
    }
    if (!isObject(data) || typeof data.access_token !== 'string' || !data.access_token) {
      throw new AuthenticationError('Authentication response has no access_token');
    }
    this.token = data.access_token;
  }

  /** Current accumulated value of the asset's meter, or null when no meter matches. */
  async getMeterValue(serial: string): Promise<number | null> {
    const res = await this.request(`${this.apiBase}/api/meters?serial=${encodeURIComponent(serial)}`, {
      method: 'GET',
      headers: this.headers(),
    });
    if (!res.ok) {
      throw new SubmissionError(`HTTP ${res.status} reading meter: ${await res.text()}`);
    }

    const data: unknown = await res.json();
    const meters = isObject(data) ? data.data : undefined;
    if (!Array.isArray(meters) || meters.length === 0) return null;

    const meter: unknown = meters[0];
    const lastData = isObject(meter) ? meter.last_data : undefined;
    const value = isObject(lastData) ? lastData.accumulated_value : undefined;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
    return null;
  }

  async updateMeter(serial: string, value: number, reading: MeterReading = {}): Promise<void> {
    const payload = {
      date: formatReadingDate(reading.date ?? this.now(), this.utcOffsetMinutes),
      value,
      serial,
      is_historical: reading.isHistorical ?? false,
    };

    const res = await this.request(`${this.apiBase}/api/meter_reading?code=${encodeURIComponent(serial)}`, {
      method: 'PUT',
      headers: this.headers(),
      body: JSON.stringify(payload),
    });

    if (res.status !== 200) {
      throw new SubmissionError(`HTTP ${res.status}: ${await res.text()}`);
    }

    const data: unknown = await res.json();
    if (!isObject(data) || !data.success) {
      throw new SubmissionError(`Fracttal rejected the reading: ${JSON.stringify(data)}`);
    }
  }

  async submit(assetId: string, kind: CounterKind, delta: number): Promise<SubmitResult> {
    if (!this.token) {
      return { ok: false, reason: 'not authenticated' };
    }

    try {
      const previous = await this.getMeterValue(assetId);
      if (previous === null) {
        return { ok: false, reason: 'asset not found' };
      }

      const next = Math.round((previous + delta) * 1000) / 1000;
      await this.updateMeter(assetId, next);

      const unit = COUNTER_UNITS[kind];
      return {
        ok: true,
        previous,
        next,
        message: `${formatAmount(previous)} + ${formatAmount(delta)} = ${formatAmount(next)} ${unit}`,
      };
    } catch (err) {
      return { ok: false, reason: describeError(err) };
    }
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token ?? ''}`,
      'Content-Type': 'application/json',
    };
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.fetchImpl(url, { ...init, signal: controller.signal });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new SubmissionError(`Request timed out after ${this.timeoutMs} ms`, { cause: err });
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }
  }
}
