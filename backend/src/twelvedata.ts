// backend/src/twelvedata.ts
import fetch, { type Response } from 'node-fetch';
import { timeframeMs } from './candleClock.js';
import { FetchError, errorMessage, isAbort } from './errors.js';
import type { CandleClose, Pair, Timeframe } from './types.js';

export interface CloseFetcher {
  /** Closes ordered oldest → newest. Rejects with FetchError. */
  fetchCloses(pair: Pair, timeframe: Timeframe): Promise<CandleClose[]>;
}

/** Daily request allowance of the provider's plan; resets on UTC date change. */
export class RequestBudget {
  private day = '';
  private used = 0;

  constructor(readonly maxPerDay: number) {}

  tryConsume(now: number = Date.now()): boolean {
    this.roll(now);
    if (this.used >= this.maxPerDay) return false;
    this.used++;
    return true;
  }

  usage(now: number = Date.now()): { day: string; used: number; max: number } {
    this.roll(now);
    return { day: this.day, used: this.used, max: this.maxPerDay };
  }

  private roll(now: number) {
    const day = new Date(now).toISOString().slice(0, 10);
    if (day !== this.day) {
      if (this.day) console.log('[twelvedata] daily request counter reset', { day, usedYesterday: this.used });
      this.day = day;
      this.used = 0;
    }
  }
}

type RawValue = { datetime: string; close: string };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

const DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?$/;

/** "YYYY-MM-DD HH:mm:ss" read as UTC (requests ask for timezone=UTC). */
export function parseUtcDatetime(s: string): number | undefined {
  const m = DATETIME_RE.exec(s.trim());
  if (!m) return undefined;
  const [, y, mo, d, h, mi, sec] = m;
  return Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(sec ?? 0));
}

/**
 * Maps a time_series body to closes. Values arrive newest-first and are
 * stamped with the candle's open time; close time = open + timeframe.
 */
export function parseTimeSeries(body: unknown, pair: Pair, timeframe: Timeframe): CandleClose[] {
  if (!isRecord(body)) throw new FetchError('parse', pair, timeframe, 'response is not an object');

  if (body.status === 'error' || (typeof body.code === 'number' && body.code !== 200)) {
    const msg = typeof body.message === 'string' ? body.message : 'unknown error';
    throw new FetchError('api', pair, timeframe, `API error: ${msg}`);
  }

  const values = body.values;
  if (!Array.isArray(values)) throw new FetchError('parse', pair, timeframe, 'response has no values');

  const rows: RawValue[] = values.map((v: unknown, i) => {
    if (!isRecord(v) || typeof v.datetime !== 'string' || typeof v.close !== 'string') {
      throw new FetchError('parse', pair, timeframe, `malformed value at #${i}`);
    }
    return { datetime: v.datetime, close: v.close };
  });

  const step = timeframeMs(timeframe);
  return rows.reverse().map((r) => {
    const open = parseUtcDatetime(r.datetime);
    const close = parseFloat(r.close);
    if (open === undefined || !Number.isFinite(close)) {
      throw new FetchError('parse', pair, timeframe, `bad candle ${r.datetime} / ${r.close}`);
    }
    return { closeTime: open + step, close };
  });
}

export type TwelveDataOptions = {
  apiKey: string;
  baseUrl?: string;
  outputSize?: number;
  budget?: RequestBudget;
  timeoutMs?: number;
};

export class TwelveDataClient implements CloseFetcher {
  private readonly baseUrl: string;
  private readonly outputSize: number;
  private readonly timeoutMs: number;
  readonly budget: RequestBudget;

  constructor(private readonly opts: TwelveDataOptions) {
    this.baseUrl = opts.baseUrl || 'https://api.twelvedata.com';
    this.outputSize = opts.outputSize ?? 50;
    this.timeoutMs = opts.timeoutMs ?? 15_000;
    this.budget = opts.budget ?? new RequestBudget(780);
  }

  async fetchCloses(pair: Pair, timeframe: Timeframe): Promise<CandleClose[]> {
    if (!this.budget.tryConsume()) {
      throw new FetchError('quota', pair, timeframe, `daily limit of ${this.budget.maxPerDay} requests reached`);
    }

    const params = new URLSearchParams({
      symbol: pair,
      interval: timeframe,
      outputsize: String(this.outputSize),
      timezone: 'UTC',
      apikey: this.opts.apiKey,
    });

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/time_series?${params}`, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (e) {
      if (isAbort(e)) throw new FetchError('timeout', pair, timeframe, `no response after ${this.timeoutMs}ms`, { cause: e });
      throw new FetchError('network', pair, timeframe, errorMessage(e), { cause: e });
    }
    const { used, max } = this.budget.usage();
    console.log('[twelvedata] request', { pair, timeframe, status: res.status, used, max });
    if (!res.ok) throw new FetchError('http', pair, timeframe, `HTTP ${res.status}`);

    let body: unknown;
    try {
      body = await res.json();
    } catch (e) {
      throw new FetchError('parse', pair, timeframe, `invalid JSON: ${errorMessage(e)}`, { cause: e });
    }
    return parseTimeSeries(body, pair, timeframe);
  }
}
