// backend/src/candleClock.ts
import type { Timeframe } from './types.js';

const HOUR_MS = 60 * 60_000;

const TIMEFRAME_MS: Record<Timeframe, number> = {
  '1h': HOUR_MS,
  '4h': 4 * HOUR_MS,
};

export function timeframeMs(tf: Timeframe): number {
  return TIMEFRAME_MS[tf];
}

/**
 * Most recent close at or before `now`. Boundaries are multiples of the
 * timeframe since the epoch: :00 every hour for 1h, 00/04/08/12/16/20 UTC for 4h.
 */
export function lastBoundary(tf: Timeframe, now: number): number {
  const step = TIMEFRAME_MS[tf];
  return Math.floor(now / step) * step;
}

/** First close strictly after `now`. */
export function nextBoundary(tf: Timeframe, now: number): number {
  return lastBoundary(tf, now) + TIMEFRAME_MS[tf];
}

export function msUntilNextBoundary(timeframes: readonly Timeframe[], now: number): number {
  let soonest = Infinity;
  for (const tf of timeframes) soonest = Math.min(soonest, nextBoundary(tf, now) - now);
  return soonest;
}

/**
 * Remembers the last boundary handed out per key so each candle close is
 * processed at most once. Missed boundaries are never backfilled.
 */
export class CandleClock {
  private readonly processed = new Map<string, number>();

  /** True (and claims the boundary) when `now` is within `toleranceMs` after an unprocessed close. */
  isDueNow(key: string, tf: Timeframe, now: number, toleranceMs: number): boolean {
    const boundary = lastBoundary(tf, now);
    if (now - boundary > toleranceMs) return false;
    const prev = this.processed.get(key);
    if (prev !== undefined && prev >= boundary) return false;
    this.processed.set(key, boundary);
    return true;
  }

  lastProcessed(key: string): number | undefined {
    return this.processed.get(key);
  }
}
