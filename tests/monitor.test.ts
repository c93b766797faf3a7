import { afterEach, describe, it, expect, vi } from 'vitest';
import { timeframeMs } from '../backend/src/candleClock.js';
import { FetchError, NotifyError } from '../backend/src/errors.js';
import { Monitor, type MonitorConfig } from '../backend/src/monitor.js';
import { PAIRS, TIMEFRAMES, type AlertEvent, type CandleClose, type Pair, type Timeframe } from '../backend/src/types.js';

const HOUR = 60 * 60_000;
const at = (iso: string) => Date.parse(iso);

function makeConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    pairs: PAIRS,
    timeframes: TIMEFRAMES,
    rsiPeriod: 14,
    oversold: 30,
    overbought: 70,
    cooldownMs: 4 * HOUR,
    sleepStartHour: 2,
    sleepEndHour: 5,
    sleepTimeZone: 'UTC',
    tickIntervalMs: 60_000,
    dueToleranceMs: 3 * 60_000,
    requestSpacingMs: 0,
    ...overrides,
  };
}

/** `n` closed candles ending at `lastClose`, falling by 0.001 each (RSI 0). */
function fallingSeries(tf: Timeframe, lastClose: number, n = 20): CandleClose[] {
  const step = timeframeMs(tf);
  return Array.from({ length: n }, (_, i) => ({
    closeTime: lastClose - (n - 1 - i) * step,
    close: 1.2 - i * 0.001,
  }));
}

function makeNotifier() {
  return {
    notify: vi.fn(async (_e: AlertEvent) => {}),
    announce: vi.fn(async (_text: string) => {}),
  };
}

describe('Monitor.tick', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('a failing fetch for one key does not stop the other 55', async () => {
    const now = at('2024-12-15T08:01:00Z');
    const fetchCloses = vi.fn(async (pair: Pair, tf: Timeframe) => {
      if (pair === 'GBP/JPY' && tf === '4h') throw new FetchError('http', pair, tf, 'HTTP 500');
      return fallingSeries(tf, at('2024-12-15T08:00:00Z'));
    });
    const notifier = makeNotifier();
    const monitor = new Monitor({ config: makeConfig(), fetcher: { fetchCloses }, notifier });

    const report = await monitor.tick(now);

    expect(fetchCloses).toHaveBeenCalledTimes(56);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toMatchObject({ pair: 'GBP/JPY', timeframe: '4h' });
    expect(report.failures[0].error.kind).toBe('http');
    expect(report.evaluated).toHaveLength(55);
    expect(report.alerts).toHaveLength(55);
    expect(notifier.notify).toHaveBeenCalledTimes(55);
    expect(report.alerts.every((a) => a.zone === 'OVERSOLD' && a.rsi === 0)).toBe(true);
  });

  it('wraps unexpected fetch errors as FetchError', async () => {
    const monitor = new Monitor({
      config: makeConfig({ pairs: ['EUR/USD'], timeframes: ['1h'] }),
      fetcher: { fetchCloses: vi.fn(async () => { throw new Error('socket hang up'); }) },
      notifier: makeNotifier(),
    });
    const report = await monitor.tick(at('2024-12-15T08:01:00Z'));
    expect(report.failures[0].error).toBeInstanceOf(FetchError);
    expect(report.failures[0].error.kind).toBe('network');
  });

  it('processes each close once and leaves missed 4h closes alone', async () => {
    const fetchCloses = vi.fn(async (_pair: Pair, tf: Timeframe) => fallingSeries(tf, at('2024-12-15T08:00:00Z')));
    const monitor = new Monitor({ config: makeConfig(), fetcher: { fetchCloses }, notifier: makeNotifier() });

    await monitor.tick(at('2024-12-15T08:01:00Z'));
    expect(fetchCloses).toHaveBeenCalledTimes(56);

    const second = await monitor.tick(at('2024-12-15T08:02:00Z'));
    expect(second.evaluated).toHaveLength(0);
    expect(fetchCloses).toHaveBeenCalledTimes(56);

    await monitor.tick(at('2024-12-15T09:00:30Z'));
    expect(fetchCloses).toHaveBeenCalledTimes(84);
    expect(fetchCloses.mock.calls.slice(56).every(([, tf]) => tf === '1h')).toBe(true);
  });

  it('skips all work in the sleep window and announces the transitions', async () => {
    const fetchCloses = vi.fn(async (_pair: Pair, tf: Timeframe) => fallingSeries(tf, at('2024-12-15T05:00:00Z')));
    const notifier = makeNotifier();
    const monitor = new Monitor({ config: makeConfig(), fetcher: { fetchCloses }, notifier });

    const asleep = await monitor.tick(at('2024-12-15T04:00:30Z'));
    expect(asleep.sleeping).toBe(true);
    expect(fetchCloses).not.toHaveBeenCalled();
    expect(notifier.announce).toHaveBeenCalledTimes(1);
    expect(notifier.announce.mock.calls[0][0].split('\n')[0]).toBe('😴 Going to sleep mode');

    await monitor.tick(at('2024-12-15T04:30:00Z'));
    expect(notifier.announce).toHaveBeenCalledTimes(1);

    const awake = await monitor.tick(at('2024-12-15T05:01:00Z'));
    expect(awake.sleeping).toBe(false);
    expect(notifier.announce).toHaveBeenCalledTimes(2);
    expect(notifier.announce.mock.calls[1][0].split('\n')[0]).toBe('☀️ Awake, resuming RSI monitoring');
    // 05:00 is a 1h close only; the 04:00 4h close fell inside the window
    expect(fetchCloses).toHaveBeenCalledTimes(28);
  });

  it('sleeping keeps existing alert state', async () => {
    const fetchCloses = vi.fn(async (_pair: Pair, tf: Timeframe) => fallingSeries(tf, at('2024-12-15T01:00:00Z')));
    const monitor = new Monitor({
      config: makeConfig({ pairs: ['EUR/USD'], timeframes: ['1h'] }),
      fetcher: { fetchCloses },
      notifier: makeNotifier(),
    });
    await monitor.tick(at('2024-12-15T01:00:30Z'));
    await monitor.tick(at('2024-12-15T03:00:30Z'));
    expect(monitor.evaluator.stateOf('EUR/USD', '1h')).toEqual({
      lastAlertAt: at('2024-12-15T01:00:30Z'),
      lastZone: 'OVERSOLD',
    });
  });

  it('a failed delivery still starts the cooldown', async () => {
    const fetchCloses = vi.fn(async (_pair: Pair, tf: Timeframe) => fallingSeries(tf, at('2024-12-15T08:00:00Z')));
    const notifier = makeNotifier();
    notifier.notify.mockRejectedValue(new NotifyError(['telegram'], 'telegram HTTP 502'));
    const monitor = new Monitor({
      config: makeConfig({ pairs: ['EUR/USD'], timeframes: ['1h'] }),
      fetcher: { fetchCloses },
      notifier,
    });

    const first = await monitor.tick(at('2024-12-15T08:01:00Z'));
    expect(first.alerts).toHaveLength(1);
    expect(first.notifyFailures).toHaveLength(1);
    expect(first.notifyFailures[0].channels).toEqual(['telegram']);
    expect(monitor.evaluator.stateOf('EUR/USD', '1h')?.lastAlertAt).toBe(at('2024-12-15T08:01:00Z'));

    const second = await monitor.tick(at('2024-12-15T09:01:00Z'));
    expect(second.evaluated).toEqual([{ pair: 'EUR/USD', timeframe: '1h', rsi: 0, reason: 'COOLDOWN' }]);
    expect(second.alerts).toHaveLength(0);
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it('ignores the still-forming candle', async () => {
    const boundary = at('2024-12-15T08:00:00Z');
    const closed = fallingSeries('1h', boundary, 15);
    const forming = { closeTime: boundary + HOUR, close: 5 };
    const monitor = new Monitor({
      config: makeConfig({ pairs: ['EUR/USD'], timeframes: ['1h'] }),
      fetcher: { fetchCloses: vi.fn(async () => [...closed, forming]) },
      notifier: makeNotifier(),
    });

    const report = await monitor.tick(at('2024-12-15T08:00:20Z'));
    expect(report.alerts).toHaveLength(1);
    expect(report.alerts[0]).toMatchObject({ rsi: 0, price: closed[14].close, candleTime: boundary });
  });

  it('reports insufficient history without alerting', async () => {
    const monitor = new Monitor({
      config: makeConfig({ pairs: ['EUR/USD'], timeframes: ['1h'] }),
      fetcher: { fetchCloses: vi.fn(async () => fallingSeries('1h', at('2024-12-15T08:00:00Z'), 10)) },
      notifier: makeNotifier(),
    });
    const report = await monitor.tick(at('2024-12-15T08:01:00Z'));
    expect(report.evaluated).toEqual([{ pair: 'EUR/USD', timeframe: '1h', rsi: undefined, reason: 'NO_RSI' }]);
    expect(report.alerts).toHaveLength(0);
  });

  it('spaces out successive requests', async () => {
    const wait = vi.fn(async (_ms: number) => {});
    const monitor = new Monitor({
      config: makeConfig({ pairs: ['EUR/USD', 'GBP/USD', 'USD/JPY'], timeframes: ['1h'], requestSpacingMs: 2000 }),
      fetcher: { fetchCloses: vi.fn(async (_pair: Pair, tf: Timeframe) => fallingSeries(tf, at('2024-12-15T08:00:00Z'))) },
      notifier: makeNotifier(),
      wait,
    });
    await monitor.tick(at('2024-12-15T08:01:00Z'));
    expect(wait.mock.calls).toEqual([[2000], [2000]]);
  });
});

describe('Monitor loop', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('wakes at the tick interval or just after the next close', () => {
    const monitor = new Monitor({
      config: makeConfig(),
      fetcher: { fetchCloses: vi.fn(async () => []) },
      notifier: makeNotifier(),
    });
    expect(monitor.nextDelay(at('2024-12-15T07:30:00Z'))).toBe(60_000);
    expect(monitor.nextDelay(at('2024-12-15T07:59:30Z'))).toBe(35_000);
  });

  it('runs ticks until stopped', async () => {
    vi.useFakeTimers();
    const now = at('2024-12-15T08:01:00Z');
    const fetchCloses = vi.fn(async (_pair: Pair, tf: Timeframe) => fallingSeries(tf, at('2024-12-15T08:00:00Z')));
    const monitor = new Monitor({
      config: makeConfig({ pairs: ['EUR/USD'], timeframes: ['1h'] }),
      fetcher: { fetchCloses },
      notifier: makeNotifier(),
      now: () => now,
    });

    monitor.start();
    await vi.advanceTimersByTimeAsync(1);
    await vi.waitFor(() => expect(monitor.status().lastTickAt).toBe(now));
    expect(fetchCloses).toHaveBeenCalledTimes(1);
    expect(monitor.status()).toMatchObject({ running: true, lastTickAt: now, lastTick: { evaluated: 1, alerts: 1, failures: 0 } });

    await vi.advanceTimersByTimeAsync(60_000);
    expect(monitor.status().lastTickAt).toBe(now);
    expect(fetchCloses).toHaveBeenCalledTimes(1);

    await monitor.stop();
    expect(monitor.status().running).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('restarting while a tick is still running keeps a single loop', async () => {
    vi.useFakeTimers();
    const now = at('2024-12-15T08:01:00Z');
    let release: (closes: CandleClose[]) => void = () => {};
    const fetchCloses = vi.fn(
      (_pair: Pair, _tf: Timeframe) => new Promise<CandleClose[]>((resolve) => { release = resolve; }),
    );
    const monitor = new Monitor({
      config: makeConfig({ pairs: ['EUR/USD'], timeframes: ['1h'] }),
      fetcher: { fetchCloses },
      notifier: makeNotifier(),
      now: () => now,
    });
    const tick = vi.spyOn(monitor, 'tick');

    monitor.start();
    await vi.advanceTimersByTimeAsync(1);
    expect(fetchCloses).toHaveBeenCalledTimes(1);

    const stopping = monitor.stop();
    monitor.start();
    await vi.advanceTimersByTimeAsync(1);
    expect(tick).toHaveBeenCalledTimes(1);

    release(fallingSeries('1h', at('2024-12-15T08:00:00Z')));
    await stopping;
    await vi.waitFor(() => expect(vi.getTimerCount()).toBe(1));
    expect(tick).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(60_000);
    await vi.waitFor(() => expect(vi.getTimerCount()).toBe(1));
    expect(tick).toHaveBeenCalledTimes(3);
    expect(fetchCloses).toHaveBeenCalledTimes(1);

    await monitor.stop();
    expect(vi.getTimerCount()).toBe(0);
  });
});
