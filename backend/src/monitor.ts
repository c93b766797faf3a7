// backend/src/monitor.ts
import { CandleClock, lastBoundary, msUntilNextBoundary } from './candleClock.js';
import type { AppConfig } from './config.js';
import { FetchError, NotifyError, errorMessage } from './errors.js';
import { latestRsi } from './indicators.js';
import { sleepText, wakeText } from './messageTemplates.js';
import type { Notifier } from './notifier.js';
import { SignalEvaluator, type EvaluationReason } from './signalEvaluator.js';
import { inWindow, nextWakeAt } from './sleepWindow.js';
import type { CloseFetcher } from './twelvedata.js';
import { stateKey, type AlertEvent, type AlertState, type CandleClose, type Pair, type Timeframe } from './types.js';

export type MonitorConfig = Pick<
  AppConfig,
  | 'pairs' | 'timeframes' | 'rsiPeriod' | 'oversold' | 'overbought' | 'cooldownMs'
  | 'sleepStartHour' | 'sleepEndHour' | 'sleepTimeZone'
  | 'tickIntervalMs' | 'dueToleranceMs' | 'requestSpacingMs'
>;

export type MonitorDeps = {
  config: Readonly<MonitorConfig>;
  fetcher: CloseFetcher;
  notifier: Notifier;
  clock?: CandleClock;
  evaluator?: SignalEvaluator;
  wait?: (ms: number) => Promise<void>;
  now?: () => number;
};

export type KeyEvaluation = { pair: Pair; timeframe: Timeframe; rsi: number | undefined; reason: EvaluationReason };
export type KeyFailure = { pair: Pair; timeframe: Timeframe; error: FetchError };

export type TickReport = {
  at: number;
  sleeping: boolean;
  evaluated: KeyEvaluation[];
  alerts: AlertEvent[];
  failures: KeyFailure[];
  notifyFailures: NotifyError[];
};

export type MonitorStatus = {
  running: boolean;
  sleeping: boolean;
  lastTickAt: number | null;
  lastTick: { evaluated: number; alerts: number; failures: number } | null;
  pairs: number;
  timeframes: readonly Timeframe[];
  alertStates: Record<string, AlertState>;
};

// the provider publishes a closed bar a few seconds after the boundary
const SETTLE_MS = 5_000;

const defaultWait = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Single sequential loop: each tick checks quiet hours, then fetches,
 * evaluates and notifies every (pair, timeframe) whose candle just closed.
 */
export class Monitor {
  readonly clock: CandleClock;
  readonly evaluator: SignalEvaluator;
  private readonly cfg: Readonly<MonitorConfig>;
  private readonly fetcher: CloseFetcher;
  private readonly notifier: Notifier;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => number;

  private sleeping = false;
  private lastReport: TickReport | null = null;
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;
  private active = false;
  // bumped by start(); a tick from an earlier run must not reschedule
  private generation = 0;

  constructor(deps: MonitorDeps) {
    this.cfg = deps.config;
    this.fetcher = deps.fetcher;
    this.notifier = deps.notifier;
    this.clock = deps.clock ?? new CandleClock();
    this.evaluator = deps.evaluator ?? new SignalEvaluator({
      oversold: deps.config.oversold,
      overbought: deps.config.overbought,
      cooldownMs: deps.config.cooldownMs,
    });
    this.wait = deps.wait ?? defaultWait;
    this.now = deps.now ?? Date.now;
  }

  async tick(now: number = this.now()): Promise<TickReport> {
    const report: TickReport = { at: now, sleeping: false, evaluated: [], alerts: [], failures: [], notifyFailures: [] };
    const cfg = this.cfg;

    const sleeping = inWindow(now, cfg.sleepStartHour, cfg.sleepEndHour, cfg.sleepTimeZone);
    if (sleeping !== this.sleeping) {
      this.sleeping = sleeping;
      await this.announceTransition(sleeping, now, report);
    }
    report.sleeping = sleeping;
    if (sleeping) {
      this.lastReport = report;
      return report;
    }

    let fetched = 0;
    for (const timeframe of cfg.timeframes) {
      for (const pair of cfg.pairs) {
        if (!this.clock.isDueNow(stateKey(pair, timeframe), timeframe, now, cfg.dueToleranceMs)) continue;
        if (fetched > 0 && cfg.requestSpacingMs > 0) await this.wait(cfg.requestSpacingMs);
        fetched++;
        await this.processKey(pair, timeframe, now, report);
      }
    }

    if (fetched > 0) {
      console.log('[monitor] tick', {
        at: new Date(now).toISOString(),
        evaluated: report.evaluated.length,
        alerts: report.alerts.length,
        failures: report.failures.length,
      });
    }
    this.lastReport = report;
    return report;
  }

  private async processKey(pair: Pair, timeframe: Timeframe, now: number, report: TickReport) {
    let closes: CandleClose[];
    try {
      closes = await this.fetcher.fetchCloses(pair, timeframe);
    } catch (e) {
      const error = e instanceof FetchError ? e : new FetchError('network', pair, timeframe, errorMessage(e), { cause: e });
      report.failures.push({ pair, timeframe, error });
      console.warn('[monitor] fetch failed', { pair, timeframe, kind: error.kind, message: error.message });
      return;
    }

    // drop the bar still forming after the boundary being processed
    const boundary = lastBoundary(timeframe, now);
    const settled = closes.filter((c) => c.closeTime <= boundary);
    const rsi = latestRsi(settled.map((c) => c.close), this.cfg.rsiPeriod);
    const last = settled[settled.length - 1];
    if (rsi === undefined || !last) {
      report.evaluated.push({ pair, timeframe, rsi: undefined, reason: 'NO_RSI' });
      console.warn('[monitor] insufficient history', { pair, timeframe, candles: settled.length });
      return;
    }

    const result = this.evaluator.evaluate({ pair, timeframe, rsi, price: last.close, now, candleTime: last.closeTime });
    report.evaluated.push({ pair, timeframe, rsi, reason: result.reason });
    if (!result.fired) {
      if (result.reason === 'COOLDOWN') console.log('[monitor] suppressed by cooldown', { pair, timeframe, rsi, zone: result.zone });
      return;
    }

    report.alerts.push(result.event);
    console.log('[monitor] alert', { pair, timeframe, rsi, zone: result.zone, price: last.close });
    // cooldown is already set: a failed delivery still counts as fired
    try {
      await this.notifier.notify(result.event);
    } catch (e) {
      const error = e instanceof NotifyError ? e : new NotifyError(['unknown'], errorMessage(e), { cause: e });
      report.notifyFailures.push(error);
      console.error('[notify] alert delivery failed', { pair, timeframe, channels: error.channels, message: error.message });
    }
  }

  private async announceTransition(sleeping: boolean, now: number, report: TickReport) {
    const cfg = this.cfg;
    const text = sleeping
      ? sleepText(now, nextWakeAt(now, cfg.sleepEndHour, cfg.sleepTimeZone), cfg.sleepTimeZone)
      : wakeText(now, cfg.sleepTimeZone, cfg.pairs.length, cfg.timeframes);
    console.log(sleeping ? '[monitor] entering sleep window' : '[monitor] leaving sleep window', {
      start: cfg.sleepStartHour,
      end: cfg.sleepEndHour,
      tz: cfg.sleepTimeZone,
    });
    try {
      await this.notifier.announce(text);
    } catch (e) {
      const error = e instanceof NotifyError ? e : new NotifyError(['unknown'], errorMessage(e), { cause: e });
      report.notifyFailures.push(error);
      console.error('[notify] announce failed', { channels: error.channels, message: error.message });
    }
  }

  /** Delay until the next tick: the tick interval, or sooner if a candle closes first. */
  nextDelay(now: number): number {
    const untilClose = msUntilNextBoundary(this.cfg.timeframes, now) + SETTLE_MS;
    return Math.max(0, Math.min(this.cfg.tickIntervalMs, untilClose));
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.generation++;
    console.log('[monitor] started', {
      pairs: this.cfg.pairs.length,
      timeframes: this.cfg.timeframes,
      tickIntervalMs: this.cfg.tickIntervalMs,
    });
    this.schedule(0);
  }

  /** Cancels the pending tick and waits for one already running. */
  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    await this.inFlight;
    console.log('[monitor] stopped');
  }

  private schedule(delay: number) {
    const gen = this.generation;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.runOnce(gen);
    }, delay);
  }

  private async runOnce(gen: number) {
    const previous = this.inFlight;
    // a restart can schedule while the old run's tick is still going
    if (previous) await previous;
    try {
      await this.tick(this.now());
    } catch (e) {
      console.error('[monitor] tick failed', e);
    } finally {
      if (this.active && gen === this.generation) this.schedule(this.nextDelay(this.now()));
    }
  }

  status(): MonitorStatus {
    const r = this.lastReport;
    return {
      running: this.active,
      sleeping: this.sleeping,
      lastTickAt: r ? r.at : null,
      lastTick: r ? { evaluated: r.evaluated.length, alerts: r.alerts.length, failures: r.failures.length } : null,
      pairs: this.cfg.pairs.length,
      timeframes: this.cfg.timeframes,
      alertStates: this.evaluator.snapshot(),
    };
  }
}
