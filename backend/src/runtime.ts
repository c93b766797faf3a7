// backend/src/runtime.ts
import { lastBoundary } from './candleClock.js';
import type { AppConfig } from './config.js';
import { errorMessage } from './errors.js';
import { latestRsi } from './indicators.js';
import { createMailer } from './mailer.js';
import { startupText } from './messageTemplates.js';
import { Monitor } from './monitor.js';
import { EmailNotifier, FanoutNotifier, TelegramNotifier, type Notifier } from './notifier.js';
import { RequestBudget, TwelveDataClient, type CloseFetcher } from './twelvedata.js';

export type Runtime = {
  client: TwelveDataClient;
  notifier: Notifier;
  monitor: Monitor;
};

export function buildRuntime(config: Readonly<AppConfig>): Runtime {
  const client = new TwelveDataClient({
    apiKey: config.twelveData.apiKey,
    baseUrl: config.twelveData.baseUrl,
    outputSize: config.outputSize,
    budget: new RequestBudget(config.maxDailyRequests),
    timeoutMs: config.requestTimeoutMs,
  });

  const telegram = new TelegramNotifier({
    token: config.telegram.token,
    chatId: config.telegram.chatId,
    timeZone: config.sleepTimeZone,
    timeoutMs: config.requestTimeoutMs,
  });
  const notifier = config.email.enabled
    ? new FanoutNotifier([
        telegram,
        new EmailNotifier(createMailer(config.email), { recipients: config.email.recipients, timeZone: config.sleepTimeZone }),
      ])
    : new FanoutNotifier([telegram]);

  console.log('[runtime] channels', { telegram: true, email: config.email.enabled });
  const monitor = new Monitor({ config, fetcher: client, notifier });
  return { client, notifier, monitor };
}

/**
 * Fetches the first pair's closed 1h candles, computes their RSI and announces the
 * startup message. Returns false when the provider is unreachable.
 */
export async function connectionTest(
  config: Readonly<AppConfig>,
  fetcher: CloseFetcher,
  notifier: Notifier,
  now: number = Date.now(),
): Promise<boolean> {
  const pair = config.pairs[0];
  let testRsi: number | undefined;
  try {
    const boundary = lastBoundary('1h', now);
    const closes = (await fetcher.fetchCloses(pair, '1h')).filter((c) => c.closeTime <= boundary);
    testRsi = latestRsi(closes.map((c) => c.close), config.rsiPeriod);
    console.log('[runtime] data provider ok', { pair, candles: closes.length, rsi: testRsi });
  } catch (e) {
    console.error('[runtime] data provider check failed', { pair, message: errorMessage(e) });
    return false;
  }

  try {
    await notifier.announce(startupText({
      pairs: config.pairs,
      timeframes: config.timeframes,
      oversold: config.oversold,
      overbought: config.overbought,
      sleepStartHour: config.sleepStartHour,
      sleepEndHour: config.sleepEndHour,
      timeZone: config.sleepTimeZone,
      now,
      testRsi,
    }));
  } catch (e) {
    console.error('[runtime] startup message failed', { message: errorMessage(e) });
  }
  return true;
}
