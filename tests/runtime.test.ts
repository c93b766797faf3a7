import { describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../backend/src/config.js';
import { FetchError } from '../backend/src/errors.js';
import { buildRuntime, connectionTest } from '../backend/src/runtime.js';
import type { Pair, Timeframe } from '../backend/src/types.js';

const config = loadConfig({ TWELVEDATA_API_KEY: 'test-key', TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '42' });

function makeNotifier() {
  return { notify: vi.fn(async () => {}), announce: vi.fn(async (_text: string) => {}) };
}

describe('connectionTest', () => {
  it('computes a test RSI and announces startup', async () => {
    const fetchCloses = vi.fn(async (_pair: Pair, _tf: Timeframe) =>
      Array.from({ length: 20 }, (_, i) => ({ closeTime: i * 3_600_000, close: 1 + i * 0.001 })),
    );
    const notifier = makeNotifier();

    await expect(connectionTest(config, { fetchCloses }, notifier, Date.UTC(2024, 11, 15))).resolves.toBe(true);

    expect(fetchCloses).toHaveBeenCalledWith('EUR/USD', '1h');
    const text = notifier.announce.mock.calls[0][0];
    expect(text.split('\n')[0]).toBe('🚀 Forex RSI Alerts started!');
    expect(text).toContain('📊 Monitoring: 28 pairs');
    expect(text.split('\n').at(-1)).toBe('✅ Connection test: EUR/USD 1h RSI 100.00');
  });

  it('leaves the still-forming candle out of the test RSI', async () => {
    const lastClose = Date.UTC(2024, 11, 15, 8);
    const closed = Array.from({ length: 16 }, (_, i) => ({ closeTime: lastClose - (15 - i) * 3_600_000, close: 1 + i * 0.001 }));
    const forming = { closeTime: lastClose + 3_600_000, close: 0.9 };
    const notifier = makeNotifier();

    await connectionTest(config, { fetchCloses: vi.fn(async () => [...closed, forming]) }, notifier, lastClose + 60_000);

    expect(notifier.announce.mock.calls[0][0].split('\n').at(-1)).toBe('✅ Connection test: EUR/USD 1h RSI 100.00');
  });

  it('fails without announcing when the provider is unreachable', async () => {
    const notifier = makeNotifier();
    const fetcher = {
      fetchCloses: vi.fn(async (pair: Pair, tf: Timeframe) => {
        throw new FetchError('api', pair, tf, 'API error: invalid api key');
      }),
    };
    await expect(connectionTest(config, fetcher, notifier)).resolves.toBe(false);
    expect(notifier.announce).not.toHaveBeenCalled();
  });

  it('still passes when only the startup message fails', async () => {
    const notifier = makeNotifier();
    notifier.announce.mockRejectedValue(new Error('telegram down'));
    const fetcher = { fetchCloses: vi.fn(async () => []) };
    await expect(connectionTest(config, fetcher, notifier)).resolves.toBe(true);
  });
});

describe('buildRuntime', () => {
  it('wires the client budget and monitor from config', () => {
    const rt = buildRuntime(config);
    expect(rt.client.budget.maxPerDay).toBe(780);
    expect(rt.monitor.status()).toMatchObject({ running: false, pairs: 28, timeframes: ['1h', '4h'] });
  });
});
