import type { AlertEvent, Pair, Timeframe } from './types.js';

const displayFormatters = new Map<string, Intl.DateTimeFormat>();

/** dd/mm/yyyy HH:MM in the given zone. */
export function fmtLocal(ms: number, timeZone: string): string {
  let f = displayFormatters.get(timeZone);
  if (!f) {
    f = new Intl.DateTimeFormat('en-GB', {
      timeZone, day: '2-digit', month: '2-digit', year: 'numeric', hour: '2-digit', minute: '2-digit', hourCycle: 'h23',
    });
    displayFormatters.set(timeZone, f);
  }
  return f.format(new Date(ms)).replace(',', '');
}

export function fmtPrice(v: number, pair: Pair): string {
  if (!Number.isFinite(v)) return '-';
  // JPY crosses quote to 3 decimals, everything else to 5
  return pair.endsWith('/JPY') ? v.toFixed(3) : v.toFixed(5);
}

export function fmtRsi(v: number): string {
  return v.toFixed(2);
}

function zoneHeadline(e: AlertEvent) {
  return e.zone === 'OVERSOLD'
    ? { emoji: '📈', signal: '🟢 OVERSOLD SIGNAL', action: 'Potential BUY opportunity' }
    : { emoji: '📉', signal: '🔴 OVERBOUGHT SIGNAL', action: 'Potential SELL opportunity' };
}

export function alertSubject(e: AlertEvent): string {
  const tag = e.zone === 'OVERSOLD' ? 'Oversold' : 'Overbought';
  return `${tag} - ${e.pair} ${e.timeframe} RSI ${fmtRsi(e.rsi)} @ ${fmtPrice(e.price, e.pair)}`;
}

export function alertText(e: AlertEvent, timeZone: string): string {
  const h = zoneHeadline(e);
  return [
    `${h.emoji} RSI ALERT ${h.emoji}`,
    '',
    `💱 Pair: ${e.pair}`,
    `⏰ Timeframe: ${e.timeframe}`,
    `📊 RSI(14): ${fmtRsi(e.rsi)}`,
    `💰 Price: ${fmtPrice(e.price, e.pair)}`,
    `🕐 Candle close: ${fmtLocal(e.candleTime, timeZone)}`,
    '',
    h.signal,
    h.action,
    '',
    '━━━━━━━━━━━━━━━',
    '⚠️ Not financial advice',
  ].join('\n');
}

export function alertHtml(e: AlertEvent, timeZone: string): string {
  const h = zoneHeadline(e);
  const rows: Array<[string, string]> = [
    ['Pair', e.pair],
    ['Timeframe', e.timeframe],
    ['RSI(14)', fmtRsi(e.rsi)],
    ['Price', fmtPrice(e.price, e.pair)],
    ['Candle close', fmtLocal(e.candleTime, timeZone)],
  ];
  const table = rows.map(([k, v]) => `
    <tr><td style="padding:6px 10px;color:#666;">${k}</td>
    <td style="padding:6px 10px;font-weight:600;color:#111;">${v}</td></tr>
  `).join('');

  return `
  <div style="font-family:Inter,Segoe UI,Arial,sans-serif;max-width:560px;margin:auto;border:1px solid #eee;border-radius:12px;overflow:hidden">
    <div style="background:#111;color:#fff;padding:14px 16px;font-size:16px"><strong>Forex RSI Alerts</strong></div>
    <div style="padding:16px">
      <h2 style="margin:0 0 8px 0;font-size:18px">${h.signal}: ${e.pair} ${e.timeframe}</h2>
      <p style="margin:0 0 12px 0;color:#333">${h.action}. This email is informational, not financial advice.</p>
      <table style="border-collapse:collapse;width:100%;font-size:14px">${table}</table>
    </div>
  </div>`;
}

export type StartupInfo = {
  pairs: readonly Pair[];
  timeframes: readonly Timeframe[];
  oversold: number;
  overbought: number;
  sleepStartHour: number;
  sleepEndHour: number;
  timeZone: string;
  now: number;
  testRsi?: number;
};

export function startupText(s: StartupInfo): string {
  const lines = [
    '🚀 Forex RSI Alerts started!',
    '',
    `📊 Monitoring: ${s.pairs.length} pairs`,
    `⏰ Timeframes: ${s.timeframes.join(' & ')} (synced to candle closes)`,
    `📈 RSI Oversold: ≤ ${s.oversold}`,
    `📉 RSI Overbought: ≥ ${s.overbought}`,
    '',
    `🕐 Now (${s.timeZone}): ${fmtLocal(s.now, s.timeZone)}`,
    `😴 Sleep: ${pad2(s.sleepStartHour)}:00 - ${pad2(s.sleepEndHour)}:00 ${s.timeZone}`,
  ];
  if (s.testRsi !== undefined) lines.push(`✅ Connection test: ${s.pairs[0]} 1h RSI ${fmtRsi(s.testRsi)}`);
  return lines.join('\n');
}

export function sleepText(now: number, wakeAt: number, timeZone: string): string {
  return [
    '😴 Going to sleep mode',
    '',
    `🕐 Now: ${fmtLocal(now, timeZone)}`,
    `⏰ Wake up at: ${fmtLocal(wakeAt, timeZone)}`,
    '',
    'Markets are quiet during these hours.',
  ].join('\n');
}

export function wakeText(now: number, timeZone: string, pairCount: number, timeframes: readonly Timeframe[]): string {
  return [
    '☀️ Awake, resuming RSI monitoring',
    '',
    `🕐 Now: ${fmtLocal(now, timeZone)}`,
    `📊 Watching ${pairCount} pairs on ${timeframes.join(' & ')}`,
  ].join('\n');
}

function pad2(n: number) {
  return String(n).padStart(2, '0');
}
