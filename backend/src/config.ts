// backend/src/config.ts
import { ConfigurationError } from './errors.js';
import { RSI_PERIOD } from './indicators.js';
import { isValidTimeZone } from './sleepWindow.js';
import { PAIRS, TIMEFRAMES, isPair, type Pair, type Timeframe } from './types.js';

export type EmailConfig = {
  enabled: boolean;
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  fromName: string;
  fromAddress: string;
  recipients: string[];
};

export interface AppConfig {
  pairs: readonly Pair[];
  timeframes: readonly Timeframe[];
  rsiPeriod: number;
  oversold: number;
  overbought: number;
  cooldownMs: number;
  sleepStartHour: number;
  sleepEndHour: number;
  sleepTimeZone: string;
  tickIntervalMs: number;
  dueToleranceMs: number;
  requestSpacingMs: number;
  requestTimeoutMs: number;
  maxDailyRequests: number;
  outputSize: number;
  twelveData: { apiKey: string; baseUrl: string };
  telegram: { token: string; chatId: string };
  email: EmailConfig;
  port: number;
}

type Env = Record<string, string | undefined>;

export function parseEnvValue(raw: string | undefined): string | number | boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim();
  if (!v) return undefined;
  if (v.toLowerCase() === 'true') return true;
  if (v.toLowerCase() === 'false') return false;
  const n = Number(v);
  if (Number.isFinite(n)) return n;
  return v;
}

function splitList(raw: string | undefined): string[] {
  return (raw || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Reads the whole configuration once. Every problem is collected and
 * reported together in a single ConfigurationError.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const problems: string[] = [];

  const num = (key: string, fallback: number): number => {
    const v = parseEnvValue(env[key]);
    if (v === undefined) return fallback;
    if (typeof v !== 'number') {
      problems.push(`${key} must be a number (got "${env[key]}")`);
      return fallback;
    }
    return v;
  };
  const bool = (key: string, fallback: boolean): boolean => {
    const v = parseEnvValue(env[key]);
    if (v === undefined) return fallback;
    if (typeof v !== 'boolean') {
      problems.push(`${key} must be true or false (got "${env[key]}")`);
      return fallback;
    }
    return v;
  };
  const str = (key: string, fallback = ''): string => env[key]?.trim() || fallback;

  const pairs: Pair[] = [];
  const pairList = splitList(env.PAIRS?.toUpperCase());
  if (pairList.length === 0 && env.PAIRS !== undefined) problems.push('PAIRS is empty');
  for (const p of pairList.length ? pairList : PAIRS) {
    if (isPair(p)) {
      if (!pairs.includes(p)) pairs.push(p);
    } else {
      problems.push(`unknown pair "${p}"`);
    }
  }

  const rsiPeriod = num('RSI_PERIOD', RSI_PERIOD);
  const oversold = num('RSI_OVERSOLD', 30);
  const overbought = num('RSI_OVERBOUGHT', 70);
  const cooldownMin = num('ALERT_COOLDOWN_MIN', 240);
  const sleepStartHour = num('SLEEP_START_HOUR', 2);
  const sleepEndHour = num('SLEEP_END_HOUR', 5);
  const sleepTimeZone = str('SLEEP_TZ', 'Asia/Kolkata');
  const tickIntervalMs = num('TICK_INTERVAL_MS', 60_000);
  const dueToleranceMs = num('DUE_TOLERANCE_MS', 3 * 60_000);
  const requestSpacingMs = num('REQUEST_SPACING_MS', 2_000);
  const requestTimeoutMs = num('REQUEST_TIMEOUT_MS', 15_000);
  const maxDailyRequests = num('MAX_DAILY_REQUESTS', 780);
  const outputSize = num('OUTPUT_SIZE', 50);
  const port = num('PORT', 8080);

  if (!Number.isInteger(rsiPeriod) || rsiPeriod < 2) problems.push('RSI_PERIOD must be an integer ≥ 2');
  for (const [key, v] of [['RSI_OVERSOLD', oversold], ['RSI_OVERBOUGHT', overbought]] as const) {
    if (v < 0 || v > 100) problems.push(`${key} must be within 0..100`);
  }
  if (oversold >= overbought) problems.push(`RSI_OVERSOLD (${oversold}) must be below RSI_OVERBOUGHT (${overbought})`);
  if (cooldownMin <= 0) problems.push('ALERT_COOLDOWN_MIN must be positive');
  for (const [key, v] of [['SLEEP_START_HOUR', sleepStartHour], ['SLEEP_END_HOUR', sleepEndHour]] as const) {
    if (!Number.isInteger(v) || v < 0 || v > 23) problems.push(`${key} must be an hour 0..23`);
  }
  if (!isValidTimeZone(sleepTimeZone)) problems.push(`SLEEP_TZ "${sleepTimeZone}" is not a known time zone`);
  if (tickIntervalMs <= 0) problems.push('TICK_INTERVAL_MS must be positive');
  if (dueToleranceMs <= 0) problems.push('DUE_TOLERANCE_MS must be positive');
  if (tickIntervalMs >= dueToleranceMs) {
    problems.push(`TICK_INTERVAL_MS (${tickIntervalMs}) must be shorter than DUE_TOLERANCE_MS (${dueToleranceMs})`);
  }
  if (requestSpacingMs < 0) problems.push('REQUEST_SPACING_MS must not be negative');
  if (requestTimeoutMs <= 0) problems.push('REQUEST_TIMEOUT_MS must be positive');
  if (maxDailyRequests <= 0) problems.push('MAX_DAILY_REQUESTS must be positive');
  // one extra close for the first change, one for the bar still forming
  if (!Number.isInteger(outputSize) || outputSize < rsiPeriod + 2) {
    problems.push(`OUTPUT_SIZE (${outputSize}) must be at least RSI_PERIOD + 2 (${rsiPeriod + 2})`);
  }

  const smtpUser = str('SMTP_USER');
  const email: EmailConfig = {
    enabled: bool('EMAIL_ENABLED', false),
    host: str('SMTP_HOST'),
    port: num('SMTP_PORT', 587),
    secure: bool('SMTP_SECURE', false),
    user: smtpUser,
    pass: str('SMTP_PASS'),
    fromName: str('EMAIL_FROM_NAME', 'Forex RSI Alerts'),
    fromAddress: str('EMAIL_FROM_ADDRESS', smtpUser || 'no-reply@localhost'),
    recipients: splitList(env.ALERT_EMAILS),
  };
  if (email.enabled && !email.host) problems.push('SMTP_HOST is required when EMAIL_ENABLED=true');
  if (email.enabled && email.recipients.length === 0) problems.push('ALERT_EMAILS is required when EMAIL_ENABLED=true');

  if (problems.length) throw new ConfigurationError(problems);

  return Object.freeze({
    pairs: Object.freeze(pairs),
    timeframes: TIMEFRAMES,
    rsiPeriod,
    oversold,
    overbought,
    cooldownMs: cooldownMin * 60_000,
    sleepStartHour,
    sleepEndHour,
    sleepTimeZone,
    tickIntervalMs,
    dueToleranceMs,
    requestSpacingMs,
    requestTimeoutMs,
    maxDailyRequests,
    outputSize,
    twelveData: { apiKey: str('TWELVEDATA_API_KEY'), baseUrl: str('TWELVEDATA_BASE', 'https://api.twelvedata.com') },
    telegram: { token: str('TELEGRAM_BOT_TOKEN'), chatId: str('TELEGRAM_CHAT_ID') },
    email,
    port,
  });
}

/** Credentials the live process cannot run without. */
export function requireCredentials(config: AppConfig): void {
  const missing: string[] = [];
  if (!config.twelveData.apiKey) missing.push('TWELVEDATA_API_KEY');
  if (!config.telegram.token) missing.push('TELEGRAM_BOT_TOKEN');
  if (!config.telegram.chatId) missing.push('TELEGRAM_CHAT_ID');
  if (missing.length) throw new ConfigurationError(missing.map((k) => `${k} is required`));
}
