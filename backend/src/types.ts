export const PAIRS = [
  // majors
  'EUR/USD', 'GBP/USD', 'USD/JPY', 'USD/CHF', 'AUD/USD', 'USD/CAD', 'NZD/USD',
  // crosses
  'EUR/GBP', 'EUR/JPY', 'EUR/CHF', 'EUR/AUD', 'EUR/CAD', 'EUR/NZD',
  'GBP/JPY', 'GBP/CHF', 'GBP/AUD', 'GBP/CAD', 'GBP/NZD',
  'CHF/JPY', 'AUD/JPY', 'CAD/JPY', 'NZD/JPY',
  'AUD/CHF', 'AUD/CAD', 'AUD/NZD',
  'CAD/CHF', 'NZD/CHF', 'NZD/CAD',
] as const;

export type Pair = (typeof PAIRS)[number];

export const TIMEFRAMES = ['1h', '4h'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export type Zone = 'NEUTRAL' | 'OVERSOLD' | 'OVERBOUGHT';

export type CandleClose = { closeTime: number; close: number };

export interface AlertState {
  lastAlertAt: number | null;
  lastZone: Zone;
}

export interface AlertEvent {
  readonly pair: Pair;
  readonly timeframe: Timeframe;
  readonly rsi: number;
  readonly price: number;
  readonly zone: Exclude<Zone, 'NEUTRAL'>;
  readonly at: number;        // evaluation instant (ms)
  readonly candleTime: number; // close time of the candle the RSI reflects
}

export function isPair(value: string): value is Pair {
  return PAIRS.some((p) => p === value);
}

export function stateKey(pair: Pair, timeframe: Timeframe): string {
  return `${pair}|${timeframe}`;
}
