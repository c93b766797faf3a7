// backend/src/signalEvaluator.ts
import { stateKey, type AlertEvent, type AlertState, type Pair, type Timeframe, type Zone } from './types.js';

export interface Thresholds {
  oversold: number;   // e.g. 30 => RSI ≤ 30 is oversold
  overbought: number; // e.g. 70 => RSI ≥ 70 is overbought
}

export interface EvaluatorConfig extends Thresholds {
  cooldownMs: number;
}

export type EvaluationInput = {
  pair: Pair;
  timeframe: Timeframe;
  rsi: number | undefined;
  price: number;
  now: number;
  candleTime: number;
};

export type EvaluationReason = 'NO_RSI' | 'NEUTRAL' | 'COOLDOWN' | 'FIRED';

export type Evaluation =
  | { fired: true; zone: Exclude<Zone, 'NEUTRAL'>; reason: 'FIRED'; event: AlertEvent }
  | { fired: false; zone: Zone | null; reason: Exclude<EvaluationReason, 'FIRED'> };

export function classifyZone(rsi: number, t: Thresholds): Zone {
  if (rsi <= t.oversold) return 'OVERSOLD';
  if (rsi >= t.overbought) return 'OVERBOUGHT';
  return 'NEUTRAL';
}

/**
 * Per (pair, timeframe) alert gate. An alert fires whenever RSI is inside a
 * signal zone and the key's cooldown has elapsed since its last fired alert;
 * leaving and re-entering a zone does not re-arm it.
 */
export class SignalEvaluator {
  private readonly states = new Map<string, AlertState>();

  constructor(private readonly config: Readonly<EvaluatorConfig>) {}

  evaluate(input: EvaluationInput): Evaluation {
    const { pair, timeframe, rsi, price, now, candleTime } = input;
    if (rsi === undefined) return { fired: false, zone: null, reason: 'NO_RSI' };

    const state = this.stateFor(pair, timeframe);
    const zone = classifyZone(rsi, this.config);

    if (zone === 'NEUTRAL') {
      state.lastZone = 'NEUTRAL';
      return { fired: false, zone, reason: 'NEUTRAL' };
    }

    const cooledDown = state.lastAlertAt === null || now - state.lastAlertAt >= this.config.cooldownMs;
    state.lastZone = zone;
    if (!cooledDown) return { fired: false, zone, reason: 'COOLDOWN' };

    state.lastAlertAt = now;
    const event: AlertEvent = Object.freeze({ pair, timeframe, rsi, price, zone, at: now, candleTime });
    return { fired: true, zone, reason: 'FIRED', event };
  }

  stateOf(pair: Pair, timeframe: Timeframe): Readonly<AlertState> | undefined {
    return this.states.get(stateKey(pair, timeframe));
  }

  snapshot(): Record<string, AlertState> {
    const out: Record<string, AlertState> = {};
    for (const [key, s] of this.states) out[key] = { ...s };
    return out;
  }

  private stateFor(pair: Pair, timeframe: Timeframe): AlertState {
    const key = stateKey(pair, timeframe);
    let state = this.states.get(key);
    if (!state) {
      state = { lastAlertAt: null, lastZone: 'NEUTRAL' };
      this.states.set(key, state);
    }
    return state;
  }
}
