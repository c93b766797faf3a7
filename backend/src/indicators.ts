// RSI with Wilder's smoothing (not SMA/EMA of moves)

export const RSI_PERIOD = 14;

export type RsiPoint = { index: number; value: number };

function rsiFrom(avgGain: number, avgLoss: number): number {
  // no losses in the window => 100, flat series included
  if (avgLoss === 0) return 100;
  const rs = avgGain / avgLoss;
  return 100 - (100 / (1 + rs));
}

/**
 * Lazily yields RSI values aligned to price indices `period..N-1`.
 * Nothing is yielded when there are `period` prices or fewer.
 */
export function* rsiSeries(prices: readonly number[], period: number = RSI_PERIOD): Generator<RsiPoint> {
  if (prices.length <= period) return;

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const d = prices[i] - prices[i - 1];
    avgGain += Math.max(d, 0);
    avgLoss += Math.max(-d, 0);
  }
  avgGain /= period;
  avgLoss /= period;
  yield { index: period, value: rsiFrom(avgGain, avgLoss) };

  for (let i = period + 1; i < prices.length; i++) {
    const d = prices[i] - prices[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(d, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-d, 0)) / period;
    yield { index: i, value: rsiFrom(avgGain, avgLoss) };
  }
}

/** RSI of the newest price, or undefined on insufficient history. */
export function latestRsi(prices: readonly number[], period: number = RSI_PERIOD): number | undefined {
  let last: number | undefined;
  for (const point of rsiSeries(prices, period)) last = point.value;
  return last;
}
