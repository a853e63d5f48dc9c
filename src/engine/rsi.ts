import { ConfigurationError } from "../errors.js";
import type { OscillatorSeries } from "../types.js";

/** Zero average loss reads as 100, a flat window included. */
function toRsi(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) return 100;
  return 100 - 100 / (1 + avgGain / avgLoss);
}

export function assertValidPeriod(period: number): void {
  if (!Number.isInteger(period) || period <= 0) {
    throw new ConfigurationError(`RSI period must be a positive integer, got ${period}`);
  }
}

/**
 * Wilder RSI. The first `period` entries are undefined; the seed averages are
 * simple means of the first `period` changes, then each step is smoothed as
 * `(prev * (period - 1) + current) / period`.
 *
 * Histories shorter than `period + 1` come back all-undefined rather than
 * throwing, so the rest of the pipeline still runs (and finds nothing).
 */
export function computeRsi(close: readonly number[], period: number): OscillatorSeries {
  assertValidPeriod(period);
  const n = close.length;
  const out: OscillatorSeries = new Array(n).fill(undefined);
  if (n < period + 1) return out;

  let gain = 0;
  let loss = 0;
  for (let i = 1; i <= period; i++) {
    const ch = close[i] - close[i - 1];
    if (ch > 0) gain += ch;
    else loss -= ch;
  }
  let avgGain = gain / period;
  let avgLoss = loss / period;
  out[period] = toRsi(avgGain, avgLoss);

  for (let i = period + 1; i < n; i++) {
    const ch = close[i] - close[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(ch, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-ch, 0)) / period;
    out[i] = toRsi(avgGain, avgLoss);
  }
  return out;
}
