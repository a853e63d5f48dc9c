import type { OHLCV, OscillatorSeries } from "../types.js";
import { computeRsi } from "./rsi.js";
import { findPivotLows } from "./pivots.js";

export type DivergenceEvent = {
  prevPivot: number; pivot: number;
  prevRsi: number; rsi: number;
  prevLow: number; low: number;
};

export type Oscillator = (close: readonly number[]) => OscillatorSeries;

export type Options = {
  rsiPeriod: number;
  pivotLeft: number;
  pivotRight: number;
  /** Replaces the RSI computed from `rsiPeriod`. */
  oscillator?: Oscillator;
};

export type RsiDivergence = {
  rsi: OscillatorSeries;
  pivots: number[];
  divergences: number[];
  events: DivergenceEvent[];
};

/**
 * Walks adjacent pivot pairs only; `curr` is flagged when the oscillator made
 * a higher low while price made a lower low. The first pivot has no
 * predecessor and is never flagged.
 */
export function checkBullishDivergence(
  bars: readonly OHLCV[],
  oscillator: OscillatorSeries,
  pivots: readonly number[]
): number[] {
  const out: number[] = [];
  for (let i = 1; i < pivots.length; i++) {
    const curr = pivots[i];
    const prev = pivots[i - 1];
    const currOsc = oscillator[curr];
    const prevOsc = oscillator[prev];
    if (currOsc === undefined || prevOsc === undefined) continue;

    const rsiHigherLow = currOsc > prevOsc;
    const priceLowerLow = bars[curr].l < bars[prev].l;
    if (rsiHigherLow && priceLowerLow) out.push(curr);
  }
  return out;
}

export function computeRsiDivergence(bars: readonly OHLCV[], opt: Options): RsiDivergence {
  const close = bars.map(b => b.c);
  const rsi = opt.oscillator ? opt.oscillator(close) : computeRsi(close, opt.rsiPeriod);
  if (rsi.length !== bars.length) {
    throw new Error("Oscillator series must align with the bar series");
  }

  const pivots = findPivotLows(rsi, opt.pivotLeft, opt.pivotRight);
  const divergences = checkBullishDivergence(bars, rsi, pivots);

  const events: DivergenceEvent[] = [];
  for (const pivot of divergences) {
    const prevPivot = pivots[pivots.indexOf(pivot) - 1];
    const rsiValue = rsi[pivot];
    const prevRsi = rsi[prevPivot];
    if (rsiValue === undefined || prevRsi === undefined) continue;
    events.push({
      prevPivot, pivot,
      prevRsi, rsi: rsiValue,
      prevLow: bars[prevPivot].l, low: bars[pivot].l
    });
  }

  return { rsi, pivots, divergences, events };
}
