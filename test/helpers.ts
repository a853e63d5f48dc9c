import type { OHLCV } from '../src/types.js';
import { addDays, parseDateKeyToUtcMs } from '../src/lib/dateUtils.js';

export const START_DATE = '2026-01-01';

/** Consecutive calendar-day bars, flat at 100 unless overridden. */
export function makeBars(n: number, override: (i: number) => Partial<OHLCV> = () => ({})): OHLCV[] {
  const bars: OHLCV[] = [];
  for (let i = 0; i < n; i++) {
    const date = addDays(START_DATE, i);
    bars.push({ t: parseDateKeyToUtcMs(date), date, o: 100, h: 101, l: 99, c: 100, v: 1000, ...override(i) });
  }
  return bars;
}

export function barsFromCloses(closes: number[]): OHLCV[] {
  return makeBars(closes.length, (i) => ({ c: closes[i] }));
}

/** Deterministic pseudo-random series in [0, 100); `seed` must be non-zero. */
export function lcgSeries(n: number, seed: number): number[] {
  const out: number[] = [];
  let x = seed;
  for (let i = 0; i < n; i++) {
    x = (x * 16807) % 2147483647;
    out.push(Math.floor((x / 2147483647) * 100));
  }
  return out;
}
