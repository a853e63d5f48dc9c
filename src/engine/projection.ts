import { ConfigurationError } from "../errors.js";
import type { OHLCV, PriceBasis } from "../types.js";

export type ProjectionOptions = {
  horizon: number;
  useNextOpen: boolean;
};

export type SignalProjection = {
  index: number;
  prevClose: number | null;
  divergenceClose: number;
  openNextDay: number | null;
  basePrice: number | null;
  priceBasis: PriceBasis;
  availableDays: number;
  /** False when the base price is zero or not a number. */
  available: boolean;
  returns: (number | null)[];
};

export function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

export function assertValidHorizon(horizon: number): void {
  if (!Number.isInteger(horizon) || horizon <= 0) {
    throw new ConfigurationError(`Projection horizon must be a positive integer, got ${horizon}`);
  }
}

/**
 * Forward percentage returns for the divergence at `idx`, measured against
 * the next day's open (when requested and present) or the divergence close.
 * Days past the end of the series stay null.
 */
export function projectSignal(bars: readonly OHLCV[], idx: number, opt: ProjectionOptions): SignalProjection {
  assertValidHorizon(opt.horizon);
  if (!Number.isInteger(idx) || idx < 0 || idx >= bars.length) {
    throw new RangeError(`Bar index ${idx} out of range for ${bars.length} bars`);
  }

  const divergenceClose = bars[idx].c;
  const prevClose = idx > 0 ? bars[idx - 1].c : null;
  const openNextDay = idx + 1 < bars.length ? bars[idx + 1].o : null;

  let base = divergenceClose;
  let priceBasis: PriceBasis = "Close";
  if (opt.useNextOpen && openNextDay !== null) {
    base = openNextDay;
    priceBasis = "Open Next Day";
  }

  const returns: (number | null)[] = new Array(opt.horizon).fill(null);
  const available = Number.isFinite(base) && base !== 0;
  let availableDays = 0;

  if (available) {
    for (let j = 1; j <= opt.horizon; j++) {
      if (idx + j >= bars.length) break;
      returns[j - 1] = round2(((bars[idx + j].c - base) / base) * 100);
      availableDays = j;
    }
  }

  return {
    index: idx,
    prevClose,
    divergenceClose,
    openNextDay,
    basePrice: available ? base : null,
    priceBasis,
    availableDays,
    available,
    returns
  };
}
