import pLimit from "p-limit";
import type { SymbolData, SymbolDataCache } from "../cache/symbolDataCache.js";
import { projectSignal, assertValidHorizon, round2 } from "../engine/projection.js";
import { DataUnavailableError, errorMessage } from "../errors.js";
import logger from "../logger.js";
import type { ProgressCallback, ProjectionRecord, ScanResult, ScanRow, SymbolFailure } from "../types.js";

export type ScanOptions = {
  concurrency: number;
  progress?: ProgressCallback;
  /** Checked before each symbol starts; once true the rest are skipped. */
  shouldStop?: () => boolean;
};

export type ProjectionScanOptions = ScanOptions & {
  horizon: number;
  useNextOpen: boolean;
};

export function uniqueSymbols(symbols: readonly string[]): string[] {
  return [...new Set(symbols)];
}

function divergencesOn(data: SymbolData, date: string): number[] {
  return data.divergences.filter(idx => data.bars[idx].date === date);
}

async function runScan<T>(
  cache: SymbolDataCache,
  symbols: readonly string[],
  opt: ScanOptions,
  collect: (data: SymbolData) => T[]
): Promise<ScanResult<T>> {
  const universe = uniqueSymbols(symbols);
  const total = universe.length;
  const perSymbol = Array.from({ length: total }, (): T[] => []);
  const failures: SymbolFailure[] = [];
  const insufficientHistory: string[] = [];
  let processed = 0;
  let stopped = false;

  const limit = pLimit(Math.max(1, Math.floor(opt.concurrency) || 1));
  const tasks = universe.map((symbol, i) => limit(async () => {
    if (stopped || opt.shouldStop?.()) {
      stopped = true;
      return;
    }
    try {
      const data = await cache.get(symbol);
      if (data.bars.length < cache.rsiPeriod + 1) {
        insufficientHistory.push(symbol);
        logger.info({ symbol, bars: data.bars.length }, "insufficient history, no signal");
      } else {
        perSymbol[i] = collect(data);
      }
    } catch (err) {
      const reason = errorMessage(err);
      failures.push({ symbol, reason });
      if (err instanceof DataUnavailableError) logger.warn({ symbol, reason }, "skipping symbol");
      else logger.error({ symbol, err }, "error processing symbol");
    }

    processed += 1;
    if (opt.progress) {
      try {
        opt.progress(processed, total, symbol);
      } catch (err) {
        logger.warn({ err }, "progress callback failed");
      }
    }
  }));

  await Promise.all(tasks);
  return { rows: perSymbol.flat(), failures, insufficientHistory, processed, total };
}

/** Divergences whose bar falls on `date`, one row per match. */
export function scanDate(
  cache: SymbolDataCache,
  date: string,
  symbols: readonly string[],
  opt: ScanOptions
): Promise<ScanResult<ScanRow>> {
  return runScan(cache, symbols, opt, data =>
    divergencesOn(data, date).flatMap(idx => {
      const rsi = data.rsi[idx];
      if (rsi === undefined) return [];
      const bar = data.bars[idx];
      logger.info({ symbol: data.symbol, date, rsi: round2(rsi) }, "bullish RSI divergence");
      return [{
        symbol: data.symbol,
        date,
        rsi: round2(rsi),
        close: round2(bar.c),
        low: round2(bar.l),
        high: round2(bar.h),
        volume: Math.round(bar.v)
      }];
    })
  );
}

/** Divergences on `date` together with their forward-return projection. */
export function scanProjections(
  cache: SymbolDataCache,
  date: string,
  symbols: readonly string[],
  opt: ProjectionScanOptions
): Promise<ScanResult<ProjectionRecord>> {
  assertValidHorizon(opt.horizon);
  const isTodaySignal = date === cache.epoch();

  return runScan(cache, symbols, opt, data =>
    divergencesOn(data, date).flatMap(idx => {
      const rsi = data.rsi[idx];
      if (rsi === undefined) return [];
      const p = projectSignal(data.bars, idx, { horizon: opt.horizon, useNextOpen: opt.useNextOpen });
      if (!p.available) {
        logger.warn({ symbol: data.symbol, date }, "base price is zero or missing, projection unavailable");
      }
      return [{
        symbol: data.symbol,
        date,
        rsi: round2(rsi),
        prevClose: p.prevClose === null ? null : round2(p.prevClose),
        divergenceClose: round2(p.divergenceClose),
        openNextDay: p.openNextDay === null ? null : round2(p.openNextDay),
        basePrice: p.basePrice === null ? null : round2(p.basePrice),
        priceBasis: p.priceBasis,
        availableDays: p.availableDays,
        isTodaySignal,
        available: p.available,
        returns: p.returns
      }];
    })
  );
}
