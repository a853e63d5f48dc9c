import type { OHLCV } from "../types.js";
import { computeRsiDivergence, type Oscillator, type RsiDivergence } from "../engine/rsiDivergence.js";
import { assertValidPeriod } from "../engine/rsi.js";
import { assertValidWindow } from "../engine/pivots.js";
import { dateKeyInZone } from "../lib/dateUtils.js";
import logger from "../logger.js";

export type BarFetcher = (symbol: string) => Promise<OHLCV[]>;

export type SymbolData = RsiDivergence & {
  symbol: string;
  /** Calendar date (market time zone) this entry is valid for. */
  epoch: string;
  bars: OHLCV[];
};

export type SymbolDataCacheOptions = {
  rsiPeriod: number;
  pivotLeft: number;
  pivotRight: number;
  timeZone: string;
  oscillator?: Oscillator;
  now?: () => Date;
};

/**
 * Memoizes bars and their RSI/pivot/divergence annotations per symbol for one
 * calendar day. Entries from an earlier day are dropped on the next access,
 * and concurrent first requests for a symbol share a single fetch.
 *
 * Failed fetches are never stored; the error goes to the callers waiting on
 * that symbol and the next `get` tries again.
 */
export class SymbolDataCache {
  private readonly entries = new Map<string, SymbolData>();
  private readonly inFlight = new Map<string, Promise<SymbolData>>();
  private readonly now: () => Date;

  constructor(
    private readonly fetchBars: BarFetcher,
    private readonly opt: SymbolDataCacheOptions
  ) {
    assertValidPeriod(opt.rsiPeriod);
    assertValidWindow(opt.pivotLeft, opt.pivotRight);
    this.now = opt.now ?? (() => new Date());
  }

  get rsiPeriod(): number {
    return this.opt.rsiPeriod;
  }

  get size(): number {
    return this.entries.size;
  }

  epoch(): string {
    return dateKeyInZone(this.now(), this.opt.timeZone);
  }

  async get(symbol: string): Promise<SymbolData> {
    const epoch = this.epoch();
    const cached = this.entries.get(symbol);
    if (cached) {
      if (cached.epoch === epoch) return cached;
      this.entries.delete(symbol);
      logger.debug({ symbol, from: cached.epoch, to: epoch }, "cache entry expired");
    }

    const key = `${symbol}@${epoch}`;
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const task = this.load(symbol, epoch).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, task);
    return task;
  }

  clear(): void {
    this.entries.clear();
  }

  private async load(symbol: string, epoch: string): Promise<SymbolData> {
    const bars = await this.fetchBars(symbol);
    const analysis = computeRsiDivergence(bars, {
      rsiPeriod: this.opt.rsiPeriod,
      pivotLeft: this.opt.pivotLeft,
      pivotRight: this.opt.pivotRight,
      oscillator: this.opt.oscillator
    });
    const entry: SymbolData = { symbol, epoch, bars, ...analysis };
    // A fetch that started before midnight must not replace a newer day's entry.
    const stored = this.entries.get(symbol);
    if (!stored || stored.epoch <= epoch) this.entries.set(symbol, entry);
    return entry;
  }
}
