import yahooFinance from "yahoo-finance2";
import type { OHLCV } from "../types.js";
import type { BarFetcher } from "../cache/symbolDataCache.js";
import { DataUnavailableError, errorMessage } from "../errors.js";
import { dateKeyInZone } from "../lib/dateUtils.js";
import { withTimeout } from "../lib/withTimeout.js";

export type YahooFetchOptions = {
  lookbackDays: number;
  interval: "1d";
  timeZone: string;
  timeoutMs: number;
};

export type ChartQuote = {
  date: Date;
  open: number | null; high: number | null; low: number | null; close: number | null;
  volume: number | null;
};

type CompleteQuote = ChartQuote & { open: number; high: number; low: number; close: number };

function isComplete(q: ChartQuote): q is CompleteQuote {
  return [q.open, q.high, q.low, q.close].every(x => typeof x === "number" && Number.isFinite(x));
}

export function toBars(quotes: readonly ChartQuote[], timeZone: string): OHLCV[] {
  return quotes.filter(isComplete).map(q => ({
    t: q.date.getTime(),
    date: dateKeyInZone(q.date, timeZone),
    o: q.open, h: q.high, l: q.low, c: q.close, v: Number(q.volume ?? 0)
  }));
}

export type ChartQuery = { period1: Date; interval: "1d" };

/** The slice of yahoo-finance2's `chart` the downloader calls. */
export type ChartFetch = (
  symbol: string,
  query: ChartQuery,
  moduleOptions: { fetchOptions: { signal: AbortSignal } }
) => Promise<{ quotes: ChartQuote[] }>;

const yahooChart: ChartFetch = (symbol, query, moduleOptions) =>
  yahooFinance.chart(symbol, query, moduleOptions);

export async function downloadYahoo(
  symbol: string,
  opt: YahooFetchOptions,
  chart: ChartFetch = yahooChart
): Promise<OHLCV[]> {
  const period1 = new Date(Date.now() - opt.lookbackDays * 86_400_000);
  let quotes: ChartQuote[];
  try {
    const res = await withTimeout(
      signal => chart(symbol, { period1, interval: opt.interval }, { fetchOptions: { signal } }),
      opt.timeoutMs,
      `Yahoo chart ${symbol}`
    );
    quotes = res.quotes;
  } catch (e) {
    throw new DataUnavailableError(symbol, errorMessage(e), { cause: e });
  }

  const bars = toBars(quotes, opt.timeZone);
  if (bars.length === 0) throw new DataUnavailableError(symbol, "empty price history");
  return bars;
}

export function createYahooFetcher(opt: YahooFetchOptions, chart: ChartFetch = yahooChart): BarFetcher {
  return symbol => downloadYahoo(symbol, opt, chart);
}
