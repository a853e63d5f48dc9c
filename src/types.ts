export type OHLCV = {
  t: number; // ms epoch
  date: string; // YYYY-MM-DD in the market time zone
  o: number; h: number; l: number; c: number; v: number;
};

/** Oscillator value per bar; undefined during warm-up. */
export type OscillatorSeries = (number | undefined)[];

export type ScanRow = {
  symbol: string;
  date: string;
  rsi: number;
  close: number; low: number; high: number;
  volume: number;
};

export type PriceBasis = "Open Next Day" | "Close";

export type ProjectionRecord = {
  symbol: string;
  date: string;
  rsi: number;
  prevClose: number | null;
  divergenceClose: number;
  openNextDay: number | null;
  basePrice: number | null;
  priceBasis: PriceBasis;
  availableDays: number;
  isTodaySignal: boolean;
  available: boolean;
  /** One slot per horizon day; null when that day is not in the series yet. */
  returns: (number | null)[];
};

export type SymbolFailure = {
  symbol: string;
  reason: string;
};

export type ScanResult<T> = {
  rows: T[];
  failures: SymbolFailure[];
  insufficientHistory: string[];
  processed: number;
  total: number;
};

export type ProgressCallback = (done: number, total: number, symbol: string) => void;
