import { writeToPath } from "fast-csv";
import type { ProjectionRecord } from "../types.js";

export type CsvRow = Record<string, string | number | boolean | null>;

/** Spreads the return slots into `Day+N Return (%)` columns; missing days stay empty. */
export function projectionToCsvRow(r: ProjectionRecord): CsvRow {
  const row: CsvRow = {
    "Symbol": r.symbol,
    "Date": r.date,
    "Prev Close": r.prevClose,
    "Divergence Close": r.divergenceClose,
    "Open Next Day": r.openNextDay,
    "RSI": r.rsi,
    "Used Price": r.priceBasis,
    "Available Future Days": r.availableDays,
    "Is Today's Signal": r.isTodaySignal
  };
  r.returns.forEach((ret, i) => {
    row[`Day+${i + 1} Return (%)`] = ret;
  });
  return row;
}

export async function writeCsv(rows: CsvRow[], outPath: string) {
  await new Promise<void>((resolve, reject) => {
    const stream = writeToPath(outPath, rows, { headers: true });
    stream.on("error", reject);
    stream.on("finish", resolve);
  });
}
