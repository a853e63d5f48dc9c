#!/usr/bin/env node
import { writeFile } from "node:fs/promises";
import { Command } from "commander";
import { DEFAULTS, EMAIL, NOTIFY } from "./config.js";
import logger from "./logger.js";
import { symbolsFromFile } from "./io/symbolsFromFile.js";
import { createYahooFetcher } from "./io/downloadYahoo.js";
import { writeCsv, projectionToCsvRow } from "./io/writeCsv.js";
import { SymbolDataCache } from "./cache/symbolDataCache.js";
import { scanDate, scanProjections } from "./scan/scanner.js";
import { createTradingCalendar, loadHolidays } from "./calendar/tradingCalendar.js";
import { buildReport, buildSummary } from "./report/report.js";
import { sendWhatsAppMessage } from "./notify/whatsapp.js";
import { sendEmailReport } from "./notify/email.js";
import { isValidDateKey } from "./lib/dateUtils.js";
import type { ProgressCallback } from "./types.js";

type CliOptions = {
  file: string;
  date?: string;
  nextOpen: boolean;
  concurrency: string;
  out: string;
  report: string;
  holidays: string;
  notify: boolean;
  email: boolean;
  force: boolean;
};

const program = new Command();

program
  .name("rsi-divergence-scanner")
  .description("Bullish RSI divergence scanner for daily bars")
  .option("--file <path>", "path to stocks.txt", "stocks.txt")
  .option("--date <YYYY-MM-DD>", "report divergences on a past date with forward returns")
  .option("--next-open", "measure returns from the next day's open instead of the close", DEFAULTS.useNextOpen)
  .option("--concurrency <n>", "symbols fetched in parallel", String(DEFAULTS.concurrency))
  .option("--out <csv>", "export CSV path", "")
  .option("--report <html>", "write the HTML alert to this path", "")
  .option("--holidays <path>", "exchange holiday list", "holidays.txt")
  .option("--notify", "send a WhatsApp summary", false)
  .option("--email", "email the alert over SMTP", false)
  .option("--force", "scan even when the market is closed", false)
  .parse(process.argv);

const opt = program.opts<CliOptions>();

function makeCache(): SymbolDataCache {
  const fetchBars = createYahooFetcher({
    lookbackDays: DEFAULTS.lookbackDays,
    interval: DEFAULTS.interval,
    timeZone: DEFAULTS.timeZone,
    timeoutMs: DEFAULTS.fetchTimeoutMs
  });
  return new SymbolDataCache(fetchBars, {
    rsiPeriod: DEFAULTS.rsiPeriod,
    pivotLeft: DEFAULTS.pivotLookback,
    pivotRight: DEFAULTS.pivotLookback,
    timeZone: DEFAULTS.timeZone
  });
}

const progress: ProgressCallback = (done, total, symbol) => {
  logger.debug({ done, total, symbol }, "scan progress");
};

function loadUniverse(): string[] {
  const symbols = symbolsFromFile(opt.file);
  if (symbols.length === 0) throw new Error(`No symbols found in ${opt.file}`);
  return symbols;
}

async function runToday() {
  const cache = makeCache();
  const today = cache.epoch();
  const calendar = createTradingCalendar(loadHolidays(opt.holidays));
  if (!opt.force && !calendar.isTradingDay(today)) {
    logger.info({ date: today }, "market is closed today, nothing to scan");
    return;
  }

  const symbols = loadUniverse();
  logger.info({ date: today, symbols: symbols.length }, "scanning for today's bullish divergences");
  const result = await scanDate(cache, today, symbols, { concurrency: Number(opt.concurrency), progress });
  logger.info(
    { found: result.rows.length, failed: result.failures.length, insufficient: result.insufficientHistory.length },
    "scan finished"
  );

  if (result.rows.length > 0) console.table(result.rows);
  else console.log("No bullish divergences found today.");

  if (opt.out) {
    await writeCsv(result.rows, opt.out);
    console.log(`Saved CSV → ${opt.out}`);
  }
  const report = buildReport(result.rows, {
    date: today, generatedAt: new Date(), timeZone: DEFAULTS.timeZone, currency: DEFAULTS.currency
  });
  if (opt.report) {
    await writeFile(opt.report, report.html, "utf8");
    console.log(`Saved report → ${opt.report} (${report.subject})`);
  }
  if (opt.email) {
    await sendEmailReport(report, EMAIL);
  }
  if (opt.notify) {
    await sendWhatsAppMessage(
      buildSummary(result.rows, today, DEFAULTS.currency),
      { phone: NOTIFY.whatsappPhone, apiKey: NOTIFY.whatsappApiKey }
    );
  }
}

async function runForDate(date: string) {
  if (!isValidDateKey(date)) throw new Error(`Invalid --date ${date}, expected YYYY-MM-DD`);
  const cache = makeCache();
  const symbols = loadUniverse();
  logger.info({ date, symbols: symbols.length, useNextOpen: opt.nextOpen }, "scanning historical date");

  const result = await scanProjections(cache, date, symbols, {
    concurrency: Number(opt.concurrency),
    progress,
    horizon: DEFAULTS.horizon,
    useNextOpen: opt.nextOpen
  });
  const rows = result.rows.map(projectionToCsvRow);

  if (rows.length > 0) console.table(rows);
  else console.log(`No bullish divergences found on ${date}.`);

  if (opt.out) {
    await writeCsv(rows, opt.out);
    console.log(`Saved CSV → ${opt.out}`);
  }
}

(opt.date ? runForDate(opt.date) : runToday()).catch((err: unknown) => {
  logger.error({ err }, "scan failed");
  process.exitCode = 1;
});
