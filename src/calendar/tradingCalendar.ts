import { existsSync, readFileSync } from "node:fs";
import { dayOfWeek, isValidDateKey } from "../lib/dateUtils.js";
import logger from "../logger.js";

export type TradingCalendar = {
  isTradingDay(dateKey: string): boolean;
};

/** Weekdays that are not listed holidays. */
export function createTradingCalendar(holidays: Iterable<string>): TradingCalendar {
  const closed = new Set(holidays);
  return {
    isTradingDay(dateKey: string): boolean {
      if (!isValidDateKey(dateKey)) return false;
      const dow = dayOfWeek(dateKey);
      if (dow === 0 || dow === 6) return false;
      return !closed.has(dateKey);
    }
  };
}

export function parseHolidays(text: string): string[] {
  const out: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.replace(/#.*$/, "").trim();
    if (!line) continue;
    if (isValidDateKey(line)) out.push(line);
    else logger.warn({ line }, "ignoring malformed holiday entry");
  }
  return out;
}

/** Missing file: weekday-only calendar. */
export function loadHolidays(path: string): string[] {
  if (!existsSync(path)) {
    logger.warn({ path }, "holiday file not found, treating every weekday as a trading day");
    return [];
  }
  return parseHolidays(readFileSync(path, "utf8"));
}
