/**
 * Date-key helpers. A date key is a `YYYY-MM-DD` string; ordering keys as
 * strings orders them chronologically.
 */

const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function dateKeyInZone(at: Date | number, timeZone: string): string {
  return new Date(at).toLocaleDateString("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  });
}

export function parseDateKeyToUtcMs(dateKey: string): number {
  const match = String(dateKey || "").trim().match(DATE_KEY_RE);
  if (!match) return NaN;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);
  // Reject rollovers such as 2026-02-30.
  return new Date(ms).toISOString().slice(0, 10) === match[0] ? ms : NaN;
}

export function isValidDateKey(dateKey: string): boolean {
  return Number.isFinite(parseDateKeyToUtcMs(dateKey));
}

export function addDays(dateKey: string, days: number): string {
  const ms = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(ms)) return "";
  return new Date(ms + days * 86_400_000).toISOString().slice(0, 10);
}

/** 0 = Sunday … 6 = Saturday */
export function dayOfWeek(dateKey: string): number {
  return new Date(parseDateKeyToUtcMs(dateKey)).getUTCDay();
}
