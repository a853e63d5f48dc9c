import { ConfigurationError } from "../errors.js";

function isDefined(v: number | undefined): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

export function assertValidWindow(left: number, right: number): void {
  for (const [name, value] of [["left", left], ["right", right]] as const) {
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigurationError(`Pivot ${name} window must be a non-negative integer, got ${value}`);
    }
  }
}

/**
 * Indices whose value is strictly below each of the `left` values before and
 * the `right` values after it. Ties never qualify, and any undefined/NaN
 * value inside the window disqualifies it.
 */
export function findPivotLows(
  series: readonly (number | undefined)[],
  left: number,
  right: number
): number[] {
  assertValidWindow(left, right);
  const n = series.length;
  const pivots: number[] = [];

  for (let i = left; i < n - right; i++) {
    const v = series[i];
    if (!isDefined(v)) continue;
    let ok = true;
    for (let j = i - left; j <= i + right; j++) {
      if (j === i) continue;
      const neighbour = series[j];
      if (!isDefined(neighbour) || !(v < neighbour)) { ok = false; break; }
    }
    if (ok) pivots.push(i);
  }
  return pivots;
}
