import test from 'node:test';
import assert from 'node:assert/strict';

import { checkBullishDivergence, computeRsiDivergence } from '../src/engine/rsiDivergence.js';
import type { OscillatorSeries } from '../src/types.js';
import { makeBars } from './helpers.js';

const LOWS: Record<number, number> = { 2: 100, 5: 95, 8: 90 };

function barsWithLows(lows: Record<number, number>) {
  return makeBars(10, (i) => (i in lows ? { l: lows[i] } : {}));
}

function oscillatorWith(values: Record<number, number | undefined>): OscillatorSeries {
  return Array.from({ length: 10 }, (_, i) => (i in values ? values[i] : 50));
}

test('checkBullishDivergence flags a higher RSI low against a lower price low', () => {
  const osc = oscillatorWith({ 2: 30, 5: 35, 8: 33 });
  assert.deepEqual(checkBullishDivergence(barsWithLows(LOWS), osc, [2, 5, 8]), [5]);
});

test('checkBullishDivergence only compares adjacent pivots', () => {
  // 8 beats 2 but not its direct predecessor 5
  const osc = oscillatorWith({ 2: 30, 5: 40, 8: 35 });
  assert.deepEqual(checkBullishDivergence(barsWithLows(LOWS), osc, [2, 5, 8]), [5]);
});

test('checkBullishDivergence requires strict inequalities', () => {
  const equalRsi = oscillatorWith({ 2: 30, 5: 30, 8: 30 });
  assert.deepEqual(checkBullishDivergence(barsWithLows(LOWS), equalRsi, [2, 5, 8]), []);

  const equalLows = barsWithLows({ 2: 100, 5: 100, 8: 100 });
  assert.deepEqual(checkBullishDivergence(equalLows, oscillatorWith({ 2: 30, 5: 35, 8: 40 }), [2, 5, 8]), []);
});

test('checkBullishDivergence never flags the first pivot and returns a subsequence of the pivots', () => {
  const osc = oscillatorWith({ 2: 30, 5: 35, 8: 40 });
  const pivots = [2, 5, 8];
  const flagged = checkBullishDivergence(barsWithLows(LOWS), osc, pivots);
  assert.deepEqual(flagged, [5, 8]);
  assert.ok(!flagged.includes(pivots[0]));
  assert.deepEqual(checkBullishDivergence(barsWithLows(LOWS), osc, [5]), []);
  assert.deepEqual(checkBullishDivergence(barsWithLows(LOWS), osc, []), []);
});

test('checkBullishDivergence skips pairs with an undefined oscillator value', () => {
  const osc = oscillatorWith({ 2: undefined, 5: 35, 8: 40 });
  assert.deepEqual(checkBullishDivergence(barsWithLows(LOWS), osc, [2, 5, 8]), [8]);
});

test('computeRsiDivergence runs oscillator, pivots and matching in sequence', () => {
  const bars = makeBars(20, (i) => (i === 5 ? { l: 95 } : i === 12 ? { l: 90 } : {}));
  const oscillator = (close: readonly number[]): OscillatorSeries =>
    close.map((_, i) => (i < 2 ? undefined : i === 5 ? 20 : i === 12 ? 25 : 50));

  const out = computeRsiDivergence(bars, { rsiPeriod: 14, pivotLeft: 3, pivotRight: 3, oscillator });
  assert.deepEqual(out.pivots, [5, 12]);
  assert.deepEqual(out.divergences, [12]);
  assert.deepEqual(out.events, [{ prevPivot: 5, pivot: 12, prevRsi: 20, rsi: 25, prevLow: 95, low: 90 }]);
});

test('computeRsiDivergence detects a divergence with the built-in RSI', () => {
  // sharp sell-off into index 10, rally, then a slow grind to a lower wick at 25
  const closes = [
    100, 102, 101, 103, 102, 104, 103, 105, 95, 85, 75, 80, 85, 90, 95, 100,
    98, 96, 94, 92, 90, 88, 86, 84, 82, 80, 84, 88, 92, 96, 100, 102,
  ];
  const bars = makeBars(closes.length, (i) => ({ c: closes[i], l: i === 25 ? 70 : closes[i] - 1 }));

  const out = computeRsiDivergence(bars, { rsiPeriod: 5, pivotLeft: 3, pivotRight: 3 });
  assert.deepEqual(out.pivots, [10, 25]);
  assert.deepEqual(out.divergences, [25]);
  assert.equal(out.events.length, 1);
  const [event] = out.events;
  assert.deepEqual([event.prevPivot, event.pivot, event.prevLow, event.low], [10, 25, 74, 70]);
  assert.equal(Math.round(event.prevRsi * 100) / 100, 10.51);
  assert.equal(Math.round(event.rsi * 100) / 100, 16.28);
});

test('computeRsiDivergence finds nothing when the history is too short for RSI', () => {
  const out = computeRsiDivergence(makeBars(10), { rsiPeriod: 14, pivotLeft: 5, pivotRight: 5 });
  assert.equal(out.rsi.every((v) => v === undefined), true);
  assert.deepEqual(out.pivots, []);
  assert.deepEqual(out.divergences, []);
});

test('computeRsiDivergence rejects an oscillator that does not align with the bars', () => {
  assert.throws(
    () => computeRsiDivergence(makeBars(5), { rsiPeriod: 2, pivotLeft: 1, pivotRight: 1, oscillator: () => [1, 2] }),
    /align/,
  );
});
