import test from 'node:test';
import assert from 'node:assert/strict';

import { findPivotLows } from '../src/engine/pivots.js';
import { ConfigurationError } from '../src/errors.js';
import { lcgSeries } from './helpers.js';

test('findPivotLows finds strict local minima', () => {
  assert.deepEqual(findPivotLows([5, 4, 3, 4, 5, 4, 2, 4, 5], 2, 2), [2, 6]);
});

test('findPivotLows ignores ties on either side', () => {
  assert.deepEqual(findPivotLows([3, 2, 2, 3], 1, 1), []);
  assert.deepEqual(findPivotLows([4, 3, 1, 1, 3, 4], 2, 2), []);
});

test('findPivotLows returns nothing for a series shorter than the window', () => {
  assert.deepEqual(findPivotLows([3, 1, 3, 4], 2, 2), []);
  assert.deepEqual(findPivotLows([], 5, 5), []);
});

test('findPivotLows accepts asymmetric windows', () => {
  const series = [9, 8, 7, 6, 5, 4, 3, 8];
  assert.deepEqual(findPivotLows(series, 6, 1), [6]);
  assert.deepEqual(findPivotLows(series, 2, 2), []);
});

test('findPivotLows treats undefined and NaN as disqualifying', () => {
  assert.deepEqual(findPivotLows([undefined, 5, 1, 5, 5], 2, 1), []);
  assert.deepEqual(findPivotLows([undefined, 5, 1, 5, 5], 1, 1), [2]);
  assert.deepEqual(findPivotLows([5, NaN, 1, 5], 1, 1), []);
  assert.deepEqual(findPivotLows([5, undefined, 5], 1, 1), []);
});

test('findPivotLows never returns an index outside [left, length - right)', () => {
  for (const [left, right] of [[5, 5], [3, 1], [1, 4], [0, 2]]) {
    const series = lcgSeries(200, left * 31 + right);
    for (const i of findPivotLows(series, left, right)) {
      assert.ok(i >= left && i < series.length - right, `index ${i} outside window ${left}/${right}`);
    }
  }
});

test('findPivotLows pivots are strict and vanish when a neighbour is lowered to the pivot value', () => {
  const left = 3;
  const right = 2;
  const series = lcgSeries(120, 7);
  const pivots = findPivotLows(series, left, right);
  assert.ok(pivots.length > 0);

  for (const i of pivots) {
    for (let j = i - left; j <= i + right; j++) {
      if (j === i) continue;
      assert.ok(series[i] < series[j]);
      const perturbed = series.slice();
      perturbed[j] = series[i];
      assert.equal(findPivotLows(perturbed, left, right).includes(i), false, `pivot ${i} survived tie at ${j}`);
    }
  }
});

test('findPivotLows rejects negative or fractional windows', () => {
  assert.throws(() => findPivotLows([1, 2, 3], -1, 1), ConfigurationError);
  assert.throws(() => findPivotLows([1, 2, 3], 1, 0.5), ConfigurationError);
});
