import test from 'node:test';
import assert from 'node:assert/strict';

import { TimeoutError, withTimeout } from '../src/lib/withTimeout.js';

function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

test('withTimeout resolves with the task value when it finishes in time', async () => {
  assert.equal(await withTimeout(() => delay(5, 'bars'), 1_000, 'fetch'), 'bars');
});

test('withTimeout rejects with TimeoutError when the task is too slow', async () => {
  await assert.rejects(withTimeout(() => delay(200, 'late'), 10, 'fetch AAA.NS'), (err: unknown) => {
    assert.ok(err instanceof TimeoutError);
    assert.equal(err.message, 'fetch AAA.NS timed out after 10ms');
    return true;
  });
});

test('withTimeout aborts the task signal on timeout', async () => {
  let seen: AbortSignal | undefined;
  await assert.rejects(
    withTimeout((signal) => {
      seen = signal;
      return delay(200, 'late');
    }, 10),
    TimeoutError,
  );
  assert.equal(seen?.aborted, true);
});

test('withTimeout leaves the signal alone when the task finishes in time', async () => {
  let seen: AbortSignal | undefined;
  await withTimeout((signal) => {
    seen = signal;
    return delay(5, 'bars');
  }, 1_000);
  assert.equal(seen?.aborted, false);
});

test('withTimeout passes the task through when no timeout is set', async () => {
  assert.equal(await withTimeout(() => Promise.resolve(3), 0), 3);
});

test('withTimeout propagates task errors', async () => {
  await assert.rejects(withTimeout(() => Promise.reject(new Error('boom')), 100), /boom/);
});
