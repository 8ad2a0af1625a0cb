import test from 'node:test';
import assert from 'node:assert/strict';

import { mapWithConcurrency, type Settled } from '../server/lib/mapWithConcurrency.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function values<R>(results: Array<Settled<R> | undefined>): Array<R | undefined> {
  return results.map((r) => (r && r.ok ? r.value : undefined));
}

// ---------------------------------------------------------------------------
// Basic behavior
// ---------------------------------------------------------------------------

test('mapWithConcurrency processes all items and returns results in input order', async () => {
  const results = await mapWithConcurrency([1, 2, 3, 4, 5], 3, async (n) => n * 2);
  assert.deepEqual(values(results), [2, 4, 6, 8, 10]);
});

test('mapWithConcurrency returns empty array for empty input', async () => {
  const results = await mapWithConcurrency([], 4, async (x: number) => x);
  assert.deepEqual(results, []);
});

test('mapWithConcurrency preserves result order regardless of completion order', async () => {
  const results = await mapWithConcurrency([50, 30, 10, 40, 20], 5, async (ms, idx) => {
    await delay(ms);
    return idx;
  });
  assert.deepEqual(values(results), [0, 1, 2, 3, 4]);
});

// ---------------------------------------------------------------------------
// Concurrency limit
// ---------------------------------------------------------------------------

test('mapWithConcurrency does not exceed specified concurrency', async () => {
  let concurrent = 0;
  let maxConcurrent = 0;

  await mapWithConcurrency(
    Array.from({ length: 10 }, (_, i) => i),
    3,
    async () => {
      concurrent++;
      maxConcurrent = Math.max(maxConcurrent, concurrent);
      await delay(5);
      concurrent--;
    },
  );

  assert.equal(maxConcurrent, 3);
});

test('mapWithConcurrency clamps concurrency to list length', async () => {
  let maxConcurrent = 0;
  let concurrent = 0;

  await mapWithConcurrency([1, 2], 100, async (n) => {
    concurrent++;
    maxConcurrent = Math.max(maxConcurrent, concurrent);
    await delay(1);
    concurrent--;
    return n;
  });

  assert.ok(maxConcurrent <= 2, `maxConcurrent=${maxConcurrent} should be <= 2`);
});

test('mapWithConcurrency with concurrency=1 processes items serially', async () => {
  const order: number[] = [];

  await mapWithConcurrency([1, 2, 3], 1, async (n) => {
    order.push(n);
    await delay(1);
  });

  assert.deepEqual(order, [1, 2, 3]);
});

test('mapWithConcurrency treats a non-numeric concurrency as 1', async () => {
  let concurrent = 0;
  let maxConcurrent = 0;
  await mapWithConcurrency([1, 2, 3], Number.NaN, async () => {
    concurrent++;
    maxConcurrent = Math.max(maxConcurrent, concurrent);
    await delay(1);
    concurrent--;
  });
  assert.equal(maxConcurrent, 1);
});

// ---------------------------------------------------------------------------
// onSettled callback
// ---------------------------------------------------------------------------

test('mapWithConcurrency onSettled receives result, index and item', async () => {
  const calls: Array<{ result: Settled<string>; index: number; item: string }> = [];

  await mapWithConcurrency(['a', 'b', 'c'], 2, async (s) => s.toUpperCase(), {
    onSettled: (result, index, item) => calls.push({ result, index, item }),
  });

  assert.equal(calls.length, 3);
  const sorted = [...calls].sort((a, b) => a.index - b.index);
  assert.deepEqual(sorted[0], { result: { ok: true, value: 'A' }, index: 0, item: 'a' });
  assert.deepEqual(sorted[2], { result: { ok: true, value: 'C' }, index: 2, item: 'c' });
});

test('mapWithConcurrency error in onSettled does not abort processing', async () => {
  let settledCount = 0;

  const results = await mapWithConcurrency([1, 2, 3], 2, async (n) => n, {
    onSettled: () => {
      settledCount++;
      throw new Error('callback error');
    },
  });

  assert.equal(settledCount, 3);
  assert.deepEqual(values(results), [1, 2, 3]);
});

// ---------------------------------------------------------------------------
// Worker errors
// ---------------------------------------------------------------------------

test('mapWithConcurrency captures worker exceptions without stopping other items', async () => {
  const boom = new Error('boom');
  const results = await mapWithConcurrency([1, 2, 3], 2, async (n) => {
    if (n === 2) throw boom;
    return n * 10;
  });

  assert.deepEqual(results, [
    { ok: true, value: 10 },
    { ok: false, error: boom },
    { ok: true, value: 30 },
  ]);
});

// ---------------------------------------------------------------------------
// shouldStop
// ---------------------------------------------------------------------------

test('mapWithConcurrency stops claiming items once shouldStop returns true', async () => {
  let processedCount = 0;

  const results = await mapWithConcurrency(
    Array.from({ length: 10 }, (_, i) => i),
    1,
    async (n) => {
      processedCount++;
      return n;
    },
    { shouldStop: () => processedCount >= 3 },
  );

  assert.equal(processedCount, 3);
  assert.deepEqual(values(results).slice(0, 3), [0, 1, 2]);
  assert.equal(results[3], undefined);
});

test('mapWithConcurrency with shouldStop always true processes nothing', async () => {
  let processedCount = 0;

  await mapWithConcurrency(
    Array.from({ length: 20 }, (_, i) => i),
    4,
    async () => {
      processedCount++;
    },
    { shouldStop: () => true },
  );

  assert.equal(processedCount, 0);
});

test('mapWithConcurrency keeps going when shouldStop throws', async () => {
  const results = await mapWithConcurrency([1, 2], 1, async (n) => n, {
    shouldStop: () => {
      throw new Error('stop check failed');
    },
  });
  assert.deepEqual(values(results), [1, 2]);
});
