import test from 'node:test';
import assert from 'node:assert/strict';

import {
  addDaysToDateKey,
  dateKeyFromUnixSeconds,
  dateKeyToUnixSeconds,
  isDateKey,
  isoFromUnixSeconds,
  utcDateKey,
} from '../server/lib/dateUtils.js';

test('isDateKey accepts real calendar dates only', () => {
  assert.equal(isDateKey('2024-02-29'), true);
  assert.equal(isDateKey('2023-02-29'), false);
  assert.equal(isDateKey('2024-2-01'), false);
  assert.equal(isDateKey(20240201), false);
});

test('addDaysToDateKey crosses month and year boundaries', () => {
  assert.equal(addDaysToDateKey('2024-02-28', 1), '2024-02-29');
  assert.equal(addDaysToDateKey('2023-12-31', 1), '2024-01-01');
  assert.equal(addDaysToDateKey('2024-03-01', -1), '2024-02-29');
  assert.equal(addDaysToDateKey('garbage', 1), '');
});

test('utcDateKey uses the UTC calendar day', () => {
  assert.equal(utcDateKey(new Date('2024-06-10T23:59:59.000Z')), '2024-06-10');
});

test('dateKeyFromUnixSeconds applies the exchange offset', () => {
  // 2024-01-03T02:00Z is still 2024-01-02 in New York (UTC-5).
  assert.equal(dateKeyFromUnixSeconds(1704247200, -18000), '2024-01-02');
  assert.equal(dateKeyFromUnixSeconds(1704247200), '2024-01-03');
  assert.equal(dateKeyFromUnixSeconds(Number.NaN), '');
});

test('date keys convert to and from unix seconds', () => {
  assert.equal(dateKeyToUnixSeconds('2024-01-01'), 1704067200);
  assert.ok(Number.isNaN(dateKeyToUnixSeconds('2024-01-32')));
  assert.equal(isoFromUnixSeconds(1704067200), '2024-01-01T00:00:00.000Z');
});
