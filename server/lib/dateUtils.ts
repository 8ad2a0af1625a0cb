/**
 * Date-key helpers. A date key is a `YYYY-MM-DD` string in UTC; keys compare
 * correctly as plain strings. All functions are pure.
 */

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function isDateKey(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  return Number.isFinite(parseDateKeyToUtcMs(value));
}

function parseDateKeyToUtcMs(dateKey: string): number {
  const value = String(dateKey || '').trim();
  const match = value.match(DATE_KEY_PATTERN);
  if (!match) return NaN;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day, 0, 0, 0, 0);
  // Reject rollovers such as 2024-02-31.
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return NaN;
  return ms;
}

function utcDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function addDaysToDateKey(dateKey: string, days: number): string {
  const baseMs = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(baseMs)) return '';
  return utcDateKey(new Date(baseMs + Math.trunc(Number(days) || 0) * DAY_MS));
}

/**
 * Calendar date of a bar timestamp at the exchange, given the exchange's
 * offset from UTC in seconds.
 */
function dateKeyFromUnixSeconds(unixSeconds: number, gmtOffsetSeconds = 0): string {
  if (!Number.isFinite(unixSeconds)) return '';
  return utcDateKey(new Date((unixSeconds + (Number(gmtOffsetSeconds) || 0)) * 1000));
}

function isoFromUnixSeconds(unixSeconds: number): string {
  if (!Number.isFinite(unixSeconds)) return new Date(0).toISOString();
  return new Date(unixSeconds * 1000).toISOString();
}

function dateKeyToUnixSeconds(dateKey: string): number {
  const ms = parseDateKeyToUtcMs(dateKey);
  return Number.isFinite(ms) ? Math.floor(ms / 1000) : NaN;
}

export {
  DAY_MS,
  isDateKey,
  parseDateKeyToUtcMs,
  utcDateKey,
  addDaysToDateKey,
  dateKeyFromUnixSeconds,
  isoFromUnixSeconds,
  dateKeyToUnixSeconds,
};
