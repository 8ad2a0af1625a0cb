/**
 * Retry with exponential backoff.
 *
 * Exhaustion is a value, not a throw: callers get `status: 'exhausted'` with
 * the last error and decide whether that means "nothing new" or a failure.
 * All waiting goes through `Clock.sleep`, so tests run without real timers.
 */

import { moduleLogger } from '../logger.js';
import { errorMessage } from './errors.js';

const log = moduleLogger('retry');

export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms))),
};

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  /** Growth factor between consecutive delays. Default 2. */
  multiplier?: number;
}

export type RetryResult<T> =
  | { status: 'success'; value: T; attempts: number }
  | { status: 'exhausted'; attempts: number; lastError: unknown };

export interface RetryOptions {
  clock?: Clock;
  /** Prefix for log lines, e.g. `AAPL price-history`. */
  label?: string;
}

/** Delay before retry number `attemptIndex + 1`: `baseDelayMs * multiplier^attemptIndex`. */
export function backoffDelayMs(policy: RetryPolicy, attemptIndex: number): number {
  const base = Math.max(0, Number(policy.baseDelayMs) || 0);
  const multiplier = Math.max(1, Number(policy.multiplier ?? 2) || 1);
  return base * multiplier ** Math.max(0, attemptIndex);
}

export async function attemptWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const clock = options.clock ?? systemClock;
  const label = options.label || 'operation';
  const maxAttempts = Math.max(1, Math.floor(Number(policy.maxAttempts) || 1));
  let lastError: unknown = null;

  for (let attemptIndex = 0; attemptIndex < maxAttempts; attemptIndex++) {
    try {
      const value = await operation(attemptIndex + 1);
      return { status: 'success', value, attempts: attemptIndex + 1 };
    } catch (err: unknown) {
      lastError = err;
      log.warn(`${label} attempt ${attemptIndex + 1}/${maxAttempts} failed: ${errorMessage(err)}`);
      if (attemptIndex < maxAttempts - 1) {
        const delayMs = backoffDelayMs(policy, attemptIndex);
        log.info(`${label} retrying in ${delayMs}ms`);
        await clock.sleep(delayMs);
      }
    }
  }

  log.error(`${label} exhausted ${maxAttempts} attempts`);
  return { status: 'exhausted', attempts: maxAttempts, lastError };
}
