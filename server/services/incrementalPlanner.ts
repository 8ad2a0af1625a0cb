/**
 * Incremental Planner: decides the minimal fetch for one dataset.
 *
 * Rules for price history, first match wins:
 *   1. forced                             → full
 *   2. no local data                      → full
 *   3. earliest local date >= cutoff      → full (history incomplete, backfill)
 *   4. maxDate + 1 day >= today           → skip (never hand the provider an
 *                                            empty or inverted range)
 *   5. otherwise                          → range(maxDate + 1 day, today)
 */

import { addDaysToDateKey, isDateKey } from '../lib/dateUtils.js';
import type { SyncState } from './datasetStore.js';

export type FetchPlan =
  | { action: 'skip'; reason: string }
  | { action: 'range'; start: string; end: string }
  | { action: 'full'; reason: string };

export interface SeriesPlanInput {
  syncState: SyncState;
  /** Date key; datasets starting on or after it are treated as incomplete. */
  backfillCutoff: string;
  forceFull: boolean;
  /** Today's date key. */
  today: string;
}

export function planSeriesFetch(input: SeriesPlanInput): FetchPlan {
  const { syncState, backfillCutoff, forceFull, today } = input;

  if (forceFull) {
    return { action: 'full', reason: 'forced' };
  }
  if (syncState.count === 0 || !syncState.minValue || !syncState.maxValue) {
    return { action: 'full', reason: 'no-local-data' };
  }
  if (isDateKey(backfillCutoff) && syncState.minValue >= backfillCutoff) {
    return { action: 'full', reason: `history-starts-${syncState.minValue}-not-before-${backfillCutoff}` };
  }

  const start = addDaysToDateKey(syncState.maxValue, 1);
  if (!start) {
    // Unparseable max date: the dataset cannot anchor an incremental range.
    return { action: 'full', reason: `invalid-max-date-${syncState.maxValue}` };
  }
  if (start >= today) {
    return { action: 'skip', reason: `up-to-date-through-${syncState.maxValue}` };
  }
  return { action: 'range', start, end: today };
}

/**
 * News is only available as "latest N items", so every cycle is a full fetch
 * and the merge absorbs what is already stored.
 */
export function planNewsFetch(input: { forceFull: boolean }): FetchPlan {
  return { action: 'full', reason: input.forceFull ? 'forced' : 'latest-items' };
}
