import type { DatasetDefinition, DatasetRecord } from './datasetDefinitions.js';

export interface MergeStats {
  /** Records in the dataset before the merge. */
  before: number;
  /** Records in the incoming batch, duplicates included. */
  incoming: number;
  after: number;
  /** Net new keys: `after - before`. */
  added: number;
  /** Rows dropped by key collisions: `before + incoming - after`. */
  duplicatesRemoved: number;
  /** Existing keys whose values changed because the incoming row won. */
  updated: number;
}

export interface MergeResult<R extends DatasetRecord> {
  records: R[];
  stats: MergeStats;
}

function sameTrackedValues<R extends DatasetRecord>(definition: DatasetDefinition<R>, a: R, b: R): boolean {
  for (const column of definition.columns) {
    if (definition.volatileFields.includes(column.field)) continue;
    if (a[column.field] !== b[column.field]) return false;
  }
  return true;
}

/**
 * Collapse rows sharing a natural key, keeping the last one seen, and sort by
 * the dataset's ordering.
 */
export function dedupeRecords<R extends DatasetRecord>(definition: DatasetDefinition<R>, rows: readonly R[]): R[] {
  const byKey = new Map<string, R>();
  for (const row of rows) {
    const key = definition.keyOf(row);
    // Delete first so the surviving row takes the later insertion slot.
    byKey.delete(key);
    byKey.set(key, row);
  }
  return [...byKey.values()].sort(definition.compare);
}

/**
 * Merge an incoming batch into an existing dataset. Incoming rows win on key
 * collision (last-write-wins); the result is sorted by `definition.compare`.
 */
export function mergeRecords<R extends DatasetRecord>(
  definition: DatasetDefinition<R>,
  existing: readonly R[],
  incoming: readonly R[],
): MergeResult<R> {
  const existingByKey = new Map<string, R>();
  for (const row of existing) existingByKey.set(definition.keyOf(row), row);

  const incomingByKey = new Map<string, R>();
  for (const row of incoming) incomingByKey.set(definition.keyOf(row), row);

  let updated = 0;
  for (const [key, row] of incomingByKey) {
    const prior = existingByKey.get(key);
    if (prior && !sameTrackedValues(definition, prior, row)) updated++;
  }

  const records = dedupeRecords(definition, [...existing, ...incoming]);
  const before = existing.length;
  const after = records.length;

  return {
    records,
    stats: {
      before,
      incoming: incoming.length,
      after,
      added: after - before,
      duplicatesRemoved: before + incoming.length - after,
      updated,
    },
  };
}

export function emptyMergeStats(before = 0): MergeStats {
  return { before, incoming: 0, after: before, added: 0, duplicatesRemoved: 0, updated: 0 };
}

/** True when every adjacent pair respects the dataset ordering. */
export function isOrdered<R extends DatasetRecord>(definition: DatasetDefinition<R>, records: readonly R[]): boolean {
  for (let i = 1; i < records.length; i++) {
    if (definition.compare(records[i - 1], records[i]) > 0) return false;
  }
  return true;
}
