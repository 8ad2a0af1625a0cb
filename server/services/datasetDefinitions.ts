/**
 * Declarative description of each dataset kind: record shape, natural key,
 * ordering, and the ordered column list shared by the local file layout and
 * the warehouse table. Everything downstream (merge, store, remote sync) is
 * generic over `DatasetDefinition`.
 */

import { z } from 'zod';
import { isDateKey } from '../lib/dateUtils.js';

export type DataKind = 'price-history' | 'news';

export const DATA_KINDS: readonly DataKind[] = ['price-history', 'news'];

export type ScalarValue = string | number | boolean | null;

export type DatasetRecord = Record<string, ScalarValue>;

export interface ColumnDefinition<R extends DatasetRecord> {
  field: keyof R & string;
  /** Upper-case column name in the local dataset file. */
  local: string;
  /** Column name in the warehouse table. */
  remote: string;
  /** Declared warehouse type. */
  type: string;
  key?: boolean;
}

export interface DatasetDefinition<R extends DatasetRecord> {
  kind: DataKind;
  columns: ReadonlyArray<ColumnDefinition<R>>;
  recordSchema: z.ZodType<R>;
  keyOf(record: R): string;
  /** Entity ordering for the persisted dataset. */
  compare(a: R, b: R): number;
  /** Value the planner reads to derive sync state (date or publish time). */
  syncValueOf(record: R): string;
  /** Fields that change on every download and do not count as an update. */
  volatileFields: ReadonlyArray<keyof R & string>;
}

const isoTimestamp = z.string().datetime({ offset: true });
const dateKey = z.string().refine(isDateKey, { message: 'expected YYYY-MM-DD' });
const nullableNumber = z.number().finite().nullable();

// ---------------------------------------------------------------------------
// Price history
// ---------------------------------------------------------------------------

export const PriceRecordSchema = z.object({
  ticker: z.string().min(1),
  date: dateKey,
  open: nullableNumber,
  high: nullableNumber,
  low: nullableNumber,
  close: nullableNumber,
  adjClose: nullableNumber,
  volume: z.number().int().nullable(),
  downloadedAt: isoTimestamp,
});

export type PriceRecord = z.infer<typeof PriceRecordSchema>;

export const priceHistoryDataset: DatasetDefinition<PriceRecord> = {
  kind: 'price-history',
  columns: [
    { field: 'ticker', local: 'TICKER', remote: 'ticker', type: 'varchar(16)', key: true },
    { field: 'date', local: 'DATE', remote: 'date', type: 'date', key: true },
    { field: 'open', local: 'OPEN', remote: 'open', type: 'double precision' },
    { field: 'high', local: 'HIGH', remote: 'high', type: 'double precision' },
    { field: 'low', local: 'LOW', remote: 'low', type: 'double precision' },
    { field: 'close', local: 'CLOSE', remote: 'close', type: 'double precision' },
    { field: 'adjClose', local: 'ADJ_CLOSE', remote: 'adj_close', type: 'double precision' },
    { field: 'volume', local: 'VOLUME', remote: 'volume', type: 'bigint' },
    { field: 'downloadedAt', local: 'DOWNLOAD_TIMESTAMP', remote: 'download_timestamp', type: 'timestamp' },
  ],
  recordSchema: PriceRecordSchema,
  keyOf: (r) => `${r.ticker}|${r.date}`,
  compare: (a, b) => compareStrings(a.date, b.date) || compareStrings(a.ticker, b.ticker),
  syncValueOf: (r) => r.date,
  volatileFields: ['downloadedAt'],
};

// ---------------------------------------------------------------------------
// News
// ---------------------------------------------------------------------------

export const NewsRecordSchema = z.object({
  ticker: z.string().min(1),
  id: z.string().min(1),
  title: z.string(),
  summary: z.string(),
  description: z.string(),
  publisher: z.string(),
  link: z.string(),
  publishTime: isoTimestamp,
  displayTime: isoTimestamp,
  contentType: z.string(),
  thumbnailUrl: z.string(),
  isPremium: z.boolean(),
  isHosted: z.boolean(),
  downloadedAt: isoTimestamp,
});

export type NewsRecord = z.infer<typeof NewsRecordSchema>;

export const newsDataset: DatasetDefinition<NewsRecord> = {
  kind: 'news',
  columns: [
    { field: 'ticker', local: 'TICKER', remote: 'ticker', type: 'varchar(16)', key: true },
    { field: 'id', local: 'ID', remote: 'id', type: 'varchar(64)', key: true },
    { field: 'title', local: 'TITLE', remote: 'title', type: 'varchar(1000)' },
    { field: 'summary', local: 'SUMMARY', remote: 'summary', type: 'text' },
    { field: 'description', local: 'DESCRIPTION', remote: 'description', type: 'text' },
    { field: 'publisher', local: 'PUBLISHER', remote: 'publisher', type: 'varchar(200)' },
    { field: 'link', local: 'LINK', remote: 'link', type: 'varchar(2000)' },
    { field: 'publishTime', local: 'PUBLISH_TIME', remote: 'publish_time', type: 'timestamp' },
    { field: 'displayTime', local: 'DISPLAY_TIME', remote: 'display_time', type: 'timestamp' },
    { field: 'contentType', local: 'CONTENT_TYPE', remote: 'content_type', type: 'varchar(50)' },
    { field: 'thumbnailUrl', local: 'THUMBNAIL_URL', remote: 'thumbnail_url', type: 'varchar(2000)' },
    { field: 'isPremium', local: 'IS_PREMIUM', remote: 'is_premium', type: 'boolean' },
    { field: 'isHosted', local: 'IS_HOSTED', remote: 'is_hosted', type: 'boolean' },
    { field: 'downloadedAt', local: 'DOWNLOAD_TIMESTAMP', remote: 'download_timestamp', type: 'timestamp' },
  ],
  recordSchema: NewsRecordSchema,
  keyOf: (r) => `${r.ticker}|${r.id}`,
  // Newest first; ties fall back to the natural key so output is deterministic.
  compare: (a, b) =>
    compareStrings(b.publishTime, a.publishTime) || compareStrings(a.ticker, b.ticker) || compareStrings(a.id, b.id),
  syncValueOf: (r) => r.publishTime,
  volatileFields: ['downloadedAt'],
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function keyColumns<R extends DatasetRecord>(definition: DatasetDefinition<R>): ColumnDefinition<R>[] {
  return definition.columns.filter((c) => c.key === true);
}

export function normalizeTicker(ticker: string): string {
  return String(ticker || '').trim().toUpperCase();
}
