/**
 * Narrow interface the Remote Sync Engine talks to. One session is one pinned
 * warehouse connection; temporary (staging) tables live and die with it.
 */

import type { ScalarValue } from '../services/datasetDefinitions.js';
import type { ColumnSpec, SchemaChange } from '../lib/schemaDiff.js';

export type WarehouseRow = Record<string, ScalarValue>;

export interface UpsertSpec {
  target: string;
  staging: string;
  columns: string[];
  keyColumns: string[];
}

export interface WarehouseSession {
  tableExists(table: string): Promise<boolean>;
  /** Columns in ordinal order, as the warehouse reports them. */
  describeTable(table: string): Promise<ColumnSpec[]>;
  /** Row count; with `tickers`, only rows whose `ticker` is one of them. */
  countRows(table: string, tickers?: readonly string[]): Promise<number>;
  /** `create-table` is a no-op when the table already exists. */
  applySchemaChange(change: SchemaChange): Promise<void>;
  /** Session-scoped table with the given columns and no key constraint. */
  createStagingTable(table: string, columns: readonly ColumnSpec[]): Promise<void>;
  /** Bulk insert; resolves with the row count the warehouse reported. */
  insertRows(table: string, columns: readonly string[], rows: readonly WarehouseRow[]): Promise<number>;
  /** Key-based merge: update every non-key column on match, insert otherwise. */
  upsertFromStaging(spec: UpsertSpec): Promise<void>;
  dropTable(table: string): Promise<void>;
  /** Latest rows for one ticker, newest first. */
  selectRecent(table: string, ticker: string, orderColumn: string, limit: number): Promise<Record<string, unknown>[]>;
  close(): Promise<void>;
}

export interface Warehouse {
  openSession(): Promise<WarehouseSession>;
  end(): Promise<void>;
}

const SAFE_IDENTIFIER = /^[a-z_][a-z0-9_]{0,62}$/;

/** Table and column names are interpolated as identifiers; only plain lower-case names are accepted. */
export function assertSafeIdentifier(name: string): string {
  if (!SAFE_IDENTIFIER.test(name)) {
    throw new Error(`Unsafe SQL identifier "${name}"`);
  }
  return name;
}
