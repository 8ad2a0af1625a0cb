/**
 * Remote Sync Engine: verified, staged, key-based upsert of one batch into
 * a permanent warehouse table.
 *
 *   schema-check → stage-create → stage-write → stage-verify → upsert → cleanup
 *
 * Any phase can end the call in `failed`. The permanent table only changes in
 * schema-check (DDL, decided before anything is written) and in the single
 * upsert statement, so a failure elsewhere leaves its rows untouched. The
 * staging table is dropped whatever happens.
 *
 * Several calls may target one table at once, each on its own session. Row
 * counts are scoped to the tickers in the batch so they never see another
 * call's inserts.
 */

import { v4 as uuidv4 } from 'uuid';
import { moduleLogger } from '../logger.js';
import {
  errorMessage,
  RemoteSchemaError,
  RemoteSyncError,
  RemoteWriteVerificationError,
  toSyncError,
  type SyncError,
} from '../lib/errors.js';
import { diffSchema, isSchemaInSync, type ColumnSpec, type TableSpec } from '../lib/schemaDiff.js';
import type { WarehouseRow, WarehouseSession } from '../db/warehouseSession.js';
import { dedupeRecords } from './datasetMerge.js';
import {
  keyColumns,
  newsDataset,
  priceHistoryDataset,
  type DataKind,
  type DatasetDefinition,
  type DatasetRecord,
} from './datasetDefinitions.js';

const log = moduleLogger('remote-sync');

export type RemoteSyncPhase = 'schema-check' | 'stage-create' | 'stage-write' | 'stage-verify' | 'upsert' | 'cleanup';

export type RemoteSyncOutcome =
  | { ok: true; table: string; staged: number; rowsAdded: number; beforeCount: number; afterCount: number }
  | { ok: false; table: string; phase: RemoteSyncPhase; error: SyncError };

export interface RemoteSyncOptions {
  onPhase?: (phase: RemoteSyncPhase) => void;
}

export type TableNames = Record<DataKind, string>;

export const DEFAULT_TABLE_NAMES: TableNames = {
  'price-history': 'stock_price_history',
  news: 'stock_news',
};

export function tableSpecFor<R extends DatasetRecord>(definition: DatasetDefinition<R>, table: string): TableSpec {
  return {
    name: table,
    columns: definition.columns.map((c) => ({ name: c.remote, type: c.type })),
    primaryKey: keyColumns(definition).map((c) => c.remote),
  };
}

export function tableSpecForKind(kind: DataKind, table: string): TableSpec {
  return kind === 'news' ? tableSpecFor(newsDataset, table) : tableSpecFor(priceHistoryDataset, table);
}

function tickersOf(rows: readonly WarehouseRow[]): string[] {
  const tickers = new Set<string>();
  for (const row of rows) {
    if (typeof row.ticker === 'string') tickers.add(row.ticker);
  }
  return [...tickers];
}

export function toWarehouseRows<R extends DatasetRecord>(definition: DatasetDefinition<R>, records: readonly R[]): WarehouseRow[] {
  return records.map((record) => {
    const row: WarehouseRow = {};
    for (const column of definition.columns) row[column.remote] = record[column.field];
    return row;
  });
}

function stagingTableName(table: string): string {
  // Postgres identifiers cap at 63 chars; the uuid suffix keeps concurrent calls apart.
  return `stage_${table.slice(0, 20)}_${uuidv4().replace(/-/g, '')}`;
}

export class RemoteSyncService {
  private readonly tables: TableNames;

  constructor(
    private readonly session: WarehouseSession,
    tables: Partial<TableNames> = {},
  ) {
    this.tables = { ...DEFAULT_TABLE_NAMES, ...tables };
  }

  tableFor(kind: DataKind): string {
    return this.tables[kind];
  }

  /**
   * Bring the permanent table in line with the declared schema. Missing
   * columns are added; incompatible types are only repaired on an empty
   * table (drop and recreate), otherwise the call fails before any DDL.
   * The create is idempotent and the table is described afterwards, so a
   * concurrent caller that created it first is not an error.
   */
  async ensureTable(spec: TableSpec): Promise<void> {
    if (!(await this.session.tableExists(spec.name))) {
      log.info(`creating table ${spec.name}`);
      await this.session.applySchemaChange({ type: 'create-table', table: spec });
    }

    const actual = await this.session.describeTable(spec.name);
    const diff = diffSchema(spec.columns, actual);
    if (isSchemaInSync(diff)) return;

    if (diff.incompatibleColumns.length > 0) {
      const rowCount = await this.session.countRows(spec.name);
      if (rowCount > 0) {
        for (const column of diff.incompatibleColumns) {
          log.error(
            `${spec.name}.${column.name} is ${column.actualType}, declared ${column.declaredType}; manual intervention required`,
          );
        }
        throw new RemoteSchemaError(
          spec.name,
          diff.incompatibleColumns.map((c) => c.name),
        );
      }
      log.warn(`${spec.name} is empty with incompatible columns; recreating`);
      await this.session.applySchemaChange({ type: 'drop-table', table: spec.name });
      await this.session.applySchemaChange({ type: 'create-table', table: spec });
      return;
    }

    for (const column of diff.missingColumns) {
      log.info(`adding column ${spec.name}.${column.name} ${column.type}`);
      await this.session.applySchemaChange({ type: 'add-column', table: spec.name, column });
    }
  }

  async sync<R extends DatasetRecord>(
    definition: DatasetDefinition<R>,
    records: readonly R[],
    options: RemoteSyncOptions = {},
  ): Promise<RemoteSyncOutcome> {
    const table = this.tableFor(definition.kind);
    const spec = tableSpecFor(definition, table);
    const rows = toWarehouseRows(definition, dedupeRecords(definition, records));
    const stagingTable = stagingTableName(table);
    // Set before the CREATE so a half-finished create is still cleaned up.
    let stagingCreated = false;
    const progress: { phase: RemoteSyncPhase } = { phase: 'schema-check' };

    const enter = (next: RemoteSyncPhase) => {
      progress.phase = next;
      options.onPhase?.(next);
    };

    try {
      enter('schema-check');
      await this.ensureTable(spec);

      if (rows.length === 0) {
        return { ok: true, table, staged: 0, rowsAdded: 0, beforeCount: 0, afterCount: 0 };
      }
      const tickers = tickersOf(rows);

      enter('stage-create');
      stagingCreated = true;
      await this.session.createStagingTable(stagingTable, spec.columns);

      enter('stage-write');
      const reported = await this.session.insertRows(
        stagingTable,
        spec.columns.map((c: ColumnSpec) => c.name),
        rows,
      );

      enter('stage-verify');
      const staged = await this.session.countRows(stagingTable);
      if (staged === 0) {
        log.error(`staging ${stagingTable} is empty after write (reported ${reported} of ${rows.length} rows)`);
        throw new RemoteWriteVerificationError(stagingTable, rows.length);
      }

      enter('upsert');
      const beforeCount = await this.session.countRows(table, tickers);
      await this.session.upsertFromStaging({
        target: table,
        staging: stagingTable,
        columns: spec.columns.map((c) => c.name),
        keyColumns: spec.primaryKey,
      });
      const afterCount = await this.session.countRows(table, tickers);

      enter('cleanup');
      const rowsAdded = Math.max(0, afterCount - beforeCount);
      log.info(
        `${table}: ${rowsAdded} new of ${staged} staged (before ${beforeCount}, after ${afterCount})`,
      );
      return { ok: true, table, staged, rowsAdded, beforeCount, afterCount };
    } catch (err: unknown) {
      const failedPhase = progress.phase;
      const error = toSyncError(
        err,
        (message, original) => new RemoteSyncError(`${failedPhase} failed for ${table}: ${message}`, { cause: original }),
      );
      log.error(`${table} failed in ${failedPhase}: ${error.message}`);
      return { ok: false, table, phase: failedPhase, error };
    } finally {
      if (stagingCreated) {
        try {
          await this.session.dropTable(stagingTable);
        } catch (cleanupErr: unknown) {
          log.warn(`could not drop staging ${stagingTable}: ${errorMessage(cleanupErr)}`);
        }
      }
    }
  }

  /** Create or repair the permanent table of each kind. */
  async prepareTables(kinds: readonly DataKind[]): Promise<void> {
    for (const kind of kinds) {
      await this.ensureTable(tableSpecForKind(kind, this.tableFor(kind)));
    }
  }

  /** Rows the warehouse holds for one ticker; 0 when the table is missing. */
  async countTickerRows(kind: DataKind, ticker: string): Promise<number> {
    const table = this.tableFor(kind);
    if (!(await this.session.tableExists(table))) return 0;
    return this.session.countRows(table, [ticker]);
  }

  /** Latest rows stored remotely for one ticker. */
  async queryRecent<R extends DatasetRecord>(
    definition: DatasetDefinition<R>,
    ticker: string,
    limit = 10,
  ): Promise<Record<string, unknown>[]> {
    const orderColumn = definition.kind === 'news' ? 'publish_time' : 'date';
    return this.session.selectRecent(this.tableFor(definition.kind), ticker, orderColumn, limit);
  }
}
