/**
 * Postgres implementation of the warehouse session.
 *
 * Statements are built with Kysely (schema builder and `sql` templates) and
 * executed on a single checked-out `pg` client, because temporary staging
 * tables are only visible on the connection that created them.
 */

import type { Pool, PoolClient } from 'pg';
import { sql, type CompiledQuery, type CreateTableBuilder, type Kysely } from 'kysely';
import { moduleLogger } from '../logger.js';
import { errorMessage } from '../lib/errors.js';
import type { ColumnSpec, SchemaChange } from '../lib/schemaDiff.js';
import type { WarehouseDatabase } from './types.js';
import {
  assertSafeIdentifier,
  type UpsertSpec,
  type Warehouse,
  type WarehouseRow,
  type WarehouseSession,
} from './warehouseSession.js';

const log = moduleLogger('warehouse');

const SLOW_QUERY_THRESHOLD_MS = Math.max(0, Number(process.env.SLOW_QUERY_THRESHOLD_MS) || 500);
/** Rows per INSERT statement; keeps parameter counts well under the 65535 limit. */
const INSERT_CHUNK_SIZE = 500;

function describeSql(text: string): string {
  return text.replace(/\s+/g, ' ').trim().slice(0, 200);
}

export class PostgresWarehouseSession implements WarehouseSession {
  private released = false;

  constructor(
    private readonly client: PoolClient,
    private readonly db: Kysely<WarehouseDatabase>,
  ) {}

  private async run<R extends Record<string, unknown>>(compiled: CompiledQuery<unknown>): Promise<{ rows: R[]; rowCount: number }> {
    if (this.released) throw new Error('Warehouse session is closed');
    const start = performance.now();
    try {
      const result = await this.client.query<R>(compiled.sql, [...compiled.parameters]);
      const durationMs = performance.now() - start;
      if (durationMs >= SLOW_QUERY_THRESHOLD_MS) {
        log.warn(`[slow-query] duration=${Math.round(durationMs)}ms sql=${describeSql(compiled.sql)}`);
      }
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    } catch (err: unknown) {
      log.error(
        `[query-error] duration=${Math.round(performance.now() - start)}ms sql=${describeSql(compiled.sql)} error=${errorMessage(err)}`,
      );
      throw err;
    }
  }

  async tableExists(table: string): Promise<boolean> {
    const { rows } = await this.run<{ table_count: number }>(
      sql`
        SELECT COUNT(*)::int AS table_count
        FROM information_schema.tables
        WHERE table_name = ${assertSafeIdentifier(table)}
          AND table_schema = current_schema()
      `.compile(this.db),
    );
    return Number(rows[0]?.table_count ?? 0) > 0;
  }

  async describeTable(table: string): Promise<ColumnSpec[]> {
    const { rows } = await this.run<{ column_name: string; data_type: string }>(
      sql`
        SELECT column_name, data_type
        FROM information_schema.columns
        WHERE table_name = ${assertSafeIdentifier(table)}
          AND table_schema = current_schema()
        ORDER BY ordinal_position
      `.compile(this.db),
    );
    return rows.map((row) => ({ name: row.column_name, type: row.data_type }));
  }

  async countRows(table: string, tickers?: readonly string[]): Promise<number> {
    if (tickers && tickers.length === 0) return 0;
    const scope = tickers ? sql`WHERE ticker IN (${sql.join([...tickers])})` : sql``;
    const { rows } = await this.run<{ row_count: number }>(
      sql`SELECT COUNT(*)::int AS row_count FROM ${sql.table(assertSafeIdentifier(table))} ${scope}`.compile(this.db),
    );
    return Number(rows[0]?.row_count ?? 0);
  }

  async applySchemaChange(change: SchemaChange): Promise<void> {
    switch (change.type) {
      case 'create-table': {
        const { table } = change;
        let builder: CreateTableBuilder<string, string> = this.db.schema
          .createTable(assertSafeIdentifier(table.name))
          .ifNotExists();
        for (const column of table.columns) {
          builder = builder.addColumn(assertSafeIdentifier(column.name), sql.raw(column.type));
        }
        if (table.primaryKey.length > 0) {
          builder = builder.addPrimaryKeyConstraint(
            `${table.name}_pkey`,
            table.primaryKey.map((name) => assertSafeIdentifier(name)),
          );
        }
        await this.run(builder.compile());
        return;
      }
      case 'add-column':
        await this.run(
          this.db.schema
            .alterTable(assertSafeIdentifier(change.table))
            .addColumn(assertSafeIdentifier(change.column.name), sql.raw(change.column.type))
            .compile(),
        );
        return;
      case 'drop-table':
        await this.dropTable(change.table);
        return;
    }
  }

  async createStagingTable(table: string, columns: readonly ColumnSpec[]): Promise<void> {
    let builder: CreateTableBuilder<string, string> = this.db.schema.createTable(assertSafeIdentifier(table)).temporary();
    for (const column of columns) {
      builder = builder.addColumn(assertSafeIdentifier(column.name), sql.raw(column.type));
    }
    await this.run(builder.compile());
  }

  async insertRows(table: string, columns: readonly string[], rows: readonly WarehouseRow[]): Promise<number> {
    if (rows.length === 0) return 0;
    const columnList = sql.join(columns.map((name) => sql.id(assertSafeIdentifier(name))));
    let inserted = 0;
    for (let offset = 0; offset < rows.length; offset += INSERT_CHUNK_SIZE) {
      const chunk = rows.slice(offset, offset + INSERT_CHUNK_SIZE);
      const values = sql.join(chunk.map((row) => sql`(${sql.join(columns.map((name) => row[name] ?? null))})`));
      const { rowCount } = await this.run(
        sql`INSERT INTO ${sql.table(assertSafeIdentifier(table))} (${columnList}) VALUES ${values}`.compile(this.db),
      );
      inserted += rowCount;
    }
    return inserted;
  }

  async upsertFromStaging(spec: UpsertSpec): Promise<void> {
    const columns = spec.columns.map((name) => sql.id(assertSafeIdentifier(name)));
    const keys = spec.keyColumns.map((name) => sql.id(assertSafeIdentifier(name)));
    const updates = spec.columns
      .filter((name) => !spec.keyColumns.includes(name))
      .map((name) => sql`${sql.id(name)} = EXCLUDED.${sql.id(name)}`);
    const onConflict = updates.length > 0 ? sql`DO UPDATE SET ${sql.join(updates)}` : sql`DO NOTHING`;

    await this.run(
      sql`
        INSERT INTO ${sql.table(assertSafeIdentifier(spec.target))} (${sql.join(columns)})
        SELECT ${sql.join(columns)} FROM ${sql.table(assertSafeIdentifier(spec.staging))}
        ON CONFLICT (${sql.join(keys)}) ${onConflict}
      `.compile(this.db),
    );
  }

  async dropTable(table: string): Promise<void> {
    await this.run(this.db.schema.dropTable(assertSafeIdentifier(table)).ifExists().compile());
  }

  async selectRecent(table: string, ticker: string, orderColumn: string, limit: number): Promise<Record<string, unknown>[]> {
    const { rows } = await this.run<Record<string, unknown>>(
      sql`
        SELECT * FROM ${sql.table(assertSafeIdentifier(table))}
        WHERE ticker = ${ticker}
        ORDER BY ${sql.id(assertSafeIdentifier(orderColumn))} DESC
        LIMIT ${Math.max(1, Math.floor(limit))}
      `.compile(this.db),
    );
    return rows;
  }

  async close(): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.client.release();
  }
}

export class PostgresWarehouse implements Warehouse {
  constructor(
    private readonly pool: Pool,
    private readonly db: Kysely<WarehouseDatabase>,
  ) {}

  async openSession(): Promise<WarehouseSession> {
    const client = await this.pool.connect();
    return new PostgresWarehouseSession(client, this.db);
  }

  async end(): Promise<void> {
    await this.db.destroy();
  }
}
