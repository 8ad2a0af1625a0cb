import type { ColumnSpec, SchemaChange } from '../../server/lib/schemaDiff.js';
import type { UpsertSpec, Warehouse, WarehouseRow, WarehouseSession } from '../../server/db/warehouseSession.js';

export interface InMemoryTable {
  columns: ColumnSpec[];
  primaryKey: string[];
  rows: WarehouseRow[];
  temporary: boolean;
}

export interface InMemoryWarehouseOptions {
  /** insertRows reports success but stores nothing. */
  dropStagedRows?: boolean;
  /** Operations that throw when called, by session method name. */
  failOn?: ReadonlyArray<keyof WarehouseSession>;
  /** Milliseconds each named operation waits before it runs. */
  latencyMs?: Partial<Record<keyof WarehouseSession, number>>;
}

/**
 * In-process stand-in for the Postgres warehouse. Tables are shared across
 * sessions; temporary tables disappear when the session that made them closes.
 */
export class InMemoryWarehouse implements Warehouse {
  readonly tables = new Map<string, InMemoryTable>();
  readonly operations: string[] = [];
  /** Seeded from `failOn`; tests may change it between runs. */
  readonly failing: Set<keyof WarehouseSession>;
  sessionsOpened = 0;
  sessionsClosed = 0;
  ended = false;

  constructor(readonly options: InMemoryWarehouseOptions = {}) {
    this.failing = new Set(options.failOn ?? []);
  }

  async openSession(): Promise<WarehouseSession> {
    this.sessionsOpened += 1;
    return new InMemorySession(this);
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  seedTable(name: string, columns: ColumnSpec[], primaryKey: string[], rows: WarehouseRow[] = []): void {
    this.tables.set(name, { columns, primaryKey, rows: rows.map((row) => ({ ...row })), temporary: false });
  }

  rowsOf(name: string): WarehouseRow[] {
    return this.tables.get(name)?.rows ?? [];
  }

  stagingTables(): string[] {
    return [...this.tables.keys()].filter((name) => name.startsWith('stage_'));
  }
}

class InMemorySession implements WarehouseSession {
  private readonly ownTemporary = new Set<string>();
  private closed = false;

  constructor(private readonly warehouse: InMemoryWarehouse) {}

  private async guard(op: keyof WarehouseSession, detail: string): Promise<void> {
    if (this.closed) throw new Error('session closed');
    this.warehouse.operations.push(`${op} ${detail}`);
    const latency = this.warehouse.options.latencyMs?.[op] ?? 0;
    if (latency > 0) await new Promise<void>((resolve) => setTimeout(resolve, latency));
    if (this.warehouse.failing.has(op)) {
      throw new Error(`simulated ${op} failure`);
    }
  }

  private table(name: string): InMemoryTable {
    const table = this.warehouse.tables.get(name);
    if (!table) throw new Error(`relation "${name}" does not exist`);
    return table;
  }

  async tableExists(table: string): Promise<boolean> {
    await this.guard('tableExists', table);
    return this.warehouse.tables.has(table);
  }

  async describeTable(table: string): Promise<ColumnSpec[]> {
    await this.guard('describeTable', table);
    return this.table(table).columns.map((column) => ({ ...column }));
  }

  async countRows(table: string, tickers?: readonly string[]): Promise<number> {
    await this.guard('countRows', tickers ? `${table} ${tickers.join(',')}` : table);
    const { rows } = this.table(table);
    if (!tickers) return rows.length;
    return rows.filter((row) => typeof row.ticker === 'string' && tickers.includes(row.ticker)).length;
  }

  async applySchemaChange(change: SchemaChange): Promise<void> {
    await this.guard('applySchemaChange', `${change.type} ${change.type === 'create-table' ? change.table.name : change.table}`);
    switch (change.type) {
      case 'create-table':
        if (this.warehouse.tables.has(change.table.name)) return;
        this.warehouse.tables.set(change.table.name, {
          columns: change.table.columns.map((c) => ({ ...c })),
          primaryKey: [...change.table.primaryKey],
          rows: [],
          temporary: false,
        });
        return;
      case 'add-column': {
        const table = this.table(change.table);
        table.columns.push({ ...change.column });
        for (const row of table.rows) row[change.column.name] = null;
        return;
      }
      case 'drop-table':
        this.warehouse.tables.delete(change.table);
        return;
    }
  }

  async createStagingTable(table: string, columns: readonly ColumnSpec[]): Promise<void> {
    await this.guard('createStagingTable', table);
    this.warehouse.tables.set(table, { columns: columns.map((c) => ({ ...c })), primaryKey: [], rows: [], temporary: true });
    this.ownTemporary.add(table);
  }

  async insertRows(table: string, columns: readonly string[], rows: readonly WarehouseRow[]): Promise<number> {
    await this.guard('insertRows', `${table} ${rows.length}`);
    const target = this.table(table);
    if (!this.warehouse.options.dropStagedRows) {
      for (const row of rows) {
        const stored: WarehouseRow = {};
        for (const name of columns) stored[name] = row[name] ?? null;
        target.rows.push(stored);
      }
    }
    return rows.length;
  }

  async upsertFromStaging(spec: UpsertSpec): Promise<void> {
    await this.guard('upsertFromStaging', `${spec.staging} -> ${spec.target}`);
    const target = this.table(spec.target);
    const staging = this.table(spec.staging);
    const keyOf = (row: WarehouseRow) => spec.keyColumns.map((name) => String(row[name])).join('|');
    const indexByKey = new Map<string, number>();
    target.rows.forEach((row, i) => indexByKey.set(keyOf(row), i));

    for (const row of staging.rows) {
      const key = keyOf(row);
      const next: WarehouseRow = {};
      for (const name of spec.columns) next[name] = row[name] ?? null;
      const existing = indexByKey.get(key);
      if (existing === undefined) {
        indexByKey.set(key, target.rows.length);
        target.rows.push(next);
      } else {
        target.rows[existing] = { ...target.rows[existing], ...next };
      }
    }
  }

  async dropTable(table: string): Promise<void> {
    await this.guard('dropTable', table);
    this.warehouse.tables.delete(table);
    this.ownTemporary.delete(table);
  }

  async selectRecent(table: string, ticker: string, orderColumn: string, limit: number): Promise<Record<string, unknown>[]> {
    await this.guard('selectRecent', table);
    return this.table(table)
      .rows.filter((row) => row.ticker === ticker)
      .sort((a, b) => String(b[orderColumn]).localeCompare(String(a[orderColumn])))
      .slice(0, limit);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    for (const name of this.ownTemporary) this.warehouse.tables.delete(name);
    this.ownTemporary.clear();
    this.closed = true;
    this.warehouse.sessionsClosed += 1;
  }
}
