/**
 * Typed schema reconciliation: compares a declared, ordered column list with
 * what the warehouse reports and yields the changes to make. Computing the
 * diff issues no DDL; callers apply `SchemaChange`s through the session.
 */

export interface ColumnSpec {
  name: string;
  type: string;
}

export interface TableSpec {
  name: string;
  columns: ColumnSpec[];
  primaryKey: string[];
}

export interface IncompatibleColumn {
  name: string;
  declaredType: string;
  actualType: string;
}

export interface SchemaDiff {
  missingColumns: ColumnSpec[];
  incompatibleColumns: IncompatibleColumn[];
}

export type SchemaChange =
  | { type: 'create-table'; table: TableSpec }
  | { type: 'add-column'; table: string; column: ColumnSpec }
  | { type: 'drop-table'; table: string };

// Spellings that refer to the same storage class. Length and precision
// modifiers are stripped before lookup.
const TYPE_FAMILIES: Record<string, string> = {
  varchar: 'varchar',
  'character varying': 'varchar',
  text: 'text',
  string: 'text',
  timestamp: 'timestamp',
  'timestamp without time zone': 'timestamp',
  'timestamp with time zone': 'timestamp',
  timestamptz: 'timestamp',
  timestamp_ntz: 'timestamp',
  timestamp_ltz: 'timestamp',
  timestamp_tz: 'timestamp',
  'double precision': 'float8',
  float8: 'float8',
  float: 'float8',
  bigint: 'int8',
  int8: 'int8',
  integer: 'int4',
  int: 'int4',
  int4: 'int4',
  boolean: 'bool',
  bool: 'bool',
  date: 'date',
};

export function normalizeColumnType(type: string): string {
  const base = String(type || '')
    .trim()
    .toLowerCase()
    .replace(/\s*\(.*\)\s*$/, '')
    .replace(/\s+/g, ' ');
  return TYPE_FAMILIES[base] ?? base;
}

export function typesCompatible(actualType: string, declaredType: string): boolean {
  return normalizeColumnType(actualType) === normalizeColumnType(declaredType);
}

/** Column names are compared case-insensitively. Extra actual columns are ignored. */
export function diffSchema(declared: readonly ColumnSpec[], actual: readonly ColumnSpec[]): SchemaDiff {
  const actualByName = new Map<string, ColumnSpec>();
  for (const column of actual) actualByName.set(column.name.toLowerCase(), column);

  const missingColumns: ColumnSpec[] = [];
  const incompatibleColumns: IncompatibleColumn[] = [];
  for (const column of declared) {
    const present = actualByName.get(column.name.toLowerCase());
    if (!present) {
      missingColumns.push(column);
    } else if (!typesCompatible(present.type, column.type)) {
      incompatibleColumns.push({ name: column.name, declaredType: column.type, actualType: present.type });
    }
  }
  return { missingColumns, incompatibleColumns };
}

export function isSchemaInSync(diff: SchemaDiff): boolean {
  return diff.missingColumns.length === 0 && diff.incompatibleColumns.length === 0;
}
