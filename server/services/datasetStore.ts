/**
 * Local State Store: one columnar JSON file per (kind, ticker).
 *
 * Files are replaced wholesale. A write goes to a uniquely named sibling temp
 * file which is then renamed over the target, so readers only ever see a
 * complete previous or complete next version.
 */

import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { moduleLogger } from '../logger.js';
import { errorMessage, LocalReadError, LocalWriteError } from '../lib/errors.js';
import {
  normalizeTicker,
  type DataKind,
  type DatasetDefinition,
  type DatasetRecord,
  type ScalarValue,
} from './datasetDefinitions.js';

const log = moduleLogger('dataset-store');

const COLUMNAR_FORMAT = 'columnar-v1';

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const ColumnarFileSchema = z.object({
  format: z.literal(COLUMNAR_FORMAT),
  kind: z.string(),
  ticker: z.string(),
  rowCount: z.number().int().nonnegative(),
  writtenAt: z.string().optional(),
  columns: z.record(z.array(ScalarSchema)),
});

type ColumnarFile = z.infer<typeof ColumnarFileSchema>;

/** Derived from the dataset on every planning cycle; never stored. */
export interface SyncState {
  count: number;
  /** Smallest sync value (date or publish time); null when empty. */
  minValue: string | null;
  maxValue: string | null;
}

export function syncStateOf<R extends DatasetRecord>(definition: DatasetDefinition<R>, records: readonly R[]): SyncState {
  let minValue: string | null = null;
  let maxValue: string | null = null;
  for (const record of records) {
    const value = definition.syncValueOf(record);
    if (minValue === null || value < minValue) minValue = value;
    if (maxValue === null || value > maxValue) maxValue = value;
  }
  return { count: records.length, minValue, maxValue };
}

function isMissingFileError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export function toColumnar<R extends DatasetRecord>(
  definition: DatasetDefinition<R>,
  ticker: string,
  records: readonly R[],
  writtenAt: Date = new Date(),
): ColumnarFile {
  const columns: Record<string, ScalarValue[]> = {};
  for (const column of definition.columns) {
    columns[column.local] = records.map((r) => r[column.field]);
  }
  return {
    format: COLUMNAR_FORMAT,
    kind: definition.kind,
    ticker,
    rowCount: records.length,
    writtenAt: writtenAt.toISOString(),
    columns,
  };
}

export function fromColumnar<R extends DatasetRecord>(
  definition: DatasetDefinition<R>,
  file: ColumnarFile,
): { ok: true; records: R[] } | { ok: false; reason: string } {
  for (const column of definition.columns) {
    const values = file.columns[column.local];
    if (!values) return { ok: false, reason: `missing column ${column.local}` };
    if (values.length !== file.rowCount) {
      return { ok: false, reason: `column ${column.local} has ${values.length} values, expected ${file.rowCount}` };
    }
  }
  const rows: Record<string, ScalarValue>[] = [];
  for (let i = 0; i < file.rowCount; i++) {
    const row: Record<string, ScalarValue> = {};
    for (const column of definition.columns) {
      row[column.field] = file.columns[column.local][i];
    }
    rows.push(row);
  }
  return validateRecords(definition, rows);
}

/** Check rows against the dataset's record schema, naming the first bad row and field. */
export function validateRecords<R extends DatasetRecord>(
  definition: DatasetDefinition<R>,
  rows: readonly unknown[],
): { ok: true; records: R[] } | { ok: false; reason: string } {
  const parsed = z.array(definition.recordSchema).safeParse(rows);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.map(String).join('.') : '?';
    return { ok: false, reason: `row ${where}: ${issue?.message ?? 'invalid'}` };
  }
  return { ok: true, records: parsed.data };
}

export class DatasetStore {
  readonly rootDir: string;

  constructor(rootDir = './data') {
    this.rootDir = path.resolve(rootDir);
  }

  dirFor(kind: DataKind, ticker: string): string {
    return path.join(this.rootDir, kind, encodeURIComponent(normalizeTicker(ticker)));
  }

  pathFor(kind: DataKind, ticker: string): string {
    const symbol = normalizeTicker(ticker);
    return path.join(this.dirFor(kind, symbol), `${kind}-${encodeURIComponent(symbol)}.json`);
  }

  async read<R extends DatasetRecord>(definition: DatasetDefinition<R>, ticker: string): Promise<R[]> {
    const filePath = this.pathFor(definition.kind, ticker);
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (err: unknown) {
      if (isMissingFileError(err)) return [];
      throw new LocalReadError(filePath, `Failed to read ${filePath}: ${errorMessage(err)}`, { cause: err });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err: unknown) {
      throw new LocalReadError(filePath, `Dataset ${filePath} is not valid JSON`, { cause: err });
    }
    const file = ColumnarFileSchema.safeParse(payload);
    if (!file.success) {
      throw new LocalReadError(filePath, `Dataset ${filePath} is not a ${COLUMNAR_FORMAT} file`);
    }
    const decoded = fromColumnar(definition, file.data);
    if (!decoded.ok) {
      throw new LocalReadError(filePath, `Dataset ${filePath} is corrupt: ${decoded.reason}`);
    }
    log.debug(`loaded ${decoded.records.length} ${definition.kind} records for ${normalizeTicker(ticker)}`);
    return decoded.records;
  }

  /**
   * Replace the dataset atomically. Records that the reader would reject are
   * refused before anything touches disk. Raises LocalWriteError; never leaves
   * a partial file at `pathFor`.
   */
  async write<R extends DatasetRecord>(
    definition: DatasetDefinition<R>,
    ticker: string,
    records: readonly R[],
  ): Promise<string> {
    const symbol = normalizeTicker(ticker);
    const filePath = this.pathFor(definition.kind, symbol);
    const checked = validateRecords(definition, records);
    if (!checked.ok) {
      throw new LocalWriteError(filePath, `Refusing to write ${filePath}: ${checked.reason}`);
    }
    const tempPath = `${filePath}.${uuidv4()}.tmp`;
    const body = JSON.stringify(toColumnar(definition, symbol, records));

    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(tempPath, body, 'utf8');
      await rename(tempPath, filePath);
    } catch (err: unknown) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        log.warn(`could not remove temp file ${tempPath}: ${errorMessage(cleanupErr)}`);
      });
      throw new LocalWriteError(filePath, `Failed to write ${filePath}: ${errorMessage(err)}`, { cause: err });
    }

    log.info(`saved ${records.length} ${definition.kind} records to ${filePath}`);
    return filePath;
  }

  /** Tickers that already have a dataset of this kind. */
  async listTickers(kind: DataKind): Promise<string[]> {
    const kindDir = path.join(this.rootDir, kind);
    let entries: string[];
    try {
      entries = await readdir(kindDir);
    } catch (err: unknown) {
      if (isMissingFileError(err)) return [];
      throw new LocalReadError(kindDir, `Failed to list ${kindDir}: ${errorMessage(err)}`, { cause: err });
    }
    return entries.map((entry) => decodeURIComponent(entry)).sort();
  }
}
