/**
 * Error taxonomy for the sync pipeline.
 *
 * Every failure that reaches a ticker result is one of these, so callers can
 * branch on `kind` instead of parsing messages. `toSyncError` folds anything
 * else into the closest kind for the stage it came from.
 */

export type SyncErrorKind =
  | 'transient-fetch'
  | 'local-read'
  | 'local-write'
  | 'remote-schema'
  | 'remote-write-verification'
  | 'remote-sync'
  | 'configuration';

export class SyncError extends Error {
  readonly kind: SyncErrorKind;

  constructor(kind: SyncErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
    this.kind = kind;
  }
}

/** Network or rate-limit failure talking to the data provider. Always retryable. */
export class TransientFetchError extends SyncError {
  readonly httpStatus: number | null;

  constructor(message: string, options: { cause?: unknown; httpStatus?: number | null } = {}) {
    super('transient-fetch', message, { cause: options.cause });
    this.name = 'TransientFetchError';
    this.httpStatus = options.httpStatus ?? null;
  }
}

export class LocalReadError extends SyncError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('local-read', message, options);
    this.name = 'LocalReadError';
    this.filePath = filePath;
  }
}

export class LocalWriteError extends SyncError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('local-write', message, options);
    this.name = 'LocalWriteError';
    this.filePath = filePath;
  }
}

/** Declared and actual remote schema disagree on a table that already holds rows. */
export class RemoteSchemaError extends SyncError {
  readonly table: string;
  readonly columns: string[];

  constructor(table: string, columns: string[]) {
    super(
      'remote-schema',
      `Table ${table} has incompatible column types (${columns.join(', ')}) and is not empty; manual intervention required`,
    );
    this.name = 'RemoteSchemaError';
    this.table = table;
    this.columns = columns;
  }
}

export class RemoteWriteVerificationError extends SyncError {
  readonly stagingTable: string;
  readonly expectedRows: number;

  constructor(stagingTable: string, expectedRows: number) {
    super(
      'remote-write-verification',
      `Staging table ${stagingTable} is empty after writing ${expectedRows} rows`,
    );
    this.name = 'RemoteWriteVerificationError';
    this.stagingTable = stagingTable;
    this.expectedRows = expectedRows;
  }
}

export class RemoteSyncError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('remote-sync', message, options);
    this.name = 'RemoteSyncError';
  }
}

export class ConfigurationError extends SyncError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('configuration', `Configuration invalid: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export function isSyncError(err: unknown): err is SyncError {
  return err instanceof SyncError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Wraps a non-taxonomy error as `fallback` so results always carry a kind. */
export function toSyncError(err: unknown, fallback: (message: string, cause: unknown) => SyncError): SyncError {
  if (isSyncError(err)) return err;
  return fallback(errorMessage(err), err);
}
