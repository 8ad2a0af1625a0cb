import { Pool } from 'pg';
import { Kysely, PostgresDialect } from 'kysely';
import { moduleLogger } from './logger.js';
import { errorMessage } from './lib/errors.js';
import { PostgresWarehouse } from './db/postgresWarehouse.js';
import type { WarehouseDatabase } from './db/types.js';

const log = moduleLogger('db');

export interface WarehousePoolOptions {
  connectionString: string;
  sslRejectUnauthorized?: boolean;
  /** Upper bound on pinned sessions; one per concurrently syncing ticker. */
  maxConnections?: number;
}

/**
 * Builds the warehouse pool and its Kysely instance. Nothing connects until
 * the first session is opened.
 */
export function createWarehouse(options: WarehousePoolOptions): PostgresWarehouse {
  const sslRejectUnauthorized = options.sslRejectUnauthorized ?? true;
  const pool = new Pool({
    connectionString: options.connectionString,
    ssl: /sslmode=disable/i.test(options.connectionString) ? false : { rejectUnauthorized: sslRejectUnauthorized },
    max: Math.max(1, options.maxConnections ?? 5),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: 120000,
  });

  pool.on('error', (err) => {
    log.error(`Unexpected idle warehouse client error: ${errorMessage(err)}`);
  });

  const db = new Kysely<WarehouseDatabase>({
    dialect: new PostgresDialect({ pool }),
  });

  return new PostgresWarehouse(pool, db);
}
