import 'dotenv/config';
import { moduleLogger } from './logger.js';
import { ConfigurationError } from './lib/errors.js';
import { isDateKey } from './lib/dateUtils.js';
import { DATA_KINDS, normalizeTicker, type DataKind } from './services/datasetDefinitions.js';
import { SERIES_INTERVALS, type SeriesInterval } from './services/marketDataProvider.js';

const log = moduleLogger('config');

type Env = Record<string, string | undefined>;

export interface SyncConfig {
  tickers: string[];
  dataKinds: DataKind[];
  period: string;
  interval: SeriesInterval;
  maxNewsItems: number;
  skipRemote: boolean;
  forceFull: boolean;
  concurrency: number;
  retryAttempts: number;
  retryBaseDelayMs: number;
  /** Datasets whose first date is on or after this key are refetched in full. */
  backfillCutoff: string;
  dataDir: string;
  warehouseUrl: string;
  priceTable: string;
  newsTable: string;
  sslRejectUnauthorized: boolean;
}

// --- Defaults ---
export const DEFAULT_CONCURRENCY = 3;
export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 2_000;
export const DEFAULT_BACKFILL_CUTOFF = '2000-01-01';
export const DEFAULT_MAX_NEWS_ITEMS = 10;

function flag(raw: string | undefined, fallback: boolean): boolean {
  const value = String(raw ?? '').trim().toLowerCase();
  if (!value) return fallback;
  return value === 'true' || value === '1' || value === 'yes';
}

function list(raw: string | undefined): string[] {
  return String(raw ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function isDataKind(value: string): value is DataKind {
  return DATA_KINDS.some((kind) => kind === value);
}

function isSeriesInterval(value: string): value is SeriesInterval {
  return SERIES_INTERVALS.some((interval) => interval === value);
}

/** Pure read of the environment; invalid values fall back to defaults and are reported by validateStartupEnvironment. */
export function readSyncConfig(env: Env = process.env): SyncConfig {
  const kinds = list(env.SYNC_DATA_KINDS).map((k) => k.toLowerCase()).filter(isDataKind);
  const interval = String(env.SYNC_INTERVAL ?? '').trim();
  const cutoff = String(env.SYNC_BACKFILL_CUTOFF ?? '').trim();
  return {
    tickers: [...new Set(list(env.SYNC_TICKERS).map(normalizeTicker))],
    dataKinds: kinds.length > 0 ? [...new Set(kinds)] : ['price-history'],
    period: String(env.SYNC_PERIOD || 'max').trim(),
    interval: isSeriesInterval(interval) ? interval : '1d',
    maxNewsItems: Math.max(1, Math.floor(Number(env.SYNC_MAX_NEWS_ITEMS) || DEFAULT_MAX_NEWS_ITEMS)),
    skipRemote: flag(env.SYNC_SKIP_REMOTE, false),
    forceFull: flag(env.SYNC_FORCE_FULL, false),
    concurrency: Math.max(1, Math.floor(Number(env.SYNC_CONCURRENCY) || DEFAULT_CONCURRENCY)),
    retryAttempts: Math.max(1, Math.floor(Number(env.SYNC_RETRY_ATTEMPTS) || DEFAULT_RETRY_ATTEMPTS)),
    retryBaseDelayMs: Math.max(0, Number(env.SYNC_RETRY_BASE_DELAY_MS || DEFAULT_RETRY_BASE_DELAY_MS) || 0),
    backfillCutoff: isDateKey(cutoff) ? cutoff : DEFAULT_BACKFILL_CUTOFF,
    dataDir: String(env.SYNC_DATA_DIR || './data').trim(),
    warehouseUrl: String(env.WAREHOUSE_DATABASE_URL || '').trim(),
    priceTable: String(env.WAREHOUSE_PRICE_TABLE || 'stock_price_history').trim(),
    newsTable: String(env.WAREHOUSE_NEWS_TABLE || 'stock_news').trim(),
    sslRejectUnauthorized: flag(env.DB_SSL_REJECT_UNAUTHORIZED, true),
  };
}

// --- Startup validation ---
export function validateStartupEnvironment(env: Env = process.env): SyncConfig {
  const errors: string[] = [];
  const warnings: string[] = [];

  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };
  ['SYNC_CONCURRENCY', 'SYNC_RETRY_ATTEMPTS', 'SYNC_MAX_NEWS_ITEMS'].forEach(warnIfInvalidPositiveNumber);

  const rawDelay = env.SYNC_RETRY_BASE_DELAY_MS;
  if (rawDelay !== undefined && rawDelay !== '' && !(Number(rawDelay) >= 0)) {
    warnings.push(`SYNC_RETRY_BASE_DELAY_MS should be a non-negative number (received: ${rawDelay})`);
  }

  const rawKinds = list(env.SYNC_DATA_KINDS);
  for (const kind of rawKinds) {
    if (!isDataKind(kind.toLowerCase())) warnings.push(`SYNC_DATA_KINDS: unknown kind "${kind}" ignored`);
  }
  const rawInterval = String(env.SYNC_INTERVAL ?? '').trim();
  if (rawInterval && !isSeriesInterval(rawInterval)) {
    errors.push(`SYNC_INTERVAL must be one of ${SERIES_INTERVALS.join(', ')} (received: ${rawInterval})`);
  }
  const rawCutoff = String(env.SYNC_BACKFILL_CUTOFF ?? '').trim();
  if (rawCutoff && !isDateKey(rawCutoff)) {
    errors.push(`SYNC_BACKFILL_CUTOFF must be a YYYY-MM-DD date (received: ${rawCutoff})`);
  }

  const config = readSyncConfig(env);
  if (!config.skipRemote && !config.warehouseUrl) {
    errors.push('WAREHOUSE_DATABASE_URL is required unless SYNC_SKIP_REMOTE is true');
  }
  for (const [name, table] of [
    ['WAREHOUSE_PRICE_TABLE', config.priceTable],
    ['WAREHOUSE_NEWS_TABLE', config.newsTable],
  ] as const) {
    if (!/^[a-z_][a-z0-9_]{0,62}$/.test(table)) errors.push(`${name} must be a lower-case SQL identifier (received: ${table})`);
  }
  if (config.tickers.length === 0) {
    warnings.push('SYNC_TICKERS is empty; only tickers already stored locally will be refreshed');
  }

  for (const warning of warnings) {
    log.warn(`[startup-env] ${warning}`);
  }
  if (errors.length > 0) {
    for (const error of errors) {
      log.error(`[startup-env] ${error}`);
    }
    throw new ConfigurationError(errors);
  }
  return config;
}
