import { moduleLogger } from '../logger.js';
import {
  ConfigurationError,
  LocalReadError,
  LocalWriteError,
  RemoteSyncError,
  TransientFetchError,
  errorMessage,
  toSyncError,
  type SyncError,
  type SyncErrorKind,
} from '../lib/errors.js';
import { isDateKey, utcDateKey } from '../lib/dateUtils.js';
import { attemptWithRetry, systemClock, type Clock, type RetryPolicy } from '../lib/retry.js';
import { mapWithConcurrency } from '../lib/mapWithConcurrency.js';
import type { Warehouse, WarehouseSession } from '../db/warehouseSession.js';
import {
  DATA_KINDS,
  newsDataset,
  normalizeTicker,
  priceHistoryDataset,
  type DataKind,
  type DatasetDefinition,
  type DatasetRecord,
} from '../services/datasetDefinitions.js';
import { dedupeRecords, emptyMergeStats, mergeRecords, type MergeStats } from '../services/datasetMerge.js';
import { syncStateOf, type DatasetStore } from '../services/datasetStore.js';
import { planNewsFetch, planSeriesFetch, type FetchPlan } from '../services/incrementalPlanner.js';
import type { MarketDataProvider, SeriesInterval } from '../services/marketDataProvider.js';
import { RemoteSyncService, type TableNames } from '../services/remoteSyncService.js';

const log = moduleLogger('ticker-sync');

export type SyncStage =
  | 'pending'
  | 'fetching'
  | 'merging'
  | 'local-saved'
  | 'staging'
  | 'upserting'
  | 'remote-synced'
  | 'done'
  | 'failed';

export type KindSyncStatus = 'synced' | 'up-to-date' | 'no-data' | 'failed';

export interface KindSyncReport {
  kind: DataKind;
  status: KindSyncStatus;
  plan: FetchPlan | null;
  /** Rows returned by the provider, before dedup. */
  fetched: number;
  stats: MergeStats;
  /** New warehouse rows for this ticker; null when nothing was upserted. */
  rowsAdded: number | null;
  stages: SyncStage[];
  error?: { kind: SyncErrorKind; message: string; stage: SyncStage };
}

export interface TickerSyncResult {
  ticker: string;
  status: 'succeeded' | 'failed';
  kinds: Partial<Record<DataKind, KindSyncReport>>;
}

export interface TickerSyncContext {
  provider: MarketDataProvider;
  store: DatasetStore;
  warehouse: Warehouse | null;
  dataKinds: readonly DataKind[];
  skipRemote: boolean;
  forceFull: boolean;
  period: string;
  interval: SeriesInterval;
  maxNewsItems: number;
  backfillCutoff: string;
  retryPolicy: RetryPolicy;
  /** Exhausted retries on a ticker with no local data count as a failure. */
  requireInitialFetch: boolean;
  tables: Partial<TableNames>;
  clock: Clock;
  onStage?: (ticker: string, kind: DataKind, stage: SyncStage) => void;
}

export interface SyncBatchOptions extends Partial<Omit<TickerSyncContext, 'provider' | 'store'>> {
  provider: MarketDataProvider;
  store: DatasetStore;
  concurrency?: number;
  onTickerSettled?: (result: TickerSyncResult) => void;
  shouldStop?: () => boolean;
}

export interface SyncBatchTotals {
  tickers: number;
  succeeded: number;
  failed: number;
  fetched: number;
  added: number;
  duplicatesRemoved: number;
  rowsAdded: number;
}

export interface SyncBatchReport {
  results: Map<string, TickerSyncResult>;
  totals: SyncBatchTotals;
}

const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 2_000, multiplier: 2 };
const DEFAULT_BATCH_CONCURRENCY = 3;

// ---------------------------------------------------------------------------
// Per-kind pipeline
// ---------------------------------------------------------------------------

interface KindPipeline<R extends DatasetRecord> {
  definition: DatasetDefinition<R>;
  plan: (existing: readonly R[], today: string) => FetchPlan;
  fetch: (plan: FetchPlan) => Promise<R[]>;
}

class StageTracker {
  readonly stages: SyncStage[] = ['pending'];

  constructor(
    private readonly ticker: string,
    private readonly kind: DataKind,
    private readonly onStage?: (ticker: string, kind: DataKind, stage: SyncStage) => void,
  ) {}

  get current(): SyncStage {
    return this.stages[this.stages.length - 1] ?? 'pending';
  }

  enter(stage: SyncStage): void {
    this.stages.push(stage);
    this.onStage?.(this.ticker, this.kind, stage);
  }
}

async function closeQuietly(session: WarehouseSession, label: string): Promise<void> {
  try {
    await session.close();
  } catch (err: unknown) {
    log.warn(`${label} could not release warehouse session: ${errorMessage(err)}`);
  }
}

async function runKindPipeline<R extends DatasetRecord>(
  ticker: string,
  pipeline: KindPipeline<R>,
  context: TickerSyncContext,
): Promise<KindSyncReport> {
  const { definition } = pipeline;
  const kind = definition.kind;
  const label = `${ticker} ${kind}`;
  const tracker = new StageTracker(ticker, kind, context.onStage);
  let plan: FetchPlan | null = null;
  let fetched = 0;
  let stats = emptyMergeStats(0);

  const finish = (status: KindSyncStatus, rowsAdded: number | null): KindSyncReport => {
    tracker.enter('done');
    return { kind, status, plan, fetched, stats, rowsAdded, stages: tracker.stages };
  };
  const fail = (error: SyncError): KindSyncReport => {
    const stage = tracker.current;
    tracker.enter('failed');
    log.error(`${label} failed during ${stage}: ${error.message}`);
    return {
      kind,
      status: 'failed',
      plan,
      fetched,
      stats,
      rowsAdded: null,
      stages: tracker.stages,
      error: { kind: error.kind, message: error.message, stage },
    };
  };

  let existing: R[];
  try {
    existing = await context.store.read(definition, ticker);
  } catch (err: unknown) {
    return fail(toSyncError(err, (message, cause) => new LocalReadError(context.store.pathFor(kind, ticker), message, { cause })));
  }
  stats = emptyMergeStats(existing.length);

  // Settle the local side first; the warehouse step below runs for every
  // outcome that leaves local data behind.
  let status: KindSyncStatus;
  let local: readonly R[] = existing;
  let fresh: readonly R[] = [];

  plan = pipeline.plan(existing, utcDateKey(context.clock.now()));
  if (plan.action === 'skip') {
    log.info(`${label} skipped: ${plan.reason}`);
    status = 'up-to-date';
  } else {
    const activePlan = plan;
    tracker.enter('fetching');
    const attempt = await attemptWithRetry(() => pipeline.fetch(activePlan), context.retryPolicy, {
      clock: context.clock,
      label,
    });
    if (attempt.status === 'exhausted') {
      if (existing.length === 0 && context.requireInitialFetch) {
        return fail(
          toSyncError(
            attempt.lastError,
            (message, cause) => new TransientFetchError(`${label}: ${attempt.attempts} attempts failed: ${message}`, { cause }),
          ),
        );
      }
      log.warn(`${label} fetch exhausted retries; keeping ${existing.length} local rows`);
      status = 'no-data';
    } else if (attempt.value.length === 0) {
      log.info(`${label} provider returned no rows`);
      status = 'no-data';
    } else {
      const incoming = attempt.value;
      fetched = incoming.length;
      tracker.enter('merging');
      const merged = mergeRecords(definition, existing, incoming);
      stats = merged.stats;
      try {
        await context.store.write(definition, ticker, merged.records);
      } catch (err: unknown) {
        return fail(toSyncError(err, (message, cause) => new LocalWriteError(context.store.pathFor(kind, ticker), message, { cause })));
      }
      tracker.enter('local-saved');
      log.info(
        `${label} merged ${stats.incoming} fetched into ${stats.before} local: ${stats.after} total, ${stats.added} added, ${stats.duplicatesRemoved} duplicates removed`,
      );
      status = 'synced';
      local = merged.records;
      fresh = dedupeRecords(definition, incoming);
    }
  }

  if (context.skipRemote || !context.warehouse || local.length === 0) {
    return finish(status, null);
  }
  const remote = await pushToWarehouse(
    ticker,
    definition,
    { local, fresh, localBefore: existing.length },
    tracker,
    context,
    context.warehouse,
  );
  if (!remote.ok) return fail(remote.error);
  return finish(status, remote.rowsAdded);
}

interface WarehouseBatch<R extends DatasetRecord> {
  /** Local dataset after this run's merge. */
  local: readonly R[];
  /** Deduplicated rows fetched in this run. */
  fresh: readonly R[];
  /** Local row count before this run's merge. */
  localBefore: number;
}

type WarehouseStep = { ok: true; rowsAdded: number | null } | { ok: false; error: SyncError };

/**
 * Upsert this run's rows. When the warehouse holds fewer rows for the ticker
 * than the local dataset held before the run, an earlier remote step failed
 * after its local save; the whole local dataset is sent instead so the
 * warehouse catches up. Resolves `rowsAdded: null` when nothing was sent.
 */
async function pushToWarehouse<R extends DatasetRecord>(
  ticker: string,
  definition: DatasetDefinition<R>,
  batch: WarehouseBatch<R>,
  tracker: StageTracker,
  context: TickerSyncContext,
  warehouse: Warehouse,
): Promise<WarehouseStep> {
  const label = `${ticker} ${definition.kind}`;
  let session: WarehouseSession;
  try {
    session = await warehouse.openSession();
  } catch (err: unknown) {
    return {
      ok: false,
      error: toSyncError(err, (message, cause) => new RemoteSyncError(`could not open warehouse session: ${message}`, { cause })),
    };
  }
  try {
    const service = new RemoteSyncService(session, context.tables);
    const remoteRows = await service.countTickerRows(definition.kind, ticker);
    const behind = remoteRows < batch.localBefore;
    const records = behind ? batch.local : batch.fresh;
    if (records.length === 0) return { ok: true, rowsAdded: null };
    if (behind) {
      log.warn(`${label} warehouse holds ${remoteRows} of ${batch.localBefore} local rows; sending all ${batch.local.length}`);
    }

    tracker.enter('staging');
    const outcome = await service.sync(definition, records, {
      onPhase: (phase) => {
        if (phase === 'upsert') tracker.enter('upserting');
      },
    });
    if (!outcome.ok) return { ok: false, error: outcome.error };
    tracker.enter('remote-synced');
    return { ok: true, rowsAdded: outcome.rowsAdded };
  } catch (err: unknown) {
    return {
      ok: false,
      error: toSyncError(err, (message, cause) => new RemoteSyncError(`${label} warehouse check failed: ${message}`, { cause })),
    };
  } finally {
    await closeQuietly(session, label);
  }
}

function pipelinesFor(ticker: string, context: TickerSyncContext): Array<() => Promise<KindSyncReport>> {
  const runners: Array<() => Promise<KindSyncReport>> = [];
  for (const kind of context.dataKinds) {
    if (kind === 'price-history') {
      runners.push(() =>
        runKindPipeline(
          ticker,
          {
            definition: priceHistoryDataset,
            plan: (existing, today) =>
              planSeriesFetch({
                syncState: syncStateOf(priceHistoryDataset, existing),
                backfillCutoff: context.backfillCutoff,
                forceFull: context.forceFull,
                today,
              }),
            fetch: (plan) =>
              context.provider.fetchSeries(
                plan.action === 'range'
                  ? { symbol: ticker, start: plan.start, end: plan.end, period: context.period, interval: context.interval }
                  : { symbol: ticker, period: context.period, interval: context.interval },
              ),
          },
          context,
        ),
      );
    } else {
      runners.push(() =>
        runKindPipeline(
          ticker,
          {
            definition: newsDataset,
            plan: () => planNewsFetch({ forceFull: context.forceFull }),
            fetch: () => context.provider.fetchNews(ticker, context.maxNewsItems),
          },
          context,
        ),
      );
    }
  }
  return runners;
}

/**
 * Sync every configured kind for one ticker. Kinds run one after another and
 * independently: a failed kind marks the ticker failed but does not stop the
 * next kind. Never throws for per-ticker problems.
 */
export async function runTickerSync(rawTicker: string, context: TickerSyncContext): Promise<TickerSyncResult> {
  const ticker = normalizeTicker(rawTicker);
  const kinds: Partial<Record<DataKind, KindSyncReport>> = {};
  for (const run of pipelinesFor(ticker, context)) {
    const report = await run();
    kinds[report.kind] = report;
  }
  const failed = Object.values(kinds).some((report) => report?.status === 'failed');
  return { ticker, status: failed ? 'failed' : 'succeeded', kinds };
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

function resolveContext(options: SyncBatchOptions): { context: TickerSyncContext; problems: string[] } {
  const problems: string[] = [];
  const skipRemote = options.skipRemote ?? false;
  const warehouse = options.warehouse ?? null;
  const dataKinds: DataKind[] = [...new Set<DataKind>(options.dataKinds ?? ['price-history'])];
  const backfillCutoff = options.backfillCutoff ?? '2000-01-01';
  const retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;

  if (!skipRemote && !warehouse) problems.push('remote sync requested but no warehouse is configured');
  if (dataKinds.length === 0) problems.push('at least one data kind is required');
  for (const kind of dataKinds) {
    if (!DATA_KINDS.includes(kind)) problems.push(`unknown data kind ${String(kind)}`);
  }
  if (!isDateKey(backfillCutoff)) problems.push(`backfill cutoff ${backfillCutoff} is not a YYYY-MM-DD date`);
  if (!(retryPolicy.maxAttempts >= 1)) problems.push('retry policy needs at least one attempt');
  if (options.concurrency !== undefined && !(options.concurrency >= 1)) {
    problems.push(`concurrency must be at least 1 (received ${options.concurrency})`);
  }

  return {
    problems,
    context: {
      provider: options.provider,
      store: options.store,
      warehouse,
      dataKinds,
      skipRemote,
      forceFull: options.forceFull ?? false,
      period: options.period ?? 'max',
      interval: options.interval ?? '1d',
      maxNewsItems: options.maxNewsItems ?? 10,
      backfillCutoff,
      retryPolicy,
      requireInitialFetch: options.requireInitialFetch ?? true,
      tables: options.tables ?? {},
      clock: options.clock ?? systemClock,
      onStage: options.onStage,
    },
  };
}

/**
 * Create or repair every kind's table on one session before the pool fans
 * out, so concurrent tickers never race on DDL. A failure here is logged and
 * left to each ticker's own schema check to report.
 */
async function prepareWarehouse(context: TickerSyncContext): Promise<void> {
  if (context.skipRemote || !context.warehouse) return;
  let session: WarehouseSession;
  try {
    session = await context.warehouse.openSession();
  } catch (err: unknown) {
    log.warn(`could not open warehouse session to prepare tables: ${errorMessage(err)}`);
    return;
  }
  try {
    await new RemoteSyncService(session, context.tables).prepareTables(context.dataKinds);
  } catch (err: unknown) {
    log.warn(`table preparation failed: ${errorMessage(err)}`);
  } finally {
    await closeQuietly(session, 'table preparation');
  }
}

function emptyTotals(): SyncBatchTotals {
  return { tickers: 0, succeeded: 0, failed: 0, fetched: 0, added: 0, duplicatesRemoved: 0, rowsAdded: 0 };
}

function accumulate(totals: SyncBatchTotals, result: TickerSyncResult): void {
  totals.tickers += 1;
  if (result.status === 'succeeded') totals.succeeded += 1;
  else totals.failed += 1;
  for (const report of Object.values(result.kinds)) {
    if (!report) continue;
    totals.fetched += report.fetched;
    totals.added += report.stats.added;
    totals.duplicatesRemoved += report.stats.duplicatesRemoved;
    totals.rowsAdded += report.rowsAdded ?? 0;
  }
}

/**
 * Sync a batch of tickers through a bounded worker pool. Options are checked
 * before any ticker work starts; a bad setup throws ConfigurationError. One
 * ticker failing never stops the others.
 */
export async function runSyncBatch(tickers: readonly string[], options: SyncBatchOptions): Promise<SyncBatchReport> {
  const { context, problems } = resolveContext(options);
  if (problems.length > 0) throw new ConfigurationError(problems);

  const unique = [...new Set(tickers.map(normalizeTicker).filter(Boolean))];
  const concurrency = Math.floor(options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);
  log.info(
    `starting batch: ${unique.length} tickers, kinds=${context.dataKinds.join(',')}, concurrency=${concurrency}, remote=${context.skipRemote ? 'off' : 'on'}`,
  );

  await prepareWarehouse(context);

  const results = new Map<string, TickerSyncResult>();
  const totals = emptyTotals();
  const settled = await mapWithConcurrency(unique, concurrency, (ticker) => runTickerSync(ticker, context), {
    shouldStop: options.shouldStop,
    onSettled: (outcome, _index, ticker) => {
      let result: TickerSyncResult;
      if (outcome.ok) {
        result = outcome.value;
      } else {
        log.error(`${ticker} aborted unexpectedly: ${errorMessage(outcome.error)}`);
        result = { ticker, status: 'failed', kinds: {} };
      }
      results.set(ticker, result);
      accumulate(totals, result);
      options.onTickerSettled?.(result);
    },
  });

  const skipped = settled.filter((entry) => entry === undefined).length;
  if (skipped > 0) log.warn(`stop requested; ${skipped} tickers not started`);
  log.info(
    `batch done: ${totals.succeeded} succeeded, ${totals.failed} failed, ${totals.fetched} fetched, ${totals.added} added locally, ${totals.rowsAdded} added remotely`,
  );
  return { results, totals };
}
