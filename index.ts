import 'dotenv/config';
import logger from './server/logger.js';
import { validateStartupEnvironment, type SyncConfig } from './server/config.js';
import { createWarehouse } from './server/db.js';
import { errorMessage, isSyncError } from './server/lib/errors.js';
import type { Warehouse } from './server/db/warehouseSession.js';
import { DatasetStore } from './server/services/datasetStore.js';
import { YahooFinanceApi } from './server/services/yahooFinanceApi.js';
import { runSyncBatch, type TickerSyncResult } from './server/orchestrators/tickerSyncOrchestrator.js';

let stopRequested = false;

function requestStop(signal: NodeJS.Signals) {
  if (stopRequested) return;
  stopRequested = true;
  logger.warn(`Received ${signal}; finishing in-flight tickers, no new tickers will start`);
}

process.on('SIGINT', () => requestStop('SIGINT'));
process.on('SIGTERM', () => requestStop('SIGTERM'));
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled promise rejection: ${errorMessage(reason)}`);
});

async function resolveTickers(config: SyncConfig, store: DatasetStore): Promise<string[]> {
  if (config.tickers.length > 0) return config.tickers;
  const stored = await Promise.all(config.dataKinds.map((kind) => store.listTickers(kind)));
  return [...new Set(stored.flat())].sort();
}

function summarize(result: TickerSyncResult): string {
  const parts = Object.values(result.kinds).map((report) => {
    if (!report) return '';
    if (report.error) return `${report.kind}=failed(${report.error.stage}: ${report.error.message})`;
    const remote = report.rowsAdded === null ? '' : `, ${report.rowsAdded} remote`;
    return `${report.kind}=${report.status}(${report.stats.added} added${remote})`;
  });
  return `${result.ticker} ${result.status}: ${parts.filter(Boolean).join(' ')}`;
}

async function main(): Promise<number> {
  const config = validateStartupEnvironment(process.env);
  const store = new DatasetStore(config.dataDir);
  const tickers = await resolveTickers(config, store);
  if (tickers.length === 0) {
    logger.warn('No tickers configured and none stored locally; nothing to do');
    return 0;
  }

  let warehouse: Warehouse | null = null;
  if (!config.skipRemote) {
    warehouse = createWarehouse({
      connectionString: config.warehouseUrl,
      sslRejectUnauthorized: config.sslRejectUnauthorized,
      maxConnections: config.concurrency,
    });
  }

  try {
    const report = await runSyncBatch(tickers, {
      provider: new YahooFinanceApi(),
      store,
      warehouse,
      dataKinds: config.dataKinds,
      skipRemote: config.skipRemote,
      forceFull: config.forceFull,
      period: config.period,
      interval: config.interval,
      maxNewsItems: config.maxNewsItems,
      backfillCutoff: config.backfillCutoff,
      retryPolicy: { maxAttempts: config.retryAttempts, baseDelayMs: config.retryBaseDelayMs },
      tables: { 'price-history': config.priceTable, news: config.newsTable },
      concurrency: config.concurrency,
      shouldStop: () => stopRequested,
      onTickerSettled: (result) => {
        const line = summarize(result);
        if (result.status === 'failed') logger.error(line);
        else logger.info(line);
      },
    });
    const { totals } = report;
    logger.info(
      `Sync finished: ${totals.succeeded}/${totals.tickers} tickers succeeded, ${totals.fetched} rows fetched, ${totals.added} added locally, ${totals.duplicatesRemoved} duplicates removed, ${totals.rowsAdded} added remotely`,
    );
    return totals.failed > 0 ? 1 : 0;
  } finally {
    if (warehouse) {
      await warehouse.end().catch((err: unknown) => {
        logger.warn(`Warehouse pool did not close cleanly: ${errorMessage(err)}`);
      });
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const kind = isSyncError(err) ? err.kind : 'unexpected';
    logger.error(`Fatal (${kind}): ${errorMessage(err)}`);
    process.exitCode = 1;
  });
