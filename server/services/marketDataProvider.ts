import type { NewsRecord, PriceRecord } from './datasetDefinitions.js';

export type SeriesInterval = '1d' | '1wk' | '1mo';

export const SERIES_INTERVALS: readonly SeriesInterval[] = ['1d', '1wk', '1mo'];

export interface SeriesRequest {
  symbol: string;
  /** Inclusive start date key. Omitted for a full fetch. */
  start?: string;
  /** Inclusive end date key. Omitted means "now". */
  end?: string;
  /** Lookback used when no start is given, e.g. `max`, `10y`, `1y`. */
  period: string;
  interval: SeriesInterval;
}

/**
 * The data provider as seen by the sync core. Any call may throw; every
 * throw is treated as transient and retried.
 */
export interface MarketDataProvider {
  fetchSeries(request: SeriesRequest): Promise<PriceRecord[]>;
  fetchNews(symbol: string, maxItems: number): Promise<NewsRecord[]>;
}
