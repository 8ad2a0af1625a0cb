/**
 * Yahoo Finance HTTP adapter: URL construction, JSON fetching, response
 * validation and conversion into dataset records.
 *
 * Conversion functions are pure and exported; only `YahooFinanceApi`
 * performs network calls.
 */

import { request } from 'undici';
import { ChartResponseSchema, SearchResponseSchema, validateApiResponse } from '../lib/apiSchemas.js';
import type { ChartResult, NewsItem } from '../lib/apiSchemas.js';
import { addDaysToDateKey, dateKeyFromUnixSeconds, dateKeyToUnixSeconds, isoFromUnixSeconds } from '../lib/dateUtils.js';
import { errorMessage, TransientFetchError } from '../lib/errors.js';
import { moduleLogger } from '../logger.js';
import { normalizeTicker, type NewsRecord, type PriceRecord } from './datasetDefinitions.js';
import type { MarketDataProvider, SeriesRequest } from './marketDataProvider.js';

const log = moduleLogger('yahoo-finance');

const DEFAULT_CHART_BASE = 'https://query1.finance.yahoo.com';
const DEFAULT_SEARCH_BASE = 'https://query2.finance.yahoo.com';
const DEFAULT_TIMEOUT_MS = 15_000;
const USER_AGENT = 'Mozilla/5.0 (compatible; ticker-warehouse-sync/0.1)';

export interface YahooFinanceApiOptions {
  chartBaseUrl?: string;
  searchBaseUrl?: string;
  timeoutMs?: number;
  /** Source of `downloadedAt` stamps. */
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// URL building
// ---------------------------------------------------------------------------

export function buildChartUrl(baseUrl: string, req: SeriesRequest): string {
  const symbol = normalizeTicker(req.symbol);
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}/v8/finance/chart/${encodeURIComponent(symbol)}`);
  url.searchParams.set('interval', req.interval);
  url.searchParams.set('includeAdjustedClose', 'true');
  url.searchParams.set('events', 'div,splits');
  if (req.start) {
    url.searchParams.set('period1', String(dateKeyToUnixSeconds(req.start)));
    // End is inclusive: ask for everything before the following midnight.
    const endExclusive = req.end ? dateKeyToUnixSeconds(addDaysToDateKey(req.end, 1)) : Math.floor(Date.now() / 1000);
    url.searchParams.set('period2', String(endExclusive));
  } else {
    url.searchParams.set('range', req.period || 'max');
  }
  return url.toString();
}

export function buildNewsUrl(baseUrl: string, symbol: string, maxItems: number): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}/v1/finance/search`);
  url.searchParams.set('q', normalizeTicker(symbol));
  url.searchParams.set('quotesCount', '0');
  url.searchParams.set('newsCount', String(Math.max(1, Math.floor(maxItems))));
  return url.toString();
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

function finiteOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function toPriceRecords(result: ChartResult, symbol: string, downloadedAt: Date): PriceRecord[] {
  const ticker = normalizeTicker(symbol);
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote?.[0];
  const adjClose = result.indicators.adjclose?.[0]?.adjclose ?? [];
  const gmtOffset = result.meta.gmtoffset ?? 0;
  const stamp = downloadedAt.toISOString();
  const records: PriceRecord[] = [];

  timestamps.forEach((ts, i) => {
    const date = dateKeyFromUnixSeconds(ts, gmtOffset);
    if (!date) return;
    const open = finiteOrNull(quote?.open?.[i]);
    const high = finiteOrNull(quote?.high?.[i]);
    const low = finiteOrNull(quote?.low?.[i]);
    const close = finiteOrNull(quote?.close?.[i]);
    // Padding rows with no prices at all carry no information.
    if (open === null && high === null && low === null && close === null) return;
    const volume = finiteOrNull(quote?.volume?.[i]);
    records.push({
      ticker,
      date,
      open,
      high,
      low,
      close,
      adjClose: finiteOrNull(adjClose[i]) ?? close,
      volume: volume === null ? null : Math.round(volume),
      downloadedAt: stamp,
    });
  });

  return records;
}

function lastThumbnailUrl(item: NewsItem): string {
  const resolutions = item.thumbnail?.resolutions ?? [];
  return resolutions.length > 0 ? resolutions[resolutions.length - 1].url : '';
}

export function toNewsRecords(items: readonly NewsItem[], symbol: string, maxItems: number, downloadedAt: Date): NewsRecord[] {
  const ticker = normalizeTicker(symbol);
  const stamp = downloadedAt.toISOString();
  // Items without an id cannot be keyed and are dropped before the cap.
  const keyed = items.filter((item) => item.uuid.trim().length > 0);
  return keyed.slice(0, Math.max(0, Math.floor(maxItems))).map((item) => {
    const publishSeconds = item.providerPublishTime ?? 0;
    return {
      ticker,
      id: item.uuid,
      title: item.title ?? '',
      summary: item.summary ?? '',
      description: item.description ?? '',
      publisher: item.publisher ?? '',
      link: item.link ?? '',
      publishTime: isoFromUnixSeconds(publishSeconds),
      displayTime: isoFromUnixSeconds(item.displayTime ?? publishSeconds),
      contentType: item.type ?? '',
      thumbnailUrl: lastThumbnailUrl(item),
      isPremium: item.isPremium ?? false,
      isHosted: item.isHosted ?? false,
      downloadedAt: stamp,
    };
  });
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class YahooFinanceApi implements MarketDataProvider {
  private readonly chartBaseUrl: string;
  private readonly searchBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: YahooFinanceApiOptions = {}) {
    this.chartBaseUrl = options.chartBaseUrl ?? DEFAULT_CHART_BASE;
    this.searchBaseUrl = options.searchBaseUrl ?? DEFAULT_SEARCH_BASE;
    this.timeoutMs = Math.max(1_000, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.now = options.now ?? (() => new Date());
  }

  async fetchSeries(req: SeriesRequest): Promise<PriceRecord[]> {
    const url = buildChartUrl(this.chartBaseUrl, req);
    const payload = await this.fetchJson(url, `chart ${req.symbol}`);
    const validated = validateApiResponse(ChartResponseSchema, payload);
    if (!validated.ok) {
      throw new TransientFetchError(`chart ${req.symbol}: unexpected response (${validated.issues.join('; ')})`);
    }
    const { chart } = validated.data;
    if (chart.error) {
      // "No data found" style errors mean the symbol has nothing in range.
      log.warn(`chart ${req.symbol}: ${chart.error.code ?? 'error'} ${chart.error.description ?? ''}`);
      return [];
    }
    const result = chart.result?.[0];
    if (!result) return [];
    return toPriceRecords(result, req.symbol, this.now());
  }

  async fetchNews(symbol: string, maxItems: number): Promise<NewsRecord[]> {
    const url = buildNewsUrl(this.searchBaseUrl, symbol, maxItems);
    const payload = await this.fetchJson(url, `news ${symbol}`);
    const validated = validateApiResponse(SearchResponseSchema, payload);
    if (!validated.ok) {
      throw new TransientFetchError(`news ${symbol}: unexpected response (${validated.issues.join('; ')})`);
    }
    return toNewsRecords(validated.data.news ?? [], symbol, maxItems, this.now());
  }

  private async fetchJson(url: string, label: string): Promise<unknown> {
    let statusCode: number;
    let text: string;
    try {
      const response = await request(url, {
        method: 'GET',
        headers: { 'user-agent': USER_AGENT, accept: 'application/json' },
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (err: unknown) {
      throw new TransientFetchError(`${label}: request failed (${errorMessage(err)})`, { cause: err });
    }

    // A chart 404 still carries a JSON body with `chart.error`; let the caller read it.
    if (statusCode === 404 && text.trim().startsWith('{')) {
      return parseJson(text, label, statusCode);
    }
    if (statusCode < 200 || statusCode >= 300) {
      throw new TransientFetchError(`${label}: HTTP ${statusCode}`, { httpStatus: statusCode });
    }
    return parseJson(text, label, statusCode);
  }
}

function parseJson(text: string, label: string, statusCode: number): unknown {
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new TransientFetchError(`${label}: response is not JSON`, { cause: err, httpStatus: statusCode });
  }
}
