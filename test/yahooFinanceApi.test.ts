import test from 'node:test';
import assert from 'node:assert/strict';

import { ChartResponseSchema, SearchResponseSchema, validateApiResponse } from '../server/lib/apiSchemas.js';
import { buildChartUrl, buildNewsUrl, toNewsRecords, toPriceRecords } from '../server/services/yahooFinanceApi.js';

const DOWNLOADED = new Date('2024-06-10T12:00:00.000Z');

// ---------------------------------------------------------------------------
// URLs
// ---------------------------------------------------------------------------

test('buildChartUrl asks for an inclusive date range', () => {
  const url = buildChartUrl('https://query1.finance.yahoo.com/', {
    symbol: 'aapl',
    start: '2024-01-02',
    end: '2024-01-05',
    period: 'max',
    interval: '1d',
  });
  assert.equal(
    url,
    'https://query1.finance.yahoo.com/v8/finance/chart/AAPL?interval=1d&includeAdjustedClose=true&events=div%2Csplits&period1=1704153600&period2=1704499200',
  );
});

test('buildChartUrl uses the period for a full fetch', () => {
  const url = new URL(buildChartUrl('https://query1.finance.yahoo.com', { symbol: 'MSFT', period: 'max', interval: '1wk' }));
  assert.equal(url.searchParams.get('range'), 'max');
  assert.equal(url.searchParams.get('interval'), '1wk');
  assert.equal(url.searchParams.has('period1'), false);
});

test('buildNewsUrl requests only news', () => {
  assert.equal(
    buildNewsUrl('https://query2.finance.yahoo.com', 'msft', 7),
    'https://query2.finance.yahoo.com/v1/finance/search?q=MSFT&quotesCount=0&newsCount=7',
  );
});

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

test('toPriceRecords converts bars at the exchange offset and drops empty padding', () => {
  const parsed = validateApiResponse(ChartResponseSchema, {
    chart: {
      result: [
        {
          meta: { symbol: 'AAPL', gmtoffset: -14400 },
          timestamp: [1704205800, 1704292200, 1704378600],
          indicators: {
            quote: [
              {
                open: [1, null, 3],
                high: [2, null, 4],
                low: [0.5, null, 2],
                close: [1.5, null, 3.5],
                volume: [100.4, null, 300],
              },
            ],
            adjclose: [{ adjclose: [1.4, null, null] }],
          },
        },
      ],
      error: null,
    },
  });
  assert.equal(parsed.ok, true);
  const result = parsed.ok ? parsed.data.chart.result?.[0] : undefined;
  assert.ok(result);

  assert.deepEqual(toPriceRecords(result, 'aapl', DOWNLOADED), [
    {
      ticker: 'AAPL',
      date: '2024-01-02',
      open: 1,
      high: 2,
      low: 0.5,
      close: 1.5,
      adjClose: 1.4,
      volume: 100,
      downloadedAt: '2024-06-10T12:00:00.000Z',
    },
    {
      ticker: 'AAPL',
      date: '2024-01-04',
      open: 3,
      high: 4,
      low: 2,
      close: 3.5,
      adjClose: 3.5,
      volume: 300,
      downloadedAt: '2024-06-10T12:00:00.000Z',
    },
  ]);
});

test('toNewsRecords caps the list and fills missing fields', () => {
  const parsed = validateApiResponse(SearchResponseSchema, {
    news: [
      {
        uuid: 'n-1',
        title: 'First',
        publisher: 'Example Wire',
        link: 'https://example.com/n-1',
        providerPublishTime: 1717920000,
        type: 'STORY',
        thumbnail: { resolutions: [{ url: 'https://example.com/big.jpg' }, { url: 'https://example.com/small.jpg' }] },
      },
      { uuid: 'n-2', providerPublishTime: 1717833600 },
    ],
  });
  assert.equal(parsed.ok, true);
  const items = parsed.ok ? (parsed.data.news ?? []) : [];

  assert.deepEqual(toNewsRecords(items, 'aapl', 1, DOWNLOADED), [
    {
      ticker: 'AAPL',
      id: 'n-1',
      title: 'First',
      summary: '',
      description: '',
      publisher: 'Example Wire',
      link: 'https://example.com/n-1',
      publishTime: '2024-06-09T08:00:00.000Z',
      displayTime: '2024-06-09T08:00:00.000Z',
      contentType: 'STORY',
      thumbnailUrl: 'https://example.com/small.jpg',
      isPremium: false,
      isHosted: false,
      downloadedAt: '2024-06-10T12:00:00.000Z',
    },
  ]);
  assert.equal(toNewsRecords(items, 'aapl', 10, DOWNLOADED)[1].thumbnailUrl, '');
});

test('toNewsRecords drops items without an id before applying the cap', () => {
  const parsed = validateApiResponse(SearchResponseSchema, {
    news: [
      { uuid: '', providerPublishTime: 1717920000 },
      { uuid: '  ', providerPublishTime: 1717920000 },
      { uuid: 'n-3', providerPublishTime: 1717833600 },
    ],
  });
  const items = parsed.ok ? (parsed.data.news ?? []) : [];
  assert.deepEqual(
    toNewsRecords(items, 'aapl', 1, DOWNLOADED).map((r) => r.id),
    ['n-3'],
  );
});

test('validateApiResponse reports where a payload is malformed', () => {
  const result = validateApiResponse(ChartResponseSchema, { chart: 5 });
  assert.equal(result.ok, false);
  if (!result.ok) assert.match(result.issues[0], /^chart: /);
});
