import { describe, it, expect, vi } from 'vitest';
import { FmpMarketDataProvider, onOrBefore, loadSectorPeers } from '../src/provider.js';
import type { FmpParams } from '../src/client.js';

type Handler = (params: FmpParams) => unknown;

function fakeFetch(routes: Record<string, Handler>) {
  return vi.fn(async (endpoint: string, params: FmpParams = {}) => {
    const handler = routes[endpoint];
    if (!handler) throw new Error(`FMP: HTTP 404: no route ${endpoint}`);
    return handler(params);
  });
}

describe('onOrBefore', () => {
  it('keeps rows dated on or before the cutoff and drops undated rows', () => {
    const rows = [
      { date: '2024-06-30', v: 1 },
      { date: '2024-03-31 00:00:00', v: 2 },
      { v: 3 },
      { date: '2024-07-01', v: 4 },
    ];
    expect(onOrBefore(rows, '2024-06-30').map(r => r.v)).toEqual([1, 2]);
  });
});

describe('FmpMarketDataProvider', () => {
  it('returns price rows inside the window in ascending date order', async () => {
    const fetch = fakeFetch({
      'historical-price-eod/full': () => ([
        { date: '2024-05-10', close: 3 },
        { date: '2024-05-09', close: 2 },
        { date: '2024-04-01', close: 1 },
      ]),
    });
    const provider = new FmpMarketDataProvider({ fetch });

    const data = await provider.getStockData('AAPL', '2024-05-01', '2024-05-10');

    expect(data).toEqual({
      ticker: 'AAPL',
      startDate: '2024-05-01',
      endDate: '2024-05-10',
      rows: [{ date: '2024-05-09', close: 2 }, { date: '2024-05-10', close: 3 }],
    });
    expect(fetch).toHaveBeenCalledWith('historical-price-eod/full',
      { symbol: 'AAPL', from: '2024-05-01', to: '2024-05-10' }, { cacheTtl: 3600 });
  });

  it('requests indicators with their default period and daily timeframe', async () => {
    const fetch = fakeFetch({ 'technical-indicators/rsi': () => ([{ date: '2024-05-10', rsi: 61.2 }]) });
    const provider = new FmpMarketDataProvider({ fetch });

    const data = await provider.getIndicator('AAPL', 'RSI', '2024-05-10', 30);

    expect(fetch).toHaveBeenCalledWith('technical-indicators/rsi',
      { symbol: 'AAPL', periodLength: 14, timeframe: '1day', from: '2024-04-10', to: '2024-05-10' },
      { cacheTtl: 3600 });
    expect(data).toEqual({
      ticker: 'AAPL',
      indicator: 'rsi',
      periodLength: 14,
      from: '2024-04-10',
      to: '2024-05-10',
      rows: [{ date: '2024-05-10', rsi: 61.2 }],
    });
  });

  it('returns an error payload for an unsupported indicator without fetching', async () => {
    const fetch = fakeFetch({});
    const provider = new FmpMarketDataProvider({ fetch });

    const data = await provider.getIndicator('AAPL', 'macd', '2024-05-10', 30);

    expect(fetch).not.toHaveBeenCalled();
    expect(data).toMatchObject({
      error: expect.stringContaining('Unsupported indicator "macd"'),
      method: 'get_indicators',
      ticker: 'AAPL',
      indicator: 'macd',
    });
  });

  it('turns a failed request into an error payload instead of rejecting', async () => {
    const fetch = vi.fn(async () => {
      throw new Error('FMP: Invalid API key');
    });
    const provider = new FmpMarketDataProvider({ fetch });

    await expect(provider.getFundamentals('AAPL', '2024-05-10')).resolves.toEqual({
      error: 'FMP: Invalid API key',
      method: 'get_fundamentals',
      ticker: 'AAPL',
      asOf: '2024-05-10',
    });
  });

  it('filters statements to those dated on or before the analysis date', async () => {
    const fetch = fakeFetch({
      'income-statement': () => ([
        { date: '2024-06-29', revenue: 4 },
        { date: '2024-03-30', revenue: 3 },
        { date: '2023-12-30', revenue: 2 },
      ]),
    });
    const provider = new FmpMarketDataProvider({ fetch });

    const data = await provider.getIncomeStatement('AAPL', 'quarterly', '2024-05-10');

    expect(fetch).toHaveBeenCalledWith('income-statement',
      { symbol: 'AAPL', period: 'quarter', limit: 8 }, { cacheTtl: 3600 });
    expect(data).toEqual({
      ticker: 'AAPL',
      freq: 'quarterly',
      asOf: '2024-05-10',
      statements: [{ date: '2024-03-30', revenue: 3 }, { date: '2023-12-30', revenue: 2 }],
    });
  });

  it('maps company news to dated articles inside the window', async () => {
    const fetch = fakeFetch({
      'news/stock': () => ([
        { publishedDate: '2024-05-09 14:00:00', title: 'Launch', site: 'example.com', text: 'body', url: 'x' },
        { publishedDate: '2024-04-01 09:00:00', title: 'Old', site: 'example.com', text: 'old' },
      ]),
    });
    const provider = new FmpMarketDataProvider({ fetch });

    const data = await provider.getNews('AAPL', '2024-05-03', '2024-05-10');

    expect(data).toEqual({
      ticker: 'AAPL',
      startDate: '2024-05-03',
      endDate: '2024-05-10',
      articles: [{ date: '2024-05-09 14:00:00', title: 'Launch', site: 'example.com', text: 'body' }],
    });
  });

  it('keeps insider statistics up to the quarter of the analysis date', async () => {
    const fetch = fakeFetch({
      'insider-trading/statistics': () => ([
        { year: 2024, quarter: 3, acquiredTransactions: 1 },
        { year: 2024, quarter: 2, acquiredTransactions: 2 },
        { year: 2023, quarter: 4, acquiredTransactions: 3 },
      ]),
    });
    const provider = new FmpMarketDataProvider({ fetch });

    const data = await provider.getInsiderSentiment('AAPL', '2024-05-10');

    expect(data).toEqual({
      ticker: 'AAPL',
      asOf: '2024-05-10',
      quarters: [
        { year: 2024, quarter: 2, acquiredTransactions: 2 },
        { year: 2023, quarter: 4, acquiredTransactions: 3 },
      ],
    });
  });

  it('prefers the FMP peer list and removes the ticker itself', async () => {
    const fetch = fakeFetch({
      'stock-peers': () => ([{ symbol: 'MSFT' }, { symbol: 'AAPL' }, { symbol: 'GOOG' }]),
    });
    const provider = new FmpMarketDataProvider({ fetch });

    await expect(provider.getPeers('aapl')).resolves.toEqual({
      ticker: 'AAPL',
      peers: ['MSFT', 'GOOG'],
      source: 'fmp_stock_peers',
    });
  });

  it('falls back to the sector map when FMP has no peers', async () => {
    const fetch = fakeFetch({
      'stock-peers': () => ([]),
      profile: () => ([{ symbol: 'MSFT', sector: 'Technology', industry: 'Software - Infrastructure' }]),
    });
    const provider = new FmpMarketDataProvider({ fetch });

    await expect(provider.getPeers('MSFT')).resolves.toEqual({
      ticker: 'MSFT',
      sector: 'Technology',
      industry: 'Software - Infrastructure',
      peers: ['AAPL', 'GOOG', 'AMZN', 'NVDA'],
      source: 'sector_map',
    });
  });

  it('falls back to index ETFs when neither peers nor profile are available', async () => {
    const fetch = fakeFetch({});
    const provider = new FmpMarketDataProvider({ fetch });

    await expect(provider.getPeers('ZZZZ')).resolves.toEqual({
      ticker: 'ZZZZ',
      sector: null,
      industry: null,
      peers: ['SPY', 'QQQ', 'DIA'],
      source: 'fallback',
    });
  });

  it('loads the sector map from its data file', () => {
    const map = loadSectorPeers();
    expect(map.Energy).toEqual(['XOM', 'CVX', 'COP', 'SLB', 'EOG']);
  });
});
