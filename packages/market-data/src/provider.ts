// FMP-backed market data provider
// Every method resolves to a payload or { error, method, ticker, ... }; nothing rejects

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CacheTTL, fmpFetch, type FmpFetch } from './client.js';
import { quarterOf, shiftDays } from './dates.js';

export type StatementFrequency = 'quarterly' | 'annual';

export interface ProviderError {
  error: string;
  method: string;
  ticker?: string;
  [key: string]: unknown;
}

type Row = Record<string, unknown>;

/** Default look-back period per supported indicator */
export const INDICATOR_PERIODS: Record<string, number> = {
  rsi: 14,
  sma: 50,
  ema: 10,
  adx: 14,
  standarddeviation: 20,
  williams: 14,
};

const STATEMENT_ENDPOINTS = {
  balance: 'balance-sheet-statement',
  cashflow: 'cash-flow-statement',
  income: 'income-statement',
} as const;

const STATEMENT_LIMIT = 4;
const DEFAULT_PEERS = ['SPY', 'QQQ', 'DIA'];
const MAX_FALLBACK_PEERS = 5;

const SectorPeersSchema = z.record(z.array(z.string()));

let sectorPeers: Record<string, string[]> | null = null;

/** Sector → representative tickers, read once from data/sector-peers.json */
export function loadSectorPeers(): Record<string, string[]> {
  if (!sectorPeers) {
    const raw = readFileSync(new URL('../data/sector-peers.json', import.meta.url), 'utf-8');
    sectorPeers = SectorPeersSchema.parse(JSON.parse(raw));
  }
  return sectorPeers;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toRows(payload: unknown): Row[] {
  if (Array.isArray(payload)) return payload.filter(isRow);
  return isRow(payload) ? [payload] : [];
}

function dateOf(row: Row, key = 'date'): string {
  const value = row[key];
  return typeof value === 'string' ? value.slice(0, 10) : '';
}

/** Rows dated on or before `asOf`; rows without a readable date are dropped */
export function onOrBefore(rows: readonly Row[], asOf: string, key = 'date'): Row[] {
  return rows.filter(row => {
    const date = dateOf(row, key);
    return date !== '' && date <= asOf;
  });
}

export interface FmpProviderOptions {
  /** Request function; defaults to the shared cached client */
  fetch?: FmpFetch;
}

export class FmpMarketDataProvider {
  private readonly fetch: FmpFetch;

  constructor(options: FmpProviderOptions = {}) {
    this.fetch = options.fetch ?? fmpFetch;
  }

  private async safe(
    method: string,
    extra: Record<string, unknown>,
    fn: () => Promise<unknown>,
  ): Promise<unknown> {
    try {
      return await fn();
    } catch (err) {
      const error: ProviderError = {
        error: err instanceof Error ? err.message : String(err),
        method,
        ...extra,
      };
      return error;
    }
  }

  getStockData(ticker: string, startDate: string, endDate: string): Promise<unknown> {
    return this.safe('get_stock_data', { ticker, startDate, endDate }, async () => {
      const data = await this.fetch('historical-price-eod/full',
        { symbol: ticker, from: startDate, to: endDate }, { cacheTtl: CacheTTL.MEDIUM });
      const rows = toRows(data)
        .filter(row => {
          const date = dateOf(row);
          return date >= startDate && date <= endDate;
        })
        .sort((a, b) => dateOf(a).localeCompare(dateOf(b)));
      return { ticker, startDate, endDate, rows };
    });
  }

  getIndicator(ticker: string, indicator: string, asOf: string, lookBackDays: number): Promise<unknown> {
    const name = indicator.trim().toLowerCase();
    return this.safe('get_indicators', { ticker, indicator: name, asOf }, async () => {
      const periodLength = INDICATOR_PERIODS[name];
      if (periodLength === undefined) {
        throw new Error(`Unsupported indicator "${indicator}"; expected one of ${Object.keys(INDICATOR_PERIODS).join(', ')}`);
      }
      const from = shiftDays(asOf, -lookBackDays);
      const data = await this.fetch(`technical-indicators/${name}`,
        { symbol: ticker, periodLength, timeframe: '1day', from, to: asOf }, { cacheTtl: CacheTTL.MEDIUM });
      const rows = onOrBefore(toRows(data), asOf).filter(row => dateOf(row) >= from);
      return { ticker, indicator: name, periodLength, from, to: asOf, rows };
    });
  }

  getFundamentals(ticker: string, asOf: string): Promise<unknown> {
    return this.safe('get_fundamentals', { ticker, asOf }, async () => {
      const [profile, metrics] = await Promise.all([
        this.fetch('profile', { symbol: ticker }, { cacheTtl: CacheTTL.LONG }),
        this.fetch('key-metrics', { symbol: ticker, period: 'quarter', limit: 8 }, { cacheTtl: CacheTTL.MEDIUM }),
      ]);
      return {
        ticker,
        asOf,
        profile: toRows(profile)[0] ?? null,
        keyMetrics: onOrBefore(toRows(metrics), asOf).slice(0, STATEMENT_LIMIT),
      };
    });
  }

  private statement(
    method: string,
    kind: keyof typeof STATEMENT_ENDPOINTS,
    ticker: string,
    freq: StatementFrequency,
    asOf: string,
  ): Promise<unknown> {
    return this.safe(method, { ticker, freq, asOf }, async () => {
      const data = await this.fetch(STATEMENT_ENDPOINTS[kind], {
        symbol: ticker,
        period: freq === 'quarterly' ? 'quarter' : 'annual',
        limit: STATEMENT_LIMIT * 2,
      }, { cacheTtl: CacheTTL.MEDIUM });
      // statements filed after the analysis date must not leak into the run
      return { ticker, freq, asOf, statements: onOrBefore(toRows(data), asOf).slice(0, STATEMENT_LIMIT) };
    });
  }

  getBalanceSheet(ticker: string, freq: StatementFrequency, asOf: string): Promise<unknown> {
    return this.statement('get_balance_sheet', 'balance', ticker, freq, asOf);
  }

  getCashflow(ticker: string, freq: StatementFrequency, asOf: string): Promise<unknown> {
    return this.statement('get_cashflow', 'cashflow', ticker, freq, asOf);
  }

  getIncomeStatement(ticker: string, freq: StatementFrequency, asOf: string): Promise<unknown> {
    return this.statement('get_income_statement', 'income', ticker, freq, asOf);
  }

  getNews(ticker: string, startDate: string, endDate: string): Promise<unknown> {
    return this.safe('get_news', { ticker, startDate, endDate }, async () => {
      const data = await this.fetch('news/stock',
        { symbols: ticker, from: startDate, to: endDate, limit: 50 }, { cacheTtl: CacheTTL.SHORT });
      const articles = toRows(data)
        .filter(row => {
          const date = dateOf(row, 'publishedDate');
          return date >= startDate && date <= endDate;
        })
        .map(row => ({
          date: row.publishedDate,
          title: row.title,
          site: row.site,
          text: row.text,
        }));
      return { ticker, startDate, endDate, articles };
    });
  }

  getGlobalNews(asOf: string, lookBackDays: number, limit: number): Promise<unknown> {
    return this.safe('get_global_news', { asOf, lookBackDays, limit }, async () => {
      const from = shiftDays(asOf, -lookBackDays);
      const data = await this.fetch('news/general-latest',
        { from, to: asOf, limit }, { cacheTtl: CacheTTL.SHORT });
      const articles = toRows(data)
        .filter(row => {
          const date = dateOf(row, 'publishedDate');
          return date >= from && date <= asOf;
        })
        .slice(0, limit)
        .map(row => ({ date: row.publishedDate, title: row.title, site: row.site, text: row.text }));
      return { from, to: asOf, articles };
    });
  }

  getInsiderSentiment(ticker: string, asOf: string): Promise<unknown> {
    return this.safe('get_insider_sentiment', { ticker, asOf }, async () => {
      const data = await this.fetch('insider-trading/statistics', { symbol: ticker }, { cacheTtl: CacheTTL.MEDIUM });
      const current = quarterOf(asOf);
      const quarters = toRows(data).filter(row => {
        const year = Number(row.year);
        const quarter = Number(row.quarter);
        if (!Number.isFinite(year) || !Number.isFinite(quarter)) return false;
        return year < current.year || (year === current.year && quarter <= current.quarter);
      });
      return { ticker, asOf, quarters: quarters.slice(0, STATEMENT_LIMIT) };
    });
  }

  getInsiderTransactions(ticker: string, asOf: string): Promise<unknown> {
    return this.safe('get_insider_transactions', { ticker, asOf }, async () => {
      const data = await this.fetch('insider-trading/search',
        { symbol: ticker, page: 0, limit: 100 }, { cacheTtl: CacheTTL.MEDIUM });
      return { ticker, asOf, transactions: onOrBefore(toRows(data), asOf, 'transactionDate').slice(0, 50) };
    });
  }

  /** FMP peer list, else the sector map keyed by the profile's sector, else index ETFs */
  getPeers(ticker: string): Promise<unknown> {
    const symbol = ticker.toUpperCase();
    return this.safe('get_peers', { ticker: symbol }, async () => {
      const notSelf = (p: string): boolean => p.toUpperCase() !== symbol;

      let fmpPeers: string[] = [];
      try {
        const data = await this.fetch('stock-peers', { symbol }, { cacheTtl: CacheTTL.LONG });
        fmpPeers = toRows(data)
          .map(row => row.symbol)
          .filter((p): p is string => typeof p === 'string')
          .filter(notSelf);
      } catch {
        fmpPeers = [];
      }
      if (fmpPeers.length > 0) {
        return { ticker: symbol, peers: fmpPeers, source: 'fmp_stock_peers' };
      }

      let sector: string | null = null;
      let industry: string | null = null;
      try {
        const profile = toRows(await this.fetch('profile', { symbol }, { cacheTtl: CacheTTL.LONG }))[0];
        if (profile) {
          sector = typeof profile.sector === 'string' ? profile.sector : null;
          industry = typeof profile.industry === 'string' ? profile.industry : null;
        }
      } catch {
        sector = null;
      }

      const mapped = sector ? loadSectorPeers()[sector] : undefined;
      const peers = (mapped ?? DEFAULT_PEERS).slice(0, MAX_FALLBACK_PEERS).filter(notSelf);
      return {
        ticker: symbol,
        sector,
        industry,
        peers,
        source: mapped ? 'sector_map' : 'fallback',
      };
    });
  }
}
