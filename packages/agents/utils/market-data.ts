// Upstream market-data collaborator as seen by the specialists
// Every method resolves to a payload or an error payload; callers never see a rejection

export type StatementFrequency = 'quarterly' | 'annual';

export interface MarketDataProvider {
  getStockData(ticker: string, startDate: string, endDate: string): Promise<unknown>;
  getIndicator(ticker: string, indicator: string, asOf: string, lookBackDays: number): Promise<unknown>;
  getFundamentals(ticker: string, asOf: string): Promise<unknown>;
  getBalanceSheet(ticker: string, freq: StatementFrequency, asOf: string): Promise<unknown>;
  getCashflow(ticker: string, freq: StatementFrequency, asOf: string): Promise<unknown>;
  getIncomeStatement(ticker: string, freq: StatementFrequency, asOf: string): Promise<unknown>;
  getNews(ticker: string, startDate: string, endDate: string): Promise<unknown>;
  getGlobalNews(asOf: string, lookBackDays: number, limit: number): Promise<unknown>;
  getInsiderSentiment(ticker: string, asOf: string): Promise<unknown>;
  getInsiderTransactions(ticker: string, asOf: string): Promise<unknown>;
  getPeers(ticker: string): Promise<unknown>;
}

export interface ErrorPayload {
  error: string;
  method: string;
  ticker?: string;
  [key: string]: unknown;
}

export function errorPayload(method: string, err: unknown, extra: Record<string, unknown> = {}): ErrorPayload {
  return {
    error: err instanceof Error ? err.message : String(err),
    method,
    ...extra,
  };
}

export function isErrorPayload(value: unknown): value is ErrorPayload {
  return typeof value === 'object' && value !== null
    && typeof Reflect.get(value, 'error') === 'string'
    && typeof Reflect.get(value, 'method') === 'string';
}

/** The four correlated statements shared between fundamentals and valuation */
export interface FinancialBundle {
  fundamentals: unknown;
  balanceSheet: unknown;
  cashflow: unknown;
  incomeStatement: unknown;
}
