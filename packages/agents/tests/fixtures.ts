// In-process fakes shared by the agents tests: market data, verdict producer, verdict payloads

import { SPECIALIST_LABELS, type SpecialistKind, type SpecialistOutput } from '../types/agents.js';
import type { MarketDataProvider, StatementFrequency } from '../utils/market-data.js';
import type { VerdictProducer, VerdictRequest } from '../utils/verdict-producer.js';
import { PM_SYSTEM, RISK_SYSTEM } from '../agents/prompts.js';

export function verdict(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    analyst: 'Market Analyst',
    recommendation: 'Buy',
    conviction: 0.75,
    conviction_category: 'High',
    evidence_strength: 0.7,
    signal_clarity: 0.6,
    data_quality: 0.8,
    uncertainty_penalty: 0.2,
    key_factors: ['trend', 'momentum', 'volume', 'breadth', 'support'],
    risks: ['reversal', 'macro'],
    overall_comment: 'Constructive setup.',
    time_horizon: '6-12',
    confidence_level: 'High',
    data_sources: ['prices', 'indicators'],
    ...overrides,
  };
}

export function verdictJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify(verdict(overrides));
}

/** Records every call; methods named in `failing` reject */
export class FakeProvider implements MarketDataProvider {
  readonly calls: string[] = [];
  readonly failing = new Set<string>();

  private async answer(method: string, payload: unknown): Promise<unknown> {
    this.calls.push(method);
    await Promise.resolve();
    if (this.failing.has(method)) throw new Error(`${method} unavailable`);
    return payload;
  }

  count(method: string): number {
    return this.calls.filter(c => c === method).length;
  }

  getStockData(ticker: string, startDate: string, endDate: string): Promise<unknown> {
    return this.answer('getStockData', { ticker, startDate, endDate, rows: [{ date: endDate, close: 100 }] });
  }

  getIndicator(ticker: string, indicator: string, asOf: string, lookBackDays: number): Promise<unknown> {
    return this.answer('getIndicator', { ticker, indicator, asOf, lookBackDays, rows: [{ date: asOf, value: 50 }] });
  }

  getFundamentals(ticker: string, asOf: string): Promise<unknown> {
    return this.answer('getFundamentals', { ticker, asOf, profile: { sector: 'Technology' } });
  }

  getBalanceSheet(ticker: string, freq: StatementFrequency, asOf: string): Promise<unknown> {
    return this.answer('getBalanceSheet', { ticker, freq, asOf, statements: [{ totalAssets: 1000 }] });
  }

  getCashflow(ticker: string, freq: StatementFrequency, asOf: string): Promise<unknown> {
    return this.answer('getCashflow', { ticker, freq, asOf, statements: [{ freeCashFlow: 120 }] });
  }

  getIncomeStatement(ticker: string, freq: StatementFrequency, asOf: string): Promise<unknown> {
    return this.answer('getIncomeStatement', { ticker, freq, asOf, statements: [{ revenue: 500 }] });
  }

  getNews(ticker: string, startDate: string, endDate: string): Promise<unknown> {
    return this.answer('getNews', { ticker, startDate, endDate, articles: [{ title: 'Product launch' }] });
  }

  getGlobalNews(asOf: string, lookBackDays: number, limit: number): Promise<unknown> {
    return this.answer('getGlobalNews', { asOf, lookBackDays, limit, articles: [{ title: 'Rates steady' }] });
  }

  getInsiderSentiment(ticker: string, asOf: string): Promise<unknown> {
    return this.answer('getInsiderSentiment', { ticker, asOf, quarters: [] });
  }

  getInsiderTransactions(ticker: string, asOf: string): Promise<unknown> {
    return this.answer('getInsiderTransactions', { ticker, asOf, transactions: [] });
  }

  getPeers(ticker: string): Promise<unknown> {
    return this.answer('getPeers', { ticker, peers: ['MSFT', 'GOOG'], source: 'fmp_stock_peers' });
  }
}

export type RequestKind =
  | { type: 'specialist'; label: string }
  | { type: 'review'; label: string }
  | { type: 'pm' }
  | { type: 'risk' };

const REVIEW_PREFIX = 'You are a quality-check reviewer for the ';
const ANALYST_LINE = /Set "analyst" to "([^"]+)"/;

export function classifyRequest(request: VerdictRequest): RequestKind {
  if (request.system === PM_SYSTEM) return { type: 'pm' };
  if (request.system === RISK_SYSTEM) return { type: 'risk' };
  if (request.system.startsWith(REVIEW_PREFIX)) {
    const rest = request.system.slice(REVIEW_PREFIX.length);
    return { type: 'review', label: rest.slice(0, rest.indexOf('. ')) };
  }
  const match = ANALYST_LINE.exec(request.system);
  return { type: 'specialist', label: match ? match[1] : '' };
}

export type Responder = (request: VerdictRequest, kind: RequestKind) => string | Promise<string>;

/** Reviewer that hands the draft back untouched: the prompt's first JSON object is the draft */
export const echoReview: Responder = (request) => request.prompt;

export class ScriptedProducer implements VerdictProducer {
  readonly requests: VerdictRequest[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(request: VerdictRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request, classifyRequest(request));
  }

  ofType(type: RequestKind['type']): VerdictRequest[] {
    return this.requests.filter(r => classifyRequest(r).type === type);
  }
}

export function stageOutput(kind: SpecialistKind, raw: string): SpecialistOutput {
  return {
    kind,
    label: SPECIALIST_LABELS[kind],
    raw,
    verdict: null,
    reviewStatus: 'not_run',
    toolInvocations: [],
    warnings: [],
    completedAt: new Date(0),
  };
}
