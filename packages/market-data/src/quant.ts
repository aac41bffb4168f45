// Price-history analytics over the provider's daily closes
// Every entry point resolves to a result or { error, method, ... }; nothing rejects

import { z } from 'zod';
import { shiftDays } from './dates.js';
import type { ProviderError } from './provider.js';

export const TRADING_DAYS = 252;
export const RSI_PERIOD = 14;
const RSI_EPSILON = 1e-9;
const MIN_FACTOR_HISTORY = 30;
const VAR_NOTE = 'VaR is a simple historical percentile; use with caution.';

/** The one provider call the analytics need */
export interface PriceHistorySource {
  getStockData(ticker: string, startDate: string, endDate: string): Promise<unknown>;
}

export interface PriceBar {
  date: string;
  close: number;
  volume: number | null;
}

const PriceRowSchema = z.object({
  date: z.string().min(10),
  close: z.number().positive().finite(),
  volume: z.number().nonnegative().finite().optional(),
});

const PricePayloadSchema = z.object({ rows: z.array(z.unknown()) });

function isProviderError(value: unknown): value is ProviderError {
  return typeof value === 'object' && value !== null
    && typeof Reflect.get(value, 'error') === 'string';
}

/** Bars from a getStockData payload, oldest first; unreadable rows are dropped */
export function priceBars(payload: unknown): PriceBar[] {
  const parsed = PricePayloadSchema.safeParse(payload);
  if (!parsed.success) return [];
  const bars: PriceBar[] = [];
  for (const raw of parsed.data.rows) {
    const row = PriceRowSchema.safeParse(raw);
    if (!row.success) continue;
    bars.push({ date: row.data.date.slice(0, 10), close: row.data.close, volume: row.data.volume ?? null });
  }
  return bars.sort((a, b) => a.date.localeCompare(b.date));
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function finiteOrNull(value: number, digits: number): number | null {
  return Number.isFinite(value) ? round(value, digits) : null;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1); NaN below two values */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const m = mean(values);
  const squares = values.reduce((sum, v) => sum + (v - m) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/** Simple period returns c[i] / c[i-1] - 1 */
export function pctChanges(closes: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) out.push(closes[i] / closes[i - 1] - 1);
  return out;
}

/** Deepest peak-to-trough fall as a fraction (0 or negative) */
export function maxDrawdown(closes: readonly number[]): number {
  let peak = -Infinity;
  let worst = 0;
  for (const close of closes) {
    peak = Math.max(peak, close);
    worst = Math.min(worst, (close - peak) / peak);
  }
  return worst;
}

function diffs(closes: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) out.push(closes[i] - closes[i - 1]);
  return out;
}

/** RSI from simple averages of the last `period` gains and losses; NaN without period + 1 closes */
export function rsi(closes: readonly number[], period = RSI_PERIOD): number {
  if (period < 1 || closes.length < period + 1) return NaN;
  const moves = diffs(closes.slice(-(period + 1)));
  const gain = mean(moves.map(d => (d > 0 ? d : 0)));
  const loss = mean(moves.map(d => (d < 0 ? -d : 0)));
  const rs = gain / (loss + RSI_EPSILON);
  return 100 - 100 / (1 + rs);
}

/** Percentile with linear interpolation between closest ranks */
export function percentile(values: readonly number[], pct: number): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (Math.min(Math.max(pct, 0), 100) / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

/** Daily returns keyed by the date of the later bar */
function datedReturns(bars: readonly PriceBar[]): Map<string, number> {
  const out = new Map<string, number>();
  for (let i = 1; i < bars.length; i++) out.set(bars[i].date, bars[i].close / bars[i - 1].close - 1);
  return out;
}

/** cov(asset, bench) / var(bench) over the dates both series share; null when undefined */
export function beta(asset: readonly PriceBar[], bench: readonly PriceBar[]): number | null {
  const benchReturns = datedReturns(bench);
  const pairs: Array<[number, number]> = [];
  for (const [date, r] of datedReturns(asset)) {
    const b = benchReturns.get(date);
    if (b !== undefined) pairs.push([r, b]);
  }
  if (pairs.length < 2) return null;
  const meanAsset = mean(pairs.map(([a]) => a));
  const meanBench = mean(pairs.map(([, b]) => b));
  let cov = 0;
  let variance = 0;
  for (const [a, b] of pairs) {
    cov += (a - meanAsset) * (b - meanBench);
    variance += (b - meanBench) ** 2;
  }
  if (variance <= 0) return null;
  const value = cov / variance;
  return Number.isFinite(value) ? value : null;
}

/**
 * The last `days` bars up to asOf.
 * Twice the calendar window is requested to cover weekends and holidays.
 */
async function history(
  source: PriceHistorySource,
  ticker: string,
  asOf: string,
  days: number,
): Promise<PriceBar[] | string> {
  let payload: unknown;
  try {
    payload = await source.getStockData(ticker, shiftDays(asOf, -days * 2), asOf);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
  if (isProviderError(payload)) return payload.error;
  return priceBars(payload).slice(-days);
}

function failure(method: string, error: string, extra: Record<string, unknown>): ProviderError {
  return { error, method, ...extra };
}

function notEnough(ticker: string, need: number, got: number): string {
  return `Not enough price history for ${ticker}: need at least ${need} closes, got ${got}`;
}

export interface SnapshotOptions {
  lookbackDays?: number;
  riskFreeRate?: number;
}

/** Return, annualised volatility, Sharpe, max drawdown, RSI-14 and average volume over the look-back */
export async function multifactorSnapshot(
  source: PriceHistorySource,
  ticker: string,
  asOf: string,
  options: SnapshotOptions = {},
): Promise<unknown> {
  const lookbackDays = options.lookbackDays ?? 90;
  const riskFreeRate = options.riskFreeRate ?? 0;
  const extra = { ticker, as_of: asOf, lookback_days: lookbackDays };

  const bars = await history(source, ticker, asOf, lookbackDays);
  if (typeof bars === 'string') return failure('multifactor_snapshot', bars, extra);
  if (bars.length < 3) return failure('multifactor_snapshot', notEnough(ticker, 3, bars.length), extra);

  const closes = bars.map(b => b.close);
  const returns = pctChanges(closes);
  const totalReturn = closes[closes.length - 1] / closes[0] - 1;
  const volAnnualized = sampleStd(returns) * Math.sqrt(TRADING_DAYS);
  const excessReturn = mean(returns) * TRADING_DAYS - riskFreeRate;
  const sharpe = volAnnualized > 0 ? excessReturn / volAnnualized : 0;
  const volumes = bars.flatMap(b => (b.volume === null ? [] : [b.volume]));

  return {
    ...extra,
    observations: bars.length,
    return_pct: round(totalReturn * 100, 2),
    vol_annualized: round(volAnnualized, 4),
    sharpe: round(sharpe, 3),
    max_drawdown_pct: round(maxDrawdown(closes) * 100, 2),
    rsi_14: finiteOrNull(rsi(closes), 2),
    avg_volume: volumes.length > 0 ? mean(volumes) : null,
  };
}

export interface FactorOptions {
  momentumDays?: number;
  longMomentumDays?: number;
  volWindow?: number;
}

/** Short and long momentum plus rolling volatility; a window longer than the history reports null */
export async function customFactors(
  source: PriceHistorySource,
  ticker: string,
  asOf: string,
  options: FactorOptions = {},
): Promise<unknown> {
  const momentumDays = options.momentumDays ?? 20;
  const longMomentumDays = options.longMomentumDays ?? 60;
  const volWindow = options.volWindow ?? 20;
  const extra = {
    ticker, as_of: asOf, momentum_days: momentumDays, long_momentum_days: longMomentumDays, vol_window: volWindow,
  };

  const days = Math.max(momentumDays, longMomentumDays, volWindow, MIN_FACTOR_HISTORY);
  const bars = await history(source, ticker, asOf, days);
  if (typeof bars === 'string') return failure('custom_factors', bars, extra);
  if (bars.length < 2) return failure('custom_factors', notEnough(ticker, 2, bars.length), extra);

  const closes = bars.map(b => b.close);
  const last = closes[closes.length - 1];
  const pctOver = (window: number): number =>
    window > 0 && closes.length >= window + 1 ? last / closes[closes.length - window - 1] - 1 : NaN;
  const returns = pctChanges(closes);
  const vol = returns.length >= volWindow ? sampleStd(returns.slice(-volWindow)) * Math.sqrt(TRADING_DAYS) : NaN;

  const result: Record<string, unknown> = { ticker, as_of: asOf, observations: bars.length };
  result[`momentum_${momentumDays}d_pct`] = finiteOrNull(pctOver(momentumDays) * 100, 2);
  result[`momentum_${longMomentumDays}d_pct`] = finiteOrNull(pctOver(longMomentumDays) * 100, 2);
  result[`vol_annualized_${volWindow}d`] = finiteOrNull(vol, 4);
  return result;
}

export interface RiskMetricOptions {
  benchmark?: string;
  lookbackDays?: number;
  varPercentile?: number;
}

/** Historical VaR percentile, max drawdown and beta against a benchmark; beta is null when the benchmark is unusable */
export async function riskMetrics(
  source: PriceHistorySource,
  ticker: string,
  asOf: string,
  options: RiskMetricOptions = {},
): Promise<unknown> {
  const benchmark = (options.benchmark ?? 'SPY').toUpperCase();
  const lookbackDays = options.lookbackDays ?? 90;
  const varPercentile = options.varPercentile ?? 5;
  const extra = { ticker, benchmark, as_of: asOf, lookback_days: lookbackDays };

  const [bars, benchBars] = await Promise.all([
    history(source, ticker, asOf, lookbackDays),
    history(source, benchmark, asOf, lookbackDays),
  ]);
  if (typeof bars === 'string') return failure('risk_metrics', bars, extra);
  if (bars.length < 2) return failure('risk_metrics', notEnough(ticker, 2, bars.length), extra);

  const closes = bars.map(b => b.close);
  const benchBeta = typeof benchBars === 'string' ? null : beta(bars, benchBars);

  return {
    ...extra,
    observations: bars.length,
    var_percentile: varPercentile,
    var_pct: finiteOrNull(percentile(pctChanges(closes), varPercentile) * 100, 2),
    max_drawdown_pct: round(maxDrawdown(closes) * 100, 2),
    beta_vs_benchmark: benchBeta === null ? null : round(benchBeta, 3),
    note: VAR_NOTE,
  };
}
