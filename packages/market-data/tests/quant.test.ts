import { describe, it, expect, vi } from 'vitest';
import {
  beta, customFactors, maxDrawdown, multifactorSnapshot, percentile, priceBars, riskMetrics, rsi,
} from '../src/quant.js';

// Daily bars from 2024-05-06 onwards
function series(closes: number[], volumes: number[] = []) {
  return {
    rows: closes.map((close, i) => ({
      date: `2024-05-${String(6 + i).padStart(2, '0')}`,
      close,
      ...(volumes[i] === undefined ? {} : { volume: volumes[i] }),
    })),
  };
}

function fakeSource(byTicker: Record<string, unknown>) {
  return {
    getStockData: vi.fn(async (ticker: string, _start: string, _end: string) =>
      byTicker[ticker] ?? { error: `no data for ${ticker}`, method: 'get_stock_data', ticker }),
  };
}

describe('priceBars', () => {
  it('keeps readable rows oldest first', () => {
    const bars = priceBars({
      rows: [
        { date: '2024-05-08 00:00:00', close: 12, volume: 300 },
        { date: '2024-05-07', close: 11 },
        { date: '2024-05-06' },
        { date: '2024-05-05', close: -1 },
        'junk',
      ],
    });

    expect(bars).toEqual([
      { date: '2024-05-07', close: 11, volume: null },
      { date: '2024-05-08', close: 12, volume: 300 },
    ]);
    expect(priceBars({ error: 'down' })).toEqual([]);
  });
});

describe('statistics', () => {
  it('measures the deepest peak-to-trough fall', () => {
    // peak 120 -> trough 90
    expect(maxDrawdown([100, 120, 90, 130, 117])).toBeCloseTo(-0.25, 12);
    expect(maxDrawdown([100, 101, 102])).toBe(0);
  });

  it('interpolates percentiles between ranks', () => {
    const values = [0.03, -0.02, 0.01, -0.04, 0.05];
    // rank 0.2 between -0.04 and -0.02
    expect(percentile(values, 5)).toBeCloseTo(-0.036, 12);
    expect(percentile(values, 50)).toBe(0.01);
    expect(percentile([], 5)).toBeNaN();
  });

  it('computes RSI from the last period of moves', () => {
    expect(rsi([1, 2, 3, 2], 2)).toBeCloseTo(50, 6);
    expect(rsi([1, 2, 3], 2)).toBeCloseTo(100, 5);
    expect(rsi([1, 2], 2)).toBeNaN();
  });

  it('returns null beta without two shared return dates', () => {
    const asset = priceBars(series([100, 102]));
    expect(beta(asset, asset)).toBeNull();
  });
});

describe('multifactorSnapshot', () => {
  it('summarises return, volatility, Sharpe, drawdown and volume', async () => {
    const source = fakeSource({ AAPL: series([100, 110, 99, 108.9], [1000, 2000, 3000, 4000]) });

    const result = await multifactorSnapshot(source, 'AAPL', '2024-05-10');

    // returns +0.1, -0.1, +0.1: sample std 0.11547 -> annualised sqrt(3.36)
    expect(result).toEqual({
      ticker: 'AAPL',
      as_of: '2024-05-10',
      lookback_days: 90,
      observations: 4,
      return_pct: 8.9,
      vol_annualized: 1.833,
      sharpe: 4.583,
      max_drawdown_pct: -10,
      rsi_14: null,
      avg_volume: 2500,
    });
    expect(source.getStockData).toHaveBeenCalledWith('AAPL', '2023-11-12', '2024-05-10');
  });

  it('keeps only the last lookback_days bars', async () => {
    const source = fakeSource({ AAPL: series([100, 110, 99, 108.9]) });

    const result = await multifactorSnapshot(source, 'AAPL', '2024-05-10', { lookbackDays: 3 });

    expect(result).toMatchObject({ observations: 3, return_pct: -1, avg_volume: null });
    expect(source.getStockData).toHaveBeenCalledWith('AAPL', '2024-05-04', '2024-05-10');
  });

  it('reports too little history as an error payload', async () => {
    const source = fakeSource({ AAPL: series([100, 101]) });

    expect(await multifactorSnapshot(source, 'AAPL', '2024-05-10')).toEqual({
      error: 'Not enough price history for AAPL: need at least 3 closes, got 2',
      method: 'multifactor_snapshot',
      ticker: 'AAPL',
      as_of: '2024-05-10',
      lookback_days: 90,
    });
  });

  it('passes a provider error through under its own method', async () => {
    const source = fakeSource({});

    expect(await multifactorSnapshot(source, 'MSFT', '2024-05-10')).toMatchObject({
      error: 'no data for MSFT',
      method: 'multifactor_snapshot',
    });
  });

  it('turns a rejected fetch into an error payload', async () => {
    const source = { getStockData: vi.fn(async () => { throw new Error('socket hang up'); }) };

    expect(await multifactorSnapshot(source, 'AAPL', '2024-05-10')).toMatchObject({
      error: 'socket hang up',
      method: 'multifactor_snapshot',
    });
  });
});

describe('customFactors', () => {
  it('names each factor after its window', async () => {
    const source = fakeSource({ AAPL: series([100, 102, 104, 100, 105]) });

    const result = await customFactors(source, 'AAPL', '2024-05-10', {
      momentumDays: 2, longMomentumDays: 4, volWindow: 2,
    });

    // 105/104 - 1 and 105/100 - 1; last two returns -0.03846 and +0.05
    expect(result).toEqual({
      ticker: 'AAPL',
      as_of: '2024-05-10',
      observations: 5,
      momentum_2d_pct: 0.96,
      momentum_4d_pct: 5,
      vol_annualized_2d: 0.993,
    });
    // at least 30 days of history are requested
    expect(source.getStockData).toHaveBeenCalledWith('AAPL', '2024-03-11', '2024-05-10');
  });

  it('reports null for windows longer than the history', async () => {
    const source = fakeSource({ AAPL: series([100, 102, 104, 100, 105]) });

    const result = await customFactors(source, 'AAPL', '2024-05-10', {
      momentumDays: 2, longMomentumDays: 10, volWindow: 10,
    });

    expect(result).toMatchObject({ momentum_2d_pct: 0.96, momentum_10d_pct: null, vol_annualized_10d: null });
  });
});

describe('riskMetrics', () => {
  it('computes historical VaR, drawdown and beta against the benchmark', async () => {
    const source = fakeSource({
      AAPL: series([100, 102, 104, 100, 105]),
      SPY: series([50, 51, 52, 50, 52]),
    });

    const result = await riskMetrics(source, 'AAPL', '2024-05-10');

    expect(result).toEqual({
      ticker: 'AAPL',
      benchmark: 'SPY',
      as_of: '2024-05-10',
      lookback_days: 90,
      observations: 5,
      var_percentile: 5,
      var_pct: -2.98,
      max_drawdown_pct: -3.85,
      beta_vs_benchmark: 1.086,
      note: 'VaR is a simple historical percentile; use with caution.',
    });
  });

  it('leaves beta null when the benchmark is unavailable', async () => {
    const source = fakeSource({ AAPL: series([100, 102, 104, 100, 105]) });

    const result = await riskMetrics(source, 'AAPL', '2024-05-10', { benchmark: 'qqq' });

    expect(result).toMatchObject({ benchmark: 'QQQ', beta_vs_benchmark: null, var_pct: -2.98 });
  });
});
