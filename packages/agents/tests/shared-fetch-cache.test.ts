import { describe, it, expect, vi } from 'vitest';
import { SharedFetchCache } from '../orchestrator/shared-fetch-cache.js';
import type { FinancialBundle } from '../utils/market-data.js';

function bundle(tag: string): FinancialBundle {
  return {
    fundamentals: { tag, kind: 'fundamentals' },
    balanceSheet: { tag, kind: 'balance' },
    cashflow: { tag, kind: 'cashflow' },
    incomeStatement: { tag, kind: 'income' },
  };
}

describe('SharedFetchCache', () => {
  it('fetches once and serves later callers from the stored entry', async () => {
    const cache = new SharedFetchCache();
    const fetchFn = vi.fn(async () => bundle('first'));

    const a = await cache.acquireOrFetch('AAPL', '2024-05-10', fetchFn, 'Fundamentals Analyst');
    const b = await cache.acquireOrFetch('aapl', '2024-05-10', fetchFn, 'Valuation Analyst');

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(b).toBe(a);
    expect(b.ownerLabel).toBe('Fundamentals Analyst');
    expect(cache.stats).toEqual({ fetchAttempts: 1, hits: 1, joins: 0 });
  });

  it('lets a concurrent caller join the in-flight fetch', async () => {
    const cache = new SharedFetchCache();
    let release: (value: FinancialBundle) => void = () => {};
    const fetchFn = vi.fn(() => new Promise<FinancialBundle>(resolve => {
      release = resolve;
    }));
    const outcomes: string[] = [];

    const first = cache.acquireOrFetch('MSFT', '2024-05-10', fetchFn, 'Fundamentals Analyst',
      outcome => outcomes.push(`first:${outcome}`));
    const second = cache.acquireOrFetch('MSFT', '2024-05-10', fetchFn, 'Valuation Analyst',
      outcome => outcomes.push(`second:${outcome}`));

    await Promise.resolve();
    await Promise.resolve();
    expect(cache.isInFlight('MSFT', '2024-05-10')).toBe(true);
    release(bundle('shared'));

    const [a, b] = await Promise.all([first, second]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(a.fundamentals).toEqual({ tag: 'shared', kind: 'fundamentals' });
    expect(b).toBe(a);
    expect(outcomes.sort()).toEqual(['first:fetched', 'second:joined']);
    expect(cache.stats).toEqual({ fetchAttempts: 1, hits: 0, joins: 1 });
    expect(cache.isInFlight('MSFT', '2024-05-10')).toBe(false);
  });

  it('keys entries by ticker and date', async () => {
    const cache = new SharedFetchCache();
    const fetchFn = vi.fn(async () => bundle('x'));

    await cache.acquireOrFetch('AAPL', '2024-05-10', fetchFn, 'a');
    await cache.acquireOrFetch('AAPL', '2024-05-09', fetchFn, 'a');
    await cache.acquireOrFetch('NVDA', '2024-05-10', fetchFn, 'a');

    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(cache.size).toBe(3);
  });

  it('stores nothing when the fetch rejects, so the next caller retries', async () => {
    const cache = new SharedFetchCache();
    const failing = vi.fn(async (): Promise<FinancialBundle> => {
      throw new Error('upstream down');
    });

    await expect(cache.acquireOrFetch('AAPL', '2024-05-10', failing, 'a')).rejects.toThrow('upstream down');
    expect(cache.peek('AAPL', '2024-05-10')).toBeUndefined();
    expect(cache.isInFlight('AAPL', '2024-05-10')).toBe(false);

    const entry = await cache.acquireOrFetch('AAPL', '2024-05-10', async () => bundle('retry'), 'b');
    expect(entry.ownerLabel).toBe('b');
    expect(cache.stats.fetchAttempts).toBe(2);
  });

  it('clears the in-flight slot when fetchFn throws synchronously', async () => {
    const cache = new SharedFetchCache();
    const throwing = (): Promise<FinancialBundle> => {
      throw new Error('sync failure');
    };

    await expect(cache.acquireOrFetch('AAPL', '2024-05-10', throwing, 'a')).rejects.toThrow('sync failure');
    expect(cache.isInFlight('AAPL', '2024-05-10')).toBe(false);
  });

  it('freezes stored entries', async () => {
    const cache = new SharedFetchCache();
    const entry = await cache.acquireOrFetch('AAPL', '2024-05-10', async () => bundle('x'), 'a');
    expect(Object.isFrozen(entry)).toBe(true);
  });
});
