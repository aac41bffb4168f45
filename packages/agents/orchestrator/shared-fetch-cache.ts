// Shared fetch cache - one fetch of the four correlated statements per (ticker, asOf)
// The first caller registers a promise; concurrent callers await that same promise

import type { FinancialBundle } from '../utils/market-data.js';

export interface SharedFetchEntry extends FinancialBundle {
  readonly ticker: string;
  readonly asOf: string;
  readonly ownerLabel: string;
  readonly fetchedAt: Date;
}

export interface SharedFetchStats {
  /** fetchFn invocations */
  fetchAttempts: number;
  /** callers served from a completed entry */
  hits: number;
  /** callers that awaited another caller's in-flight fetch */
  joins: number;
}

export type AcquireOutcome = 'fetched' | 'hit' | 'joined';

export class SharedFetchCache {
  private entries = new Map<string, SharedFetchEntry>();
  private inFlight = new Map<string, Promise<SharedFetchEntry>>();
  private counters: SharedFetchStats = { fetchAttempts: 0, hits: 0, joins: 0 };

  private static key(ticker: string, asOf: string): string {
    return `${ticker.toUpperCase()}|${asOf}`;
  }

  /**
   * Return the bundle for (ticker, asOf), fetching it at most once.
   * A rejected fetch stores nothing and rejects every caller that joined it;
   * the next caller after that starts a fresh attempt.
   */
  async acquireOrFetch(
    ticker: string,
    asOf: string,
    fetchFn: () => Promise<FinancialBundle>,
    ownerLabel: string,
    onOutcome?: (outcome: AcquireOutcome, entry: SharedFetchEntry) => void,
  ): Promise<SharedFetchEntry> {
    const key = SharedFetchCache.key(ticker, asOf);

    const cached = this.entries.get(key);
    if (cached) {
      this.counters.hits++;
      onOutcome?.('hit', cached);
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.counters.joins++;
      const entry = await pending;
      onOutcome?.('joined', entry);
      return entry;
    }

    this.counters.fetchAttempts++;
    // registered before fetchFn runs, so a synchronous throw still clears it
    const promise = Promise.resolve()
      .then(fetchFn)
      .then(bundle => this.store(key, ticker, asOf, ownerLabel, bundle))
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, promise);
    const entry = await promise;
    onOutcome?.('fetched', entry);
    return entry;
  }

  private store(
    key: string,
    ticker: string,
    asOf: string,
    ownerLabel: string,
    bundle: FinancialBundle,
  ): SharedFetchEntry {
    const entry: SharedFetchEntry = Object.freeze({
      ticker,
      asOf,
      ownerLabel,
      fetchedAt: new Date(),
      fundamentals: bundle.fundamentals,
      balanceSheet: bundle.balanceSheet,
      cashflow: bundle.cashflow,
      incomeStatement: bundle.incomeStatement,
    });
    this.entries.set(key, entry);
    return entry;
  }

  /** Completed entry for the key, without fetching */
  peek(ticker: string, asOf: string): SharedFetchEntry | undefined {
    return this.entries.get(SharedFetchCache.key(ticker, asOf));
  }

  isInFlight(ticker: string, asOf: string): boolean {
    return this.inFlight.has(SharedFetchCache.key(ticker, asOf));
  }

  get size(): number {
    return this.entries.size;
  }

  get stats(): Readonly<SharedFetchStats> {
    return { ...this.counters };
  }
}
