export { fmpFetch, CacheTTL } from './client.js';
export type { FmpFetch, FmpParams, FmpRequestOptions } from './client.js';
export {
  FmpMarketDataProvider, INDICATOR_PERIODS, loadSectorPeers, onOrBefore, toRows,
} from './provider.js';
export type { FmpProviderOptions, ProviderError, StatementFrequency } from './provider.js';
export { isIsoDate, quarterOf, shiftDays, toIsoDate } from './dates.js';
export {
  beta, customFactors, maxDrawdown, multifactorSnapshot, percentile, priceBars, riskMetrics, rsi, sampleStd,
} from './quant.js';
export type {
  FactorOptions, PriceBar, PriceHistorySource, RiskMetricOptions, SnapshotOptions,
} from './quant.js';
