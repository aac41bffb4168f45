import { z } from "zod";
import { TickerSchema } from "./analysis.js";
import { SymbolAsOfSchema } from "./market-data.js";

export const MultifactorSnapshotSchema = SymbolAsOfSchema.extend({
  lookback_days: z.number().int().min(3).max(365).default(90).describe("Trading days of history ending at as_of"),
  risk_free_rate: z.number().min(0).max(0.2).default(0).describe("Annual risk-free rate for the Sharpe ratio (decimal)"),
});

export const CustomFactorsSchema = SymbolAsOfSchema.extend({
  momentum_days: z.number().int().min(1).max(252).default(20).describe("Short momentum window in trading days"),
  long_momentum_days: z.number().int().min(1).max(252).default(60).describe("Long momentum window in trading days"),
  vol_window: z.number().int().min(2).max(252).default(20).describe("Rolling volatility window in trading days"),
});

export const RiskMetricsSchema = SymbolAsOfSchema.extend({
  benchmark: TickerSchema.default("SPY").describe("Benchmark ticker for beta (default SPY)"),
  lookback_days: z.number().int().min(3).max(365).default(90).describe("Trading days of history ending at as_of"),
  var_percentile: z.number().min(0.1).max(50).default(5).describe("Left-tail percentile of daily returns used as VaR"),
});
