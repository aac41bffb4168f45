import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { MarketDataProvider } from "@stockdesk/agents";
import { customFactors, multifactorSnapshot, riskMetrics } from "@stockdesk/market-data";
import { CustomFactorsSchema, MultifactorSnapshotSchema, RiskMetricsSchema } from "../schemas/quant.js";
import { coerceNumbers, respond } from "../formatters/response.js";
import { unwrap, type MarketDataTool } from "./market-data.js";

export const QUANT_TOOLS: readonly MarketDataTool[] = [
  {
    name: "multifactor_snapshot",
    description: "Multi-factor snapshot over the look-back window ending at as_of: total return %, annualised volatility, Sharpe ratio, max drawdown %, RSI-14 and average daily volume.",
    schema: MultifactorSnapshotSchema,
    run: async (provider, params) => {
      const { ticker, as_of, lookback_days, risk_free_rate } = MultifactorSnapshotSchema.parse(coerceNumbers(params));
      return unwrap(await multifactorSnapshot(provider, ticker.toUpperCase(), as_of, {
        lookbackDays: lookback_days,
        riskFreeRate: risk_free_rate,
      }));
    },
  },
  {
    name: "custom_factors",
    description: "Custom factors: short and long price momentum % and annualised rolling volatility, each over a configurable window of trading days. A window longer than the available history reports null.",
    schema: CustomFactorsSchema,
    run: async (provider, params) => {
      const { ticker, as_of, momentum_days, long_momentum_days, vol_window } = CustomFactorsSchema.parse(coerceNumbers(params));
      return unwrap(await customFactors(provider, ticker.toUpperCase(), as_of, {
        momentumDays: momentum_days,
        longMomentumDays: long_momentum_days,
        volWindow: vol_window,
      }));
    },
  },
  {
    name: "risk_metrics",
    description: "Risk metrics over the look-back window ending at as_of: historical VaR at a percentile of daily returns, max drawdown % and beta against a benchmark (null when the benchmark has no usable history).",
    schema: RiskMetricsSchema,
    run: async (provider, params) => {
      const { ticker, as_of, benchmark, lookback_days, var_percentile } = RiskMetricsSchema.parse(coerceNumbers(params));
      return unwrap(await riskMetrics(provider, ticker.toUpperCase(), as_of, {
        benchmark,
        lookbackDays: lookback_days,
        varPercentile: var_percentile,
      }));
    },
  },
];

export function registerQuantTools(server: McpServer, provider: MarketDataProvider) {
  for (const tool of QUANT_TOOLS) {
    server.tool(
      tool.name,
      tool.description,
      tool.schema.shape,
      async (params: unknown) => respond(() => tool.run(provider, params)),
    );
  }
}
