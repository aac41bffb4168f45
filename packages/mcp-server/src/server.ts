import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  createOrchestrator,
  loadConfig,
  postgresHealthCheck,
  type MarketDataProvider,
  type StockdeskConfig,
} from "@stockdesk/agents";
import { FmpMarketDataProvider } from "@stockdesk/market-data";
import { TaskStore, type AnalysisRunner } from "./task-store.js";
import { registerAnalysisTools, type HealthProbes } from "./tools/analysis.js";
import { registerScoringTools } from "./tools/scoring.js";
import { registerMarketDataTools } from "./tools/market-data.js";
import { registerQuantTools } from "./tools/quant.js";

export const SERVER_NAME = "stockdesk-mcp";
export const SERVER_VERSION = "0.1.0";

export interface ServerOptions {
  config?: StockdeskConfig;
  provider?: MarketDataProvider;
  /** Builds the analysis runner; defaults to the configured orchestrator */
  runner?: () => Promise<AnalysisRunner>;
  probes?: Partial<HealthProbes>;
}

/** Build the runner once; a failed build is retried on the next call */
export function memoize<T>(factory: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | null = null;
  return () => {
    if (!pending) {
      pending = factory().catch((err: unknown) => {
        pending = null;
        throw err;
      });
    }
    return pending;
  };
}

export function createServer(options: ServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const provider = options.provider ?? new FmpMarketDataProvider();
  const runner = memoize(options.runner ?? (() => createOrchestrator(config, { dataProvider: provider })));
  const store = new TaskStore(runner);

  const probes: HealthProbes = {
    anthropicApiKey: Boolean(config.anthropicApiKey),
    fmpApiKey: Boolean(process.env.FMP_API_KEY),
    memoryBackend: config.memoryBackend,
    version: SERVER_VERSION,
    postgres: config.memoryBackend === "postgres" ? postgresHealthCheck : undefined,
    ...options.probes,
  };

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerAnalysisTools(server, store, probes);
  registerScoringTools(server);
  registerMarketDataTools(server, provider);
  registerQuantTools(server, provider);

  return { server, store };
}

export { TaskStore, taskStatus } from "./task-store.js";
export type { AnalysisRunner, TaskStatus, TaskSummary, TaskView } from "./task-store.js";
export { healthReport } from "./tools/analysis.js";
export type { HealthProbes, HealthReport } from "./tools/analysis.js";
export { pmScore, riskAdjustedConviction } from "./tools/scoring.js";
export { coerceNumbers, wrapResponse, respond } from "./formatters/response.js";
export { MARKET_DATA_TOOLS, unwrap } from "./tools/market-data.js";
export { QUANT_TOOLS } from "./tools/quant.js";
