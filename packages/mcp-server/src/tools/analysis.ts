import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GetAnalysisSchema, ListTasksSchema, StartAnalysisSchema } from "../schemas/analysis.js";
import { coerceNumbers, respond } from "../formatters/response.js";
import type { TaskStatus, TaskStore } from "../task-store.js";

export interface HealthProbes {
  /** Resolves true when the Postgres memory backend answers; absent for the local backend */
  postgres?: () => Promise<boolean>;
  anthropicApiKey: boolean;
  fmpApiKey: boolean;
  memoryBackend: string;
  version: string;
}

export interface HealthReport {
  status: "healthy" | "degraded";
  service: string;
  version: string;
  timestamp: string;
  tasks: Record<TaskStatus, number>;
  checks: Record<string, boolean | string>;
}

export async function healthReport(store: TaskStore, probes: HealthProbes): Promise<HealthReport> {
  const checks: Record<string, boolean | string> = {
    anthropic_api_key: probes.anthropicApiKey,
    fmp_api_key: probes.fmpApiKey,
    memory_backend: probes.memoryBackend,
  };
  if (probes.postgres) checks.postgres = await probes.postgres();

  const healthy = Object.values(checks).every(value => value !== false);
  return {
    status: healthy ? "healthy" : "degraded",
    service: "stockdesk",
    version: probes.version,
    timestamp: new Date().toISOString(),
    tasks: store.counts(),
    checks,
  };
}

export function registerAnalysisTools(server: McpServer, store: TaskStore, probes: HealthProbes) {
  server.tool(
    "start_analysis",
    "Start a background equity analysis for a ticker as of a date. Runs the selected specialists (market, sentiment, news, fundamentals; valuation always runs), aggregates them in the Portfolio Manager and applies the risk-adjusted conviction. Returns a task_id immediately; poll get_analysis for the result.",
    StartAnalysisSchema.shape,
    async (params) => respond(() => {
      const { ticker, date, analysts } = StartAnalysisSchema.parse(coerceNumbers(params));
      return store.start(ticker, date, { specialists: analysts });
    }),
  );

  server.tool(
    "get_analysis",
    "Get the status and results of an analysis task: pending, processing, completed or failed. Includes each specialist report, stages still missing, the PM investment plan, the final risk-adjusted decision, stage timings and warnings.",
    GetAnalysisSchema.shape,
    async (params) => respond(() => {
      const { task_id } = GetAnalysisSchema.parse(params);
      const task = store.get(task_id);
      if (!task) throw new Error(`Task ${task_id} not found`);
      return task;
    }),
  );

  server.tool(
    "list_tasks",
    "List recent analysis tasks, newest first, with status and final recommendation.",
    ListTasksSchema.shape,
    async (params) => respond(() => {
      const { limit } = ListTasksSchema.parse(coerceNumbers(params));
      return { tasks: store.list(limit) };
    }),
  );

  server.tool(
    "health_check",
    "Report server health: API key presence, memory backend and its connectivity, and task counts by status.",
    async () => respond(() => healthReport(store, probes)),
  );
}
