import {
  aggregateToRecord,
  createLogger,
  decisionToRecord,
  errorMessage,
  SPECIALIST_LABELS,
  STAGE_KEYS,
  type AnalysisRun,
  type CreateRunOptions,
  type RunSnapshot,
  type RunStatus,
} from "@stockdesk/agents";

const logger = createLogger("TaskStore");

export type TaskStatus = "pending" | "processing" | "completed" | "failed";

/** The part of the orchestrator a task store drives */
export interface AnalysisRunner {
  createRun(ticker: string, asOf: string, options?: CreateRunOptions): AnalysisRun;
  execute(run: AnalysisRun): Promise<RunSnapshot>;
}

export interface TaskSummary {
  task_id: string;
  status: TaskStatus;
  ticker: string;
  date: string;
  created_at: string;
  completed_at: string | null;
  final_recommendation: string | null;
  adjusted_conviction: number | null;
}

export interface TaskView extends TaskSummary {
  error: string | null;
  specialists: string[];
  stages: Record<string, unknown>;
  pending_stages: string[];
  investment_plan: Record<string, unknown> | null;
  final_decision: Record<string, unknown> | null;
  timings: Record<string, number | null>;
  warnings: string[];
}

interface TaskEntry {
  run: AnalysisRun;
  done: Promise<void>;
}

export function taskStatus(status: RunStatus): TaskStatus {
  switch (status) {
    case "pending":
      return "pending";
    case "completed":
      return "completed";
    case "failed":
      return "failed";
    default:
      return "processing";
  }
}

function summarize(run: AnalysisRun): TaskSummary {
  const snapshot = run.snapshot();
  return {
    task_id: snapshot.runId,
    status: taskStatus(snapshot.status),
    ticker: snapshot.ticker,
    date: snapshot.asOf,
    created_at: snapshot.createdAt.toISOString(),
    completed_at: snapshot.completedAt ? snapshot.completedAt.toISOString() : null,
    final_recommendation: snapshot.finalDecision?.finalRecommendation ?? null,
    adjusted_conviction: snapshot.finalDecision?.adjustedConviction ?? null,
  };
}

function stagesView(snapshot: RunSnapshot): Record<string, unknown> {
  const stages: Record<string, unknown> = {};
  for (const kind of snapshot.selected) {
    const output = snapshot.stages[STAGE_KEYS[kind]];
    if (!output) continue;
    stages[STAGE_KEYS[kind]] = {
      analyst: output.label,
      review_status: output.reviewStatus,
      report: output.raw,
      verdict: output.verdict,
      warnings: output.warnings,
      error: output.error ?? null,
    };
  }
  return stages;
}

function view(run: AnalysisRun): TaskView {
  const snapshot = run.snapshot();
  const plan = snapshot.investmentPlan;
  const timings: Record<string, number | null> = {};
  for (const [stage, timing] of Object.entries(snapshot.timings)) {
    timings[stage] = timing?.elapsedMs ?? null;
  }

  return {
    ...summarize(run),
    error: snapshot.error ?? null,
    specialists: snapshot.selected.map(kind => SPECIALIST_LABELS[kind]),
    stages: stagesView(snapshot),
    pending_stages: run.gate.pending(),
    investment_plan: plan
      ? { ...aggregateToRecord(plan.aggregate), narrative: plan.narrative }
      : null,
    final_decision: snapshot.finalDecision ? decisionToRecord(snapshot.finalDecision) : null,
    timings,
    warnings: [...snapshot.warnings],
  };
}

/**
 * In-memory registry of background analyses.
 * Tasks live for the life of the process; the runner is resolved on first use.
 */
export class TaskStore {
  private readonly tasks = new Map<string, TaskEntry>();

  constructor(private readonly runner: () => Promise<AnalysisRunner>) {}

  /**
   * Validate the request and start the run in the background.
   * Rejects with ConfigurationError before any task is registered.
   */
  async start(ticker: string, date: string, options: CreateRunOptions = {}): Promise<TaskSummary> {
    const runner = await this.runner();
    const run = runner.createRun(ticker, date, options);
    const done = runner.execute(run).then(
      () => undefined,
      (err: unknown) => {
        logger.error(`Task ${run.runId} failed`, { error: errorMessage(err) });
      },
    );
    this.tasks.set(run.runId, { run, done });
    logger.info(`Started task ${run.runId} for ${run.ticker} as of ${run.asOf}`);
    return summarize(run);
  }

  get(taskId: string): TaskView | null {
    const entry = this.tasks.get(taskId);
    return entry ? view(entry.run) : null;
  }

  /** Most recent first */
  list(limit = 10): TaskSummary[] {
    return [...this.tasks.values()]
      .reverse()
      .slice(0, Math.max(0, limit))
      .map(entry => summarize(entry.run));
  }

  /** Resolves once the task reached a terminal status; unknown ids resolve to null */
  async wait(taskId: string): Promise<TaskView | null> {
    const entry = this.tasks.get(taskId);
    if (!entry) return null;
    await entry.done;
    return view(entry.run);
  }

  counts(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = { pending: 0, processing: 0, completed: 0, failed: 0 };
    for (const { run } of this.tasks.values()) {
      counts[taskStatus(run.status)] += 1;
    }
    return counts;
  }
}
