// Orchestrator - fan out the specialists, release the PM stage through the join gate,
// aggregate, risk-adjust and freeze the run

import { randomUUID } from 'node:crypto';
import { isIsoDate } from '@stockdesk/market-data';
import { SPECIALIST_KINDS, SELECTABLE_SPECIALISTS, type SpecialistKind } from '../types/agents.js';
import type { RunSnapshot, StageMapping } from '../types/analysis.js';
import {
  DOMAIN_EVENT_TYPES, SimpleEventBus, type DomainEvent, type DomainEventType, type EventBus,
} from '../types/events.js';
import { DEFAULT_CONFIG, type StockdeskConfig } from '../config/index.js';
import type { MarketDataProvider } from '../utils/market-data.js';
import type { VerdictProducer } from '../utils/verdict-producer.js';
import type { SituationMemory } from '../memory/situation-memory.js';
import type { AnalystContext } from '../agents/base-analyst.js';
import type { ManagerContext } from '../agents/manager-support.js';
import { situationText } from '../agents/manager-support.js';
import { SelfConsistencyReviewer } from '../agents/self-consistency.js';
import { PortfolioManager } from '../agents/portfolio-manager.js';
import { RiskManager } from '../agents/risk-manager.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { AnalysisRun } from './run-context.js';
import { createSpecialist } from './specialist-factory.js';
import { ConfigurationError, PipelineError } from './errors.js';
import type { Clock } from './stage-timer.js';

const logger = createLogger('Orchestrator');

const TICKER_PATTERN = /^[A-Z0-9][A-Z0-9.-]{0,9}$/;

export interface OrchestratorOptions {
  dataProvider: MarketDataProvider;
  /** Specialists and their self-consistency review */
  quickProducer: VerdictProducer;
  /** PM narrative and risk manager; defaults to quickProducer, null keeps both deterministic */
  deepProducer?: VerdictProducer | null;
  memory?: SituationMemory | null;
  config?: Partial<StockdeskConfig>;
  onEvent?: (event: DomainEvent) => void;
  clock?: Clock;
}

export interface CreateRunOptions {
  specialists?: readonly SpecialistKind[];
  runId?: string;
}

function isSelectable(kind: SpecialistKind): boolean {
  return SELECTABLE_SPECIALISTS.includes(kind);
}

export class Orchestrator {
  readonly events: EventBus = new SimpleEventBus();
  readonly config: StockdeskConfig;
  private readonly provider: MarketDataProvider;
  private readonly quickProducer: VerdictProducer;
  private readonly deepProducer: VerdictProducer | null;
  private readonly memory: SituationMemory | null;
  private readonly clock?: Clock;

  constructor(options: OrchestratorOptions) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.provider = options.dataProvider;
    this.quickProducer = options.quickProducer;
    this.deepProducer = options.deepProducer === undefined ? options.quickProducer : options.deepProducer;
    this.memory = options.memory ?? null;
    this.clock = options.clock;

    if (options.onEvent) {
      const handler = options.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.events.on(type, handler);
      }
    }
  }

  /**
   * Validate the request and create a pending run.
   * Throws ConfigurationError for a malformed ticker or date, or when no specialist is selected.
   */
  createRun(ticker: string, asOf: string, options: CreateRunOptions = {}): AnalysisRun {
    const symbol = ticker.trim().toUpperCase();
    const issues: string[] = [];
    if (!TICKER_PATTERN.test(symbol)) issues.push(`ticker: invalid symbol "${ticker}"`);
    if (!isIsoDate(asOf)) issues.push(`asOf: expected YYYY-MM-DD, got "${asOf}"`);

    const requested = options.specialists ?? this.config.analysts;
    const selected = requested.filter(isSelectable);
    if (selected.length === 0) issues.push('specialists: no specialists selected');
    if (issues.length > 0) {
      throw new ConfigurationError(`Invalid analysis request: ${issues.join('; ')}`, issues);
    }

    const run = new AnalysisRun({ ticker: symbol, asOf, selected, runId: options.runId, clock: this.clock });
    this.emit(run, 'AnalysisRequested', { ticker: symbol, asOf, specialists: [...run.selected] });
    logger.info(`Created run ${run.runId} for ${symbol} as of ${asOf}`, { specialists: run.selected });
    return run;
  }

  /** Run every stage of a pending run; resolves after all specialists finished and the run froze */
  async execute(run: AnalysisRun): Promise<RunSnapshot> {
    if (run.status !== 'pending') {
      throw new PipelineError(`Run ${run.runId} is ${run.status}; only pending runs can execute`, 'run');
    }

    try {
      run.transition('running');
      run.timer.start('total');
      run.timer.start('join_gate');

      const analystCtx: AnalystContext = {
        run,
        provider: this.provider,
        producer: this.quickProducer,
        reviewer: new SelfConsistencyReviewer(this.quickProducer),
        eventBus: this.events,
        settings: {
          marketLookbackDays: this.config.marketLookbackDays,
          newsLookbackDays: this.config.newsLookbackDays,
          indicatorLookbackDays: this.config.indicatorLookbackDays,
          maxTokens: this.config.maxTokens,
        },
      };

      const specialists = Promise.allSettled(
        run.selected.map(kind => createSpecialist(kind).execute(analystCtx)),
      );

      const released = await Promise.race([
        run.gate.whenReady(),
        specialists.then(() => null),
      ]);
      const snapshot = released ?? (run.gate.status === 'ready' ? await run.gate.whenReady() : null);
      if (!snapshot) {
        throw new PipelineError(
          `Join gate never released; missing ${run.gate.pending().join(', ')}`,
          'join_gate',
        );
      }
      run.timer.end('join_gate');
      this.emit(run, 'GateReleased', {
        stages: Object.keys(snapshot),
        valuationReady: snapshot.valuation_report !== undefined,
      });

      const managerCtx: ManagerContext = {
        run,
        producer: this.deepProducer,
        reviewer: this.deepProducer ? new SelfConsistencyReviewer(this.deepProducer) : null,
        memory: this.memory,
        memoryMatches: this.config.memoryMatches,
        maxTokens: this.config.maxTokens,
      };

      run.transition('aggregating');
      const pm = new PortfolioManager(this.config.pmThreshold);
      const plan = await run.timer.time('portfolio_manager', () => pm.run(managerCtx, snapshot));
      run.setInvestmentPlan(plan);
      this.emit(run, 'AggregationCompleted', {
        direction: plan.aggregate.direction,
        compositeScore: plan.aggregate.compositeScore,
        baseConviction: plan.aggregate.baseConviction,
        conflictLevel: plan.aggregate.conflictLevel,
      });

      run.transition('risk_review');
      const risk = new RiskManager();
      const decision = await run.timer.time('risk_manager', () => risk.run(managerCtx, plan, run.stages));
      this.emit(run, 'RiskAdjusted', {
        finalRecommendation: decision.finalRecommendation,
        adjustedConviction: decision.adjustedConviction,
        riskLevel: decision.riskLevel,
        repairs: decision.repairs.length,
      });

      await specialists;
      await this.remember(run, run.stages,
        `${decision.finalRecommendation} at conviction ${decision.adjustedConviction}. ${decision.explanation}`.trim());

      run.timer.end('total');
      run.recordDecision(decision);
      this.emit(run, 'AnalysisCompleted', {
        finalRecommendation: decision.finalRecommendation,
        adjustedConviction: decision.adjustedConviction,
        warnings: run.warnings.length,
        elapsedMs: run.timer.elapsedMs('total'),
      });
      logger.info(`Run ${run.runId} completed: ${decision.finalRecommendation} (${decision.adjustedConviction})`);
      return run.snapshot();
    } catch (err) {
      const message = errorMessage(err);
      const stage = run.status;
      logger.error(`Run ${run.runId} failed`, { error: message });
      run.fail(message);
      this.emit(run, 'AnalysisFailed', { error: message });
      if (err instanceof PipelineError) throw err;
      throw new PipelineError(`Analysis of ${run.ticker} failed: ${message}`, stage, err);
    }
  }

  async analyze(ticker: string, asOf: string, options: CreateRunOptions = {}): Promise<RunSnapshot> {
    return this.execute(this.createRun(ticker, asOf, options));
  }

  /** Store the outcome for future prompt context; failure only costs the memory entry */
  private async remember(run: AnalysisRun, stages: StageMapping, recommendation: string): Promise<void> {
    if (!this.config.rememberDecisions || !this.memory) return;
    try {
      await this.memory.store(situationText(stages, SPECIALIST_KINDS), recommendation);
    } catch (err) {
      logger.warn('Failed to store decision in situation memory', { error: errorMessage(err) });
      run.addWarning(`Situation memory: decision not stored (${errorMessage(err)})`);
    }
  }

  private emit(run: AnalysisRun, type: DomainEventType, payload: Record<string, unknown>): void {
    this.events.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      runId: run.runId,
      payload,
    });
  }
}
