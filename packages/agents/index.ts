// stockdesk agents - specialist orchestration, PM aggregation and risk-adjusted conviction

export { Orchestrator } from './orchestrator/coordinator.js';
export type { OrchestratorOptions, CreateRunOptions } from './orchestrator/coordinator.js';
export { createOrchestrator, createProducers } from './orchestrator/factory.js';
export type { OrchestratorOverrides } from './orchestrator/factory.js';
export { AnalysisRun } from './orchestrator/run-context.js';
export { JoinGate, isEmptyOutput } from './orchestrator/join-gate.js';
export { SharedFetchCache } from './orchestrator/shared-fetch-cache.js';
export { StageTimer } from './orchestrator/stage-timer.js';
export type { Clock } from './orchestrator/stage-timer.js';
export { createSpecialist } from './orchestrator/specialist-factory.js';
export { PipelineError, ConfigurationError, FrozenRunError } from './orchestrator/errors.js';

export { BaseAnalyst } from './agents/base-analyst.js';
export type { AnalystContext, AnalystSettings } from './agents/base-analyst.js';
export { MarketAnalyst } from './agents/market-analyst.js';
export { SentimentAnalyst } from './agents/sentiment-analyst.js';
export { NewsAnalyst } from './agents/news-analyst.js';
export { FundamentalsAnalyst } from './agents/fundamentals-analyst.js';
export { ValuationAnalyst } from './agents/valuation-analyst.js';
export { SelfConsistencyReviewer } from './agents/self-consistency.js';
export type { ReviewOptions, ReviewResult, ReviewStatus } from './agents/self-consistency.js';
export { PortfolioManager } from './agents/portfolio-manager.js';
export { RiskManager } from './agents/risk-manager.js';

export {
  pmDirectionalScore, extractAnalystSignal, classifyRole, normalizeRecommendation,
  inferConflictLevel, withConflictLevel, aggregateToRecord, DEFAULT_PM_THRESHOLD,
} from './scoring/pm-score.js';
export {
  computeAdjustedConviction, resolveBaseConviction, finalizeRiskDecision, decisionToRecord,
  deriveRiskLevel,
} from './scoring/risk-adjustment.js';
export type { RiskFactors } from './scoring/risk-adjustment.js';

export { LocalSituationMemory } from './memory/situation-memory.js';
export type { SituationMemory } from './memory/situation-memory.js';
export { PgSituationMemory } from './memory/pg-situation-memory.js';
export { createSituationMemory } from './config/database.js';
export { healthCheck as postgresHealthCheck, runMigrations, closePool } from './db/pg-client.js';

export { loadConfig, parseSpecialistList, DEFAULT_CONFIG } from './config/index.js';
export type { StockdeskConfig, MemoryBackend } from './config/index.js';

export { AnthropicVerdictProducer } from './utils/verdict-producer.js';
export type { VerdictProducer, VerdictRequest } from './utils/verdict-producer.js';
export type { MarketDataProvider } from './utils/market-data.js';
export { extractJsonObject } from './utils/json.js';
export { createLogger, setLogLevel, errorMessage } from './utils/logger.js';
export { clamp01, roundTo, toFiniteNumber } from './utils/numbers.js';
export type { Logger, LogLevel } from './utils/logger.js';

export * from './types/agents.js';
export * from './types/analysis.js';
export * from './types/events.js';
export * from './types/memory.js';
