// Analysis Orchestration - AnalysisRun aggregate and its derived records
// PMAggregate and FinalDecision are snapshots: computed once, never mutated

import type { Recommendation, SpecialistKind, StageKey, SpecialistOutput } from './agents.js';

export type RunStatus = 'pending' | 'running' | 'aggregating' | 'risk_review' | 'completed' | 'failed';
export type RiskLevel = 'Low' | 'Medium' | 'High';
export type AnalystRole = 'fundamental' | 'valuation' | 'sentiment' | 'news' | 'technical' | 'macro' | 'other';

export type StageName = SpecialistKind | 'join_gate' | 'portfolio_manager' | 'risk_manager' | 'total';

export interface StageTiming {
  readonly startedAt: number;   // epoch ms
  readonly endedAt?: number;
  readonly elapsedMs?: number;
}

export type StageTimings = Partial<Record<StageName, StageTiming>>;

export type StageMapping = Partial<Record<StageKey, SpecialistOutput>>;

/** One raw input to the PM engine, as extracted from a specialist report */
export interface AnalystSignal {
  readonly analyst: string;
  readonly recommendation: unknown;
  readonly conviction: unknown;
}

export interface PMInput {
  readonly analyst: string;
  readonly role: AnalystRole;
  readonly recommendation: Recommendation;
  readonly conviction: number;
  readonly signal: number;
  readonly rawWeight: number;
  readonly weight: number;
}

export interface PMAggregate {
  readonly compositeScore: number;     // [-1, 1]
  readonly direction: Recommendation;
  readonly threshold: number;
  readonly baseConviction: number;     // [0, 1]
  readonly bullishStrength: number;
  readonly bearishStrength: number;
  readonly holdStrength: number;
  readonly inputs: readonly PMInput[];
  readonly conflictLevel?: number;
  readonly warning?: string;
}

export interface InvestmentPlan {
  readonly aggregate: PMAggregate;
  /** LLM synthesis with every numeric PM field overwritten from `aggregate` */
  readonly narrative: Record<string, unknown> | null;
}

export type MacroRisk = number | 'None';

export interface FinalDecision {
  readonly riskLevel: RiskLevel;
  readonly originalConviction: number;
  readonly adjustedConviction: number;
  readonly companyRisk: number | null;
  readonly valuationUncertainty: number | null;
  readonly sentimentRisk: number | null;
  readonly macroRisk: MacroRisk | null;
  readonly disagreement: number;
  readonly macroRiskWarning: string;
  readonly finalRecommendation: Recommendation;
  readonly riskFactors: Record<string, string>;
  readonly recommendationAdjustment: string;
  readonly explanation: string;
  readonly adjustedConvictionSource: 'formula' | 'draft' | 'pm_base';
  readonly repairs: readonly string[];
  readonly source: 'reviewed' | 'draft' | 'fallback';
}

export interface RunSnapshot {
  readonly runId: string;
  readonly ticker: string;
  readonly asOf: string;
  readonly status: RunStatus;
  readonly selected: readonly SpecialistKind[];
  readonly stages: StageMapping;
  readonly timings: StageTimings;
  readonly investmentPlan: InvestmentPlan | null;
  readonly finalDecision: FinalDecision | null;
  readonly warnings: readonly string[];
  readonly createdAt: Date;
  readonly completedAt?: Date;
  readonly error?: string;
}
