// Risk adjustment - multiplicative conviction decay that never flips the PM direction
// C_final = C_PM · (1−R_c) · (1−V_u) · (1−S_r) · (1−M_r) · (1−D)

import type { FinalDecision, MacroRisk, PMAggregate, RiskLevel } from '../types/analysis.js';
import { clamp01, roundTo, toFiniteNumber } from '../utils/numbers.js';
import { inferConflictLevel } from './pm-score.js';

export const DEFAULT_BASE_CONVICTION = 0.5;

/** Keys the risk verifier may change; everything else comes from the draft */
export const RISK_ADJUSTABLE_KEYS = [
  'risk_level',
  'original_conviction',
  'adjusted_conviction',
  'risk_factor_rc',
  'risk_factor_rm',
  'disagreement',
  'valuation_uncertainty',
  'sentiment_risk_score',
  'macro_risk_warning',
  'recommendation_adjustment',
] as const;

export interface RiskFactors {
  basePm: number;
  companyRisk: number;
  valuationUncertainty: number;
  sentimentRisk: number;
  macroRisk: MacroRisk;
  disagreement: number;
}

export function computeAdjustedConviction(factors: RiskFactors): number {
  const macro = factors.macroRisk === 'None' ? 0 : factors.macroRisk;
  const product =
    clamp01(factors.basePm) *
    (1 - clamp01(factors.companyRisk)) *
    (1 - clamp01(factors.valuationUncertainty)) *
    (1 - clamp01(factors.sentimentRisk)) *
    (1 - clamp01(macro)) *
    (1 - clamp01(factors.disagreement));
  return roundTo(clamp01(product), 2);
}

/** C_PM = max(bullish, bearish), else the aggregate base conviction, else 0.5 */
export function resolveBaseConviction(aggregate: Partial<PMAggregate> | null | undefined): number {
  if (!aggregate) return DEFAULT_BASE_CONVICTION;
  const { bullishStrength, bearishStrength, baseConviction } = aggregate;
  if (typeof bullishStrength === 'number' && typeof bearishStrength === 'number') {
    return clamp01(Math.max(bullishStrength, bearishStrength));
  }
  if (typeof baseConviction === 'number') return clamp01(baseConviction);
  return DEFAULT_BASE_CONVICTION;
}

export function resolveDisagreement(aggregate: PMAggregate): number {
  if (typeof aggregate.conflictLevel === 'number') return clamp01(aggregate.conflictLevel);
  return inferConflictLevel(aggregate.inputs);
}

function readFactor(
  draft: Record<string, unknown>,
  key: string,
  repairs: string[],
): number | null {
  if (!(key in draft)) {
    repairs.push(`${key}: missing`);
    return null;
  }
  const n = toFiniteNumber(draft[key]);
  if (n === null) {
    repairs.push(`${key}: not numeric`);
    return null;
  }
  if (n < 0 || n > 1) {
    repairs.push(`${key}: clamped ${n} to [0,1]`);
    return clamp01(n);
  }
  return n;
}

function isNoneLiteral(value: unknown): boolean {
  return typeof value === 'string' && value.trim().toLowerCase() === 'none';
}

function readMacro(draft: Record<string, unknown>, repairs: string[]): MacroRisk | null {
  const raw = draft.risk_factor_rm;
  if (isNoneLiteral(raw)) return 'None';
  if (raw === undefined && isNoneLiteral(draft.macro_risk_warning)) return 'None';
  return readFactor(draft, 'risk_factor_rm', repairs);
}

function readString(draft: Record<string, unknown>, key: string): string {
  const value = draft[key];
  return typeof value === 'string' ? value : '';
}

function readRationale(draft: Record<string, unknown>): Record<string, string> {
  const raw = draft.risk_factors;
  const out: Record<string, string> = {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return out;
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') out[key] = value;
  }
  return out;
}

function normalizeRiskLevel(value: unknown): RiskLevel | null {
  if (typeof value !== 'string') return null;
  switch (value.trim().toLowerCase()) {
    case 'low': return 'Low';
    case 'medium': return 'Medium';
    case 'high': return 'High';
    default: return null;
  }
}

/** Risk level from the largest single decay factor */
export function deriveRiskLevel(factors: readonly number[]): RiskLevel {
  const worst = factors.reduce((max, f) => Math.max(max, f), 0);
  if (worst >= 0.6) return 'High';
  if (worst >= 0.3) return 'Medium';
  return 'Low';
}

/**
 * Turn a (possibly malformed) risk draft into the final decision.
 *
 * The recommendation is always the PM direction. When all four assessed
 * factors are readable the adjusted conviction is recomputed by the formula;
 * otherwise a readable draft value is clamped and kept; otherwise the PM base
 * conviction is used. Every deviation from the draft is listed in `repairs`.
 */
export function finalizeRiskDecision(
  draft: Record<string, unknown> | null,
  aggregate: PMAggregate,
  source: FinalDecision['source'] = 'draft',
): FinalDecision {
  const d = draft ?? {};
  const repairs: string[] = [];
  if (!draft) repairs.push('risk draft unavailable; using PM aggregate only');

  const basePm = resolveBaseConviction(aggregate);

  const recommendationRaw = d.final_recommendation;
  if (recommendationRaw !== aggregate.direction) {
    repairs.push(`final_recommendation: forced ${JSON.stringify(recommendationRaw ?? null)} to ${aggregate.direction}`);
  }

  const companyRisk = readFactor(d, 'risk_factor_rc', repairs);
  const valuationUncertainty = readFactor(d, 'valuation_uncertainty', repairs);
  const sentimentRisk = readFactor(d, 'sentiment_risk_score', repairs);
  const macroRisk = readMacro(d, repairs);

  // The PM conflict level outranks whatever the draft claims for D
  const drafted = readFactor(d, 'disagreement', repairs);
  let disagreement: number;
  if (drafted === null) {
    disagreement = resolveDisagreement(aggregate);
    repairs.push(`disagreement: filled with ${disagreement}`);
  } else if (typeof aggregate.conflictLevel === 'number' && drafted !== clamp01(aggregate.conflictLevel)) {
    disagreement = clamp01(aggregate.conflictLevel);
    repairs.push(`disagreement: replaced ${drafted} with PM conflict level ${disagreement}`);
  } else {
    disagreement = drafted;
  }

  let adjustedConviction: number;
  let adjustedConvictionSource: FinalDecision['adjustedConvictionSource'];
  const draftAdjusted = toFiniteNumber(d.adjusted_conviction);

  if (companyRisk !== null && valuationUncertainty !== null && sentimentRisk !== null && macroRisk !== null) {
    adjustedConviction = computeAdjustedConviction({
      basePm, companyRisk, valuationUncertainty, sentimentRisk, macroRisk, disagreement,
    });
    adjustedConvictionSource = 'formula';
    if (draftAdjusted !== null && roundTo(draftAdjusted, 2) !== adjustedConviction) {
      repairs.push(`adjusted_conviction: recomputed ${draftAdjusted} as ${adjustedConviction}`);
    }
  } else if (draftAdjusted !== null) {
    adjustedConviction = roundTo(clamp01(draftAdjusted), 2);
    adjustedConvictionSource = 'draft';
    if (adjustedConviction !== draftAdjusted) {
      repairs.push(`adjusted_conviction: clamped ${draftAdjusted} to ${adjustedConviction}`);
    }
  } else {
    adjustedConviction = roundTo(basePm, 2);
    adjustedConvictionSource = 'pm_base';
    repairs.push(`adjusted_conviction: re-inserted PM base conviction ${adjustedConviction}`);
  }

  let riskLevel = normalizeRiskLevel(d.risk_level);
  if (!riskLevel) {
    const macroValue = macroRisk === 'None' || macroRisk === null ? 0 : macroRisk;
    riskLevel = deriveRiskLevel([
      companyRisk ?? 0, valuationUncertainty ?? 0, sentimentRisk ?? 0, macroValue, disagreement,
    ]);
    repairs.push(`risk_level: derived ${riskLevel}`);
  }

  const decision: FinalDecision = {
    riskLevel,
    originalConviction: roundTo(basePm, 2),
    adjustedConviction,
    companyRisk,
    valuationUncertainty,
    sentimentRisk,
    macroRisk,
    disagreement,
    macroRiskWarning: readString(d, 'macro_risk_warning') || 'None',
    finalRecommendation: aggregate.direction,
    riskFactors: readRationale(d),
    recommendationAdjustment: readString(d, 'recommendation_adjustment'),
    explanation: readString(d, 'explanation'),
    adjustedConvictionSource,
    repairs: Object.freeze(repairs),
    source,
  };
  return Object.freeze(decision);
}

/** Snake-case record handed back to callers and the job surface */
export function decisionToRecord(decision: FinalDecision): Record<string, unknown> {
  return {
    risk_level: decision.riskLevel,
    original_conviction: decision.originalConviction,
    adjusted_conviction: decision.adjustedConviction,
    risk_factor_rc: decision.companyRisk,
    risk_factor_rm: decision.macroRisk,
    disagreement: decision.disagreement,
    valuation_uncertainty: decision.valuationUncertainty,
    sentiment_risk_score: decision.sentimentRisk,
    macro_risk_warning: decision.macroRiskWarning,
    final_recommendation: decision.finalRecommendation,
    risk_factors: decision.riskFactors,
    recommendation_adjustment: decision.recommendationAdjustment,
    explanation: decision.explanation,
  };
}
