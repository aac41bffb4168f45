// PM directional scoring - deterministic aggregation of specialist verdicts
// Role weights are fixed by role, never taken from the input entries

import type { Recommendation } from '../types/agents.js';
import type { AnalystRole, AnalystSignal, PMAggregate, PMInput } from '../types/analysis.js';
import { clamp01, roundTo, toFiniteNumber } from '../utils/numbers.js';

export const DEFAULT_PM_THRESHOLD = 0.33;
export const NO_VALID_ENTRIES_WARNING = 'No valid analyst entries provided.';

export const ROLE_WEIGHTS: Record<AnalystRole, number> = {
  fundamental: 0.40,
  valuation: 0.30,
  sentiment: 0.20,
  news: 0.20,
  technical: 0.10,
  macro: 0.10,
  other: 1.0,
};

export const RECOMMENDATION_SIGNALS: Record<Recommendation, number> = {
  Buy: 1.0,
  Hold: 0.2,
  Sell: -1.0,
};

// First matching rule wins; 'val' also matches abbreviated labels
const ROLE_RULES: ReadonlyArray<{ role: AnalystRole; needles: readonly string[] }> = [
  { role: 'fundamental', needles: ['fundamental'] },
  { role: 'valuation', needles: ['valuation', 'val'] },
  { role: 'sentiment', needles: ['sentiment'] },
  { role: 'news', needles: ['news'] },
  { role: 'technical', needles: ['technical', 'chart', 'market'] },
  { role: 'macro', needles: ['macro'] },
];

export function classifyRole(label: string): AnalystRole {
  const key = label.trim().toLowerCase();
  for (const rule of ROLE_RULES) {
    if (rule.needles.some(n => key.includes(n))) return rule.role;
  }
  return 'other';
}

export function normalizeRecommendation(value: unknown): Recommendation | null {
  if (typeof value !== 'string') return null;
  switch (value.trim().toLowerCase()) {
    case 'buy': return 'Buy';
    case 'hold': return 'Hold';
    case 'sell': return 'Sell';
    default: return null;
  }
}

/**
 * Pull `{ recommendation, conviction }` out of one specialist report.
 * Returns null (entry dropped) when the report is not a JSON object, either field
 * is missing, or the conviction cannot be read as a number.
 */
export function extractAnalystSignal(report: unknown, analyst: string): AnalystSignal | null {
  let obj: unknown = report;
  if (typeof report === 'string') {
    try {
      obj = JSON.parse(report);
    } catch {
      return null;
    }
  }
  if (typeof obj !== 'object' || obj === null || Array.isArray(obj)) return null;

  const recommendation: unknown = Reflect.get(obj, 'recommendation');
  const rawConviction: unknown = Reflect.get(obj, 'conviction');
  if (recommendation === undefined || recommendation === null) return null;
  if (rawConviction === undefined || rawConviction === null) return null;

  const conviction = toFiniteNumber(rawConviction);
  if (conviction === null) return null;

  return { analyst, recommendation, conviction };
}

function directionFor(score: number, threshold: number): Recommendation {
  if (score >= threshold) return 'Buy';
  if (score <= -threshold) return 'Sell';
  return 'Hold';
}

function bucketStrength(inputs: readonly PMInput[], bucket: Recommendation): number {
  let num = 0;
  let denom = 0;
  for (const input of inputs) {
    if (input.recommendation !== bucket) continue;
    num += input.weight * input.conviction;
    denom += input.weight;
  }
  return denom > 0 ? num / denom : 0;
}

/**
 * Composite directional score over all valid entries.
 *
 * S = Σ(w·c·s) / Σ(w·c), direction by ±threshold, base conviction is the
 * weighted-average conviction of the bucket matching the direction.
 * Entries with an unknown recommendation are skipped; convictions are clamped
 * to [0,1] and unreadable ones count as 0. Never throws.
 */
export function pmDirectionalScore(
  entries: readonly AnalystSignal[],
  threshold = DEFAULT_PM_THRESHOLD,
): PMAggregate {
  const valid: Array<Omit<PMInput, 'weight'>> = [];

  for (const entry of entries) {
    const recommendation = normalizeRecommendation(entry.recommendation);
    if (!recommendation) continue;

    const conviction = clamp01(toFiniteNumber(entry.conviction) ?? 0);
    const role = classifyRole(entry.analyst);
    valid.push({
      analyst: entry.analyst,
      role,
      recommendation,
      conviction,
      signal: RECOMMENDATION_SIGNALS[recommendation],
      rawWeight: ROLE_WEIGHTS[role],
    });
  }

  if (valid.length === 0) {
    const empty: PMAggregate = {
      compositeScore: 0,
      direction: 'Hold',
      threshold,
      baseConviction: 0,
      bullishStrength: 0,
      bearishStrength: 0,
      holdStrength: 0,
      inputs: [],
      warning: NO_VALID_ENTRIES_WARNING,
    };
    return Object.freeze(empty);
  }

  const totalRaw = valid.reduce((sum, v) => sum + v.rawWeight, 0);
  const inputs: PMInput[] = valid.map(v => Object.freeze({
    ...v,
    weight: totalRaw <= 0 ? 1 / valid.length : v.rawWeight / totalRaw,
  }));

  let numerator = 0;
  let denominator = 0;
  for (const input of inputs) {
    numerator += input.weight * input.conviction * input.signal;
    denominator += input.weight * input.conviction;
  }
  const score = denominator !== 0 ? numerator / denominator : 0;
  const direction = directionFor(score, threshold);

  const bullish = bucketStrength(inputs, 'Buy');
  const bearish = bucketStrength(inputs, 'Sell');
  const hold = bucketStrength(inputs, 'Hold');
  const base = clamp01(direction === 'Buy' ? bullish : direction === 'Sell' ? bearish : hold);

  const aggregate: PMAggregate = {
    compositeScore: roundTo(score, 4),
    direction,
    threshold,
    baseConviction: roundTo(base, 4),
    bullishStrength: roundTo(bullish, 4),
    bearishStrength: roundTo(bearish, 4),
    holdStrength: roundTo(hold, 4),
    inputs: Object.freeze(inputs),
  };
  return Object.freeze(aggregate);
}

/**
 * Disagreement between the buy and sell sides in [0,1].
 * 0 when either side is absent, 1 when both sides carry equal weighted conviction.
 */
export function inferConflictLevel(inputs: readonly PMInput[]): number {
  let buy = 0;
  let sell = 0;
  for (const input of inputs) {
    const mass = input.weight * input.conviction;
    if (input.recommendation === 'Buy') buy += mass;
    else if (input.recommendation === 'Sell') sell += mass;
  }
  if (buy <= 0 || sell <= 0) return 0;
  return roundTo((2 * Math.min(buy, sell)) / (buy + sell), 4);
}

/** Return a frozen copy of the aggregate carrying a conflict level */
export function withConflictLevel(aggregate: PMAggregate, conflictLevel: number): PMAggregate {
  const next: PMAggregate = { ...aggregate, conflictLevel: roundTo(clamp01(conflictLevel), 4) };
  return Object.freeze(next);
}

/** Wire form used in prompts, the investment plan narrative and the scoring tool */
export function aggregateToRecord(aggregate: PMAggregate): Record<string, unknown> {
  const record: Record<string, unknown> = {
    pm_composite_score: aggregate.compositeScore,
    pm_direction: aggregate.direction,
    pm_threshold: aggregate.threshold,
    pm_base_conviction: aggregate.baseConviction,
    bullish_strength: aggregate.bullishStrength,
    bearish_strength: aggregate.bearishStrength,
    hold_strength: aggregate.holdStrength,
    pm_inputs: aggregate.inputs.map(input => ({
      analyst: input.analyst,
      role: input.role,
      recommendation: input.recommendation,
      conviction: input.conviction,
      signal: input.signal,
      raw_weight: input.rawWeight,
      weight: input.weight,
    })),
  };
  if (aggregate.conflictLevel !== undefined) record.conflict_level = aggregate.conflictLevel;
  if (aggregate.warning !== undefined) record.warning = aggregate.warning;
  return record;
}
