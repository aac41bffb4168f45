// SpecialistVerdict schema and the accept-and-report consistency policy

import { z } from 'zod';
import {
  CATEGORY_CONVICTION,
  type ConvictionCategory,
  type Recommendation,
  type SpecialistVerdict,
} from '../types/agents.js';

const unit = z.coerce.number().min(0).max(1);

const recommendation = z
  .string()
  .transform(v => v.trim().toLowerCase())
  .pipe(z.enum(['buy', 'hold', 'sell']))
  .transform((v): Recommendation => (v === 'buy' ? 'Buy' : v === 'hold' ? 'Hold' : 'Sell'));

const category = z
  .string()
  .transform(v => v.trim().toLowerCase())
  .pipe(z.enum(['low', 'medium', 'high']))
  .transform((v): ConvictionCategory => (v === 'low' ? 'Low' : v === 'medium' ? 'Medium' : 'High'));

export const SelfReviewSchema = z.object({
  label: z.string(),
  fingerprint: z.string(),
  adjusted: z.boolean(),
});

export const SpecialistVerdictSchema = z.object({
  analyst: z.string().default(''),
  recommendation,
  conviction: unit,
  conviction_category: category,
  evidence_strength: unit,
  signal_clarity: unit,
  data_quality: unit,
  uncertainty_penalty: unit,
  key_factors: z.array(z.string()).min(5),
  risks: z.array(z.string()).min(2),
  overall_comment: z.string().default(''),
  time_horizon: z.union([z.string(), z.number()]).transform(String),
  confidence_level: category,
  data_sources: z.array(z.string()).default([]),
  self_review: SelfReviewSchema.optional(),
});

/** Fields the self-consistency reviewer may change on a specialist verdict */
export const VERDICT_ADJUSTABLE_KEYS = [
  'recommendation',
  'conviction',
  'conviction_category',
  'evidence_strength',
  'signal_clarity',
  'data_quality',
  'uncertainty_penalty',
  'confidence_level',
] as const;

export const CATEGORY_TOLERANCE = 0.1;

export type VerdictParse =
  | { ok: true; verdict: SpecialistVerdict }
  | { ok: false; issues: string[] };

export function parseVerdict(value: unknown): VerdictParse {
  const result = SpecialistVerdictSchema.safeParse(value);
  if (result.success) return { ok: true, verdict: result.data };
  return {
    ok: false,
    issues: result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
  };
}

/** True when the conviction sits within tolerance of its category anchor */
export function categoryMatchesConviction(cat: ConvictionCategory, conviction: number): boolean {
  return Math.abs(conviction - CATEGORY_CONVICTION[cat]) <= CATEGORY_TOLERANCE + 1e-9;
}

/**
 * Cross-field checks on a verdict. Mismatches are reported, never corrected:
 * callers log them and keep the verdict as produced.
 */
export function checkVerdictConsistency(verdict: SpecialistVerdict): string[] {
  const issues: string[] = [];
  if (!categoryMatchesConviction(verdict.conviction_category, verdict.conviction)) {
    issues.push(
      `conviction ${verdict.conviction} is outside ${verdict.conviction_category} ` +
      `(${CATEGORY_CONVICTION[verdict.conviction_category]} ± ${CATEGORY_TOLERANCE})`,
    );
  }
  if (verdict.confidence_level !== verdict.conviction_category) {
    issues.push(
      `confidence_level ${verdict.confidence_level} differs from conviction_category ${verdict.conviction_category}`,
    );
  }
  return issues;
}
