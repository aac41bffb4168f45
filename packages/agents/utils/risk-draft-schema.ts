// Risk draft schema - shape check for risk manager output before finalisation
// Values are validated, not converted: finalizeRiskDecision does the clamping and repairs

import { z } from 'zod';
import { toFiniteNumber } from './numbers.js';

const numeric = z.unknown().refine(v => toFiniteNumber(v) !== null, { message: 'expected a number' });

const macro = z.unknown().refine(
  v => toFiniteNumber(v) !== null || (typeof v === 'string' && v.trim().toLowerCase() === 'none'),
  { message: 'expected a number or "None"' },
);

export const RiskDraftSchema = z.object({
  risk_level: z.string().optional(),
  original_conviction: numeric.optional(),
  adjusted_conviction: numeric.optional(),
  risk_factor_rc: numeric.optional(),
  risk_factor_rm: macro.optional(),
  disagreement: numeric.optional(),
  valuation_uncertainty: numeric.optional(),
  sentiment_risk_score: numeric.optional(),
  macro_risk_warning: z.string().optional(),
  final_recommendation: z.string().optional(),
  risk_factors: z.record(z.unknown()).optional(),
  recommendation_adjustment: z.string().optional(),
  explanation: z.string().optional(),
}).passthrough();

/** The draft itself when every present field has the right shape, else null */
export function parseRiskDraft(value: Record<string, unknown>): Record<string, unknown> | null {
  return RiskDraftSchema.safeParse(value).success ? value : null;
}
