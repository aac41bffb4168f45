// Risk Manager - draft, verify, finalize
// The final recommendation is always the PM direction; only conviction is adjusted

import type { FinalDecision, InvestmentPlan, StageMapping } from '../types/analysis.js';
import type { SpecialistKind } from '../types/agents.js';
import { aggregateToRecord, normalizeRecommendation } from '../scoring/pm-score.js';
import {
  RISK_ADJUSTABLE_KEYS, finalizeRiskDecision, resolveBaseConviction,
} from '../scoring/risk-adjustment.js';
import { parseRiskDraft } from '../utils/risk-draft-schema.js';
import { extractJsonObject } from '../utils/json.js';
import { toFiniteNumber } from '../utils/numbers.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { RISK_SYSTEM, riskPrompt, riskVerifierInstructions, type RiskPromptInput } from './prompts.js';
import {
  recallPastRecommendations, reportList, situationText, type ManagerContext,
} from './manager-support.js';

const logger = createLogger('RiskManager');
const LABEL = 'Risk Manager';

const SITUATION_KINDS: readonly SpecialistKind[] = ['market', 'sentiment', 'news', 'fundamentals'];
const REPORT_KINDS: readonly SpecialistKind[] = ['market', 'sentiment', 'news', 'fundamentals', 'valuation'];
const ASSESSED_KEYS = ['risk_factor_rc', 'valuation_uncertainty', 'sentiment_risk_score'] as const;

function inUnit(value: unknown): boolean {
  const n = toFiniteNumber(value);
  return n !== null && n >= 0 && n <= 1;
}

export class RiskManager {
  async run(ctx: ManagerContext, plan: InvestmentPlan, stages: StageMapping): Promise<FinalDecision> {
    const { run } = ctx;
    const { aggregate } = plan;

    const draft = await this.draft(ctx, plan, stages);
    let decision: FinalDecision;
    if (!draft) {
      decision = finalizeRiskDecision(null, aggregate, 'fallback');
    } else {
      const promptInput = this.priors(plan);
      let value = draft;
      let source: FinalDecision['source'] = 'draft';
      if (ctx.reviewer) {
        const review = await ctx.reviewer.review(draft, {
          label: LABEL,
          adjustableKeys: RISK_ADJUSTABLE_KEYS,
          instructions: riskVerifierInstructions(promptInput),
          parse: parseRiskDraft,
          // a marked draft may skip verification only when it already respects the PM direction
          isConsistent: v => normalizeRecommendation(v.final_recommendation) === aggregate.direction
            && ASSESSED_KEYS.every(key => inUnit(v[key])),
          maxTokens: ctx.maxTokens,
        });
        value = review.value;
        if (review.status === 'fallback') {
          run.addWarning(`${LABEL}: verification fell back to draft (${review.reason ?? 'unknown'})`);
        } else {
          source = 'reviewed';
        }
      }
      decision = finalizeRiskDecision(value, aggregate, source);
    }

    for (const repair of decision.repairs) {
      logger.warn(`Repaired risk output: ${repair}`);
      run.addWarning(`${LABEL}: ${repair}`);
    }
    logger.info(`Final decision for ${run.ticker}: ${decision.finalRecommendation}`, {
      originalConviction: decision.originalConviction,
      adjustedConviction: decision.adjustedConviction,
      riskLevel: decision.riskLevel,
      source: decision.source,
    });
    return decision;
  }

  private priors(plan: InvestmentPlan): Pick<RiskPromptInput, 'bullish' | 'bearish' | 'conflict' | 'basePm' | 'direction'> {
    const { aggregate } = plan;
    return {
      bullish: aggregate.bullishStrength,
      bearish: aggregate.bearishStrength,
      conflict: aggregate.conflictLevel ?? 'unknown',
      basePm: resolveBaseConviction(aggregate),
      direction: aggregate.direction,
    };
  }

  /** Draft risk JSON from the deep producer; null when unavailable or unreadable */
  private async draft(
    ctx: ManagerContext,
    plan: InvestmentPlan,
    stages: StageMapping,
  ): Promise<Record<string, unknown> | null> {
    if (!ctx.producer) return null;

    const past = await recallPastRecommendations(ctx, situationText(stages, SITUATION_KINDS), logger, LABEL);
    let text: string;
    try {
      text = await ctx.producer.complete({
        system: RISK_SYSTEM,
        prompt: riskPrompt({
          ...this.priors(plan),
          planJson: JSON.stringify(plan.narrative ?? aggregateToRecord(plan.aggregate)),
          pastRecommendations: past,
          reports: reportList(stages, REPORT_KINDS),
        }),
        maxTokens: ctx.maxTokens,
      });
    } catch (err) {
      logger.warn('Risk draft failed; finalizing from the PM aggregate', { error: errorMessage(err) });
      ctx.run.addWarning(`${LABEL}: risk draft failed (${errorMessage(err)})`);
      return null;
    }

    const draft = extractJsonObject(text);
    if (!draft) {
      logger.warn('Risk draft is not a JSON object; finalizing from the PM aggregate');
      ctx.run.addWarning(`${LABEL}: risk draft is not a JSON object`);
    }
    return draft;
  }
}
