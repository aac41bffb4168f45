// Portfolio Manager - deterministic PM aggregate plus an optional narrative synthesis
// The narrative never decides anything: every numeric PM field is overwritten from the aggregate

import {
  AGGREGATION_NAMES, SPECIALIST_KINDS, SPECIALIST_LABELS, STAGE_KEYS,
} from '../types/agents.js';
import type { AnalystSignal, InvestmentPlan, PMAggregate, StageMapping } from '../types/analysis.js';
import {
  aggregateToRecord, extractAnalystSignal, inferConflictLevel, pmDirectionalScore, withConflictLevel,
} from '../scoring/pm-score.js';
import { extractJsonObject, isRecord } from '../utils/json.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { PM_SYSTEM, pmNarrativePrompt } from './prompts.js';
import {
  recallPastRecommendations, reportList, situationText, type ManagerContext,
} from './manager-support.js';

const logger = createLogger('PortfolioManager');
const LABEL = 'Portfolio Manager';

/** Signals from every published report; unusable reports are skipped with a warning */
export function collectSignals(stages: StageMapping): { signals: AnalystSignal[]; dropped: string[] } {
  const signals: AnalystSignal[] = [];
  const dropped: string[] = [];
  for (const kind of SPECIALIST_KINDS) {
    const output = stages[STAGE_KEYS[kind]];
    if (!output) continue;
    const signal = extractAnalystSignal(output.raw, AGGREGATION_NAMES[kind]);
    if (signal) signals.push(signal);
    else dropped.push(SPECIALIST_LABELS[kind]);
  }
  return { signals, dropped };
}

/** Conflict level reported by the narrative, when it is a number in [0,1] */
export function narrativeConflictLevel(narrative: Record<string, unknown> | null): number | null {
  const summary = narrative?.summary;
  if (!isRecord(summary)) return null;
  const raw = summary.conflict_level;
  if (typeof raw !== 'number' || !Number.isFinite(raw)) return null;
  return raw >= 0 && raw <= 1 ? raw : null;
}

/** Copy of the narrative with the aggregate's numbers written over the model's */
export function overwriteNumericFields(
  narrative: Record<string, unknown>,
  aggregate: PMAggregate,
): Record<string, unknown> {
  const record = aggregateToRecord(aggregate);
  const original = narrative.summary;
  const summary: Record<string, unknown> = isRecord(original) ? { ...original } : {};
  summary.bullish_strength = aggregate.bullishStrength;
  summary.bearish_strength = aggregate.bearishStrength;
  if (aggregate.conflictLevel !== undefined) summary.conflict_level = aggregate.conflictLevel;

  return {
    ...narrative,
    summary,
    hold_strength: aggregate.holdStrength,
    pm_direction: record.pm_direction,
    pm_composite_score: record.pm_composite_score,
    pm_base_conviction: record.pm_base_conviction,
    pm_threshold: record.pm_threshold,
    pm_inputs: record.pm_inputs,
  };
}

export class PortfolioManager {
  constructor(private readonly threshold: number) {}

  async run(ctx: ManagerContext, stages: StageMapping): Promise<InvestmentPlan> {
    const { run } = ctx;
    const { signals, dropped } = collectSignals(stages);
    for (const label of dropped) {
      logger.warn(`Dropping ${label} from aggregation: report is not a usable verdict`);
      run.addWarning(`${LABEL}: ${label} report dropped from aggregation`);
    }

    let aggregate = pmDirectionalScore(signals, this.threshold);
    if (aggregate.warning) {
      logger.warn(aggregate.warning, { ticker: run.ticker });
      run.addWarning(`${LABEL}: ${aggregate.warning}`);
    }
    logger.info(`PM aggregate for ${run.ticker}: ${aggregate.direction}`, {
      compositeScore: aggregate.compositeScore,
      baseConviction: aggregate.baseConviction,
      inputs: aggregate.inputs.length,
    });

    const narrative = await this.synthesize(ctx, stages, aggregate);
    aggregate = withConflictLevel(aggregate, inferConflictLevel(aggregate.inputs));
    const claimed = narrativeConflictLevel(narrative);
    if (claimed !== null && claimed !== aggregate.conflictLevel) {
      logger.warn('Narrative conflict level overridden by the inferred one', {
        narrative: claimed,
        inferred: aggregate.conflictLevel,
      });
      run.addWarning(`${LABEL}: narrative conflict level ${claimed} replaced with inferred ${aggregate.conflictLevel}`);
    }

    return {
      aggregate,
      narrative: narrative ? overwriteNumericFields(narrative, aggregate) : null,
    };
  }

  private async synthesize(
    ctx: ManagerContext,
    stages: StageMapping,
    aggregate: PMAggregate,
  ): Promise<Record<string, unknown> | null> {
    if (!ctx.producer) return null;

    const past = await recallPastRecommendations(ctx, situationText(stages, SPECIALIST_KINDS), logger, LABEL);
    let text: string;
    try {
      text = await ctx.producer.complete({
        system: PM_SYSTEM,
        prompt: pmNarrativePrompt({
          aggregateJson: JSON.stringify(aggregateToRecord(aggregate)),
          pastRecommendations: past,
          reports: reportList(stages, SPECIALIST_KINDS),
        }),
        maxTokens: ctx.maxTokens,
      });
    } catch (err) {
      logger.warn('Narrative synthesis failed; plan carries the aggregate only', { error: errorMessage(err) });
      ctx.run.addWarning(`${LABEL}: narrative synthesis failed (${errorMessage(err)})`);
      return null;
    }

    const narrative = extractJsonObject(text);
    if (!narrative) {
      logger.warn('Narrative is not a JSON object; plan carries the aggregate only');
      ctx.run.addWarning(`${LABEL}: narrative is not a JSON object`);
    }
    return narrative;
  }
}
