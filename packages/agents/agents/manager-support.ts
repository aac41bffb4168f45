// Shared plumbing for the portfolio and risk managers
// Both read the stage mapping as plain report text and consult the situation memory

import { STAGE_KEYS, type SpecialistKind } from '../types/agents.js';
import type { StageMapping } from '../types/analysis.js';
import type { AnalysisRun } from '../orchestrator/run-context.js';
import type { SituationMemory } from '../memory/situation-memory.js';
import type { VerdictProducer } from '../utils/verdict-producer.js';
import type { SelfConsistencyReviewer } from './self-consistency.js';
import { errorMessage, type Logger } from '../utils/logger.js';

export interface ManagerContext {
  run: AnalysisRun;
  /** Deep-thinking producer; null runs the deterministic path only */
  producer: VerdictProducer | null;
  reviewer: SelfConsistencyReviewer | null;
  memory: SituationMemory | null;
  memoryMatches: number;
  maxTokens: number;
}

/** Report headings as the managers present them */
export const REPORT_HEADINGS: Record<SpecialistKind, string> = {
  market: 'Market/Technical',
  sentiment: 'Social/Sentiment',
  news: 'News',
  fundamentals: 'Fundamentals',
  valuation: 'Valuation',
};

export function reportText(stages: StageMapping, kind: SpecialistKind): string {
  return stages[STAGE_KEYS[kind]]?.raw ?? '';
}

export function reportList(stages: StageMapping, kinds: readonly SpecialistKind[]): Array<{ name: string; report: string }> {
  return kinds.map(kind => ({ name: REPORT_HEADINGS[kind], report: reportText(stages, kind) }));
}

/** Reports joined by blank lines; the text used for similarity lookup */
export function situationText(stages: StageMapping, kinds: readonly SpecialistKind[]): string {
  return kinds.map(kind => reportText(stages, kind)).join('\n\n');
}

/**
 * Recommendations recorded for the most similar past situations.
 * A memory failure is logged and recorded on the run; the prompt then says "(none)".
 */
export async function recallPastRecommendations(
  ctx: ManagerContext,
  situation: string,
  logger: Logger,
  label: string,
): Promise<string> {
  if (!ctx.memory || ctx.memoryMatches <= 0) return '';
  try {
    const matches = await ctx.memory.retrieveSimilar(situation, ctx.memoryMatches);
    logger.debug(`Recalled ${matches.length} similar situation(s)`);
    return matches.map(m => m.recommendation).join('\n\n');
  } catch (err) {
    logger.warn('Situation memory lookup failed', { error: errorMessage(err) });
    ctx.run.addWarning(`${label}: situation memory unavailable (${errorMessage(err)})`);
    return '';
  }
}
