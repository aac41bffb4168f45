// Specialist Analysts - the five independently schedulable verdict producers
// Each specialist owns exactly one stage key in the run's stage mapping

export type SpecialistKind =
  | 'market'
  | 'sentiment'
  | 'news'
  | 'fundamentals'
  | 'valuation';

export type StageKey =
  | 'market_report'
  | 'sentiment_report'
  | 'news_report'
  | 'fundamentals_report'
  | 'valuation_report';

export type Recommendation = 'Buy' | 'Hold' | 'Sell';
export type ConvictionCategory = 'Low' | 'Medium' | 'High';

export const SPECIALIST_KINDS: readonly SpecialistKind[] = [
  'market', 'sentiment', 'news', 'fundamentals', 'valuation',
];

/** Specialists a caller may select; valuation always runs alongside them */
export const SELECTABLE_SPECIALISTS: readonly SpecialistKind[] = [
  'market', 'sentiment', 'news', 'fundamentals',
];

export const STAGE_KEYS: Record<SpecialistKind, StageKey> = {
  market: 'market_report',
  sentiment: 'sentiment_report',
  news: 'news_report',
  fundamentals: 'fundamentals_report',
  valuation: 'valuation_report',
};

export const SPECIALIST_LABELS: Record<SpecialistKind, string> = {
  market: 'Market Analyst',
  sentiment: 'Sentiment Analyst',
  news: 'News Analyst',
  fundamentals: 'Fundamentals Analyst',
  valuation: 'Valuation Analyst',
};

/** Names handed to the PM engine; its role classifier keys off these */
export const AGGREGATION_NAMES: Record<SpecialistKind, string> = {
  market: 'Technical',
  sentiment: 'Social/Sentiment',
  news: 'News',
  fundamentals: 'Fundamental',
  valuation: 'Valuation',
};

export const CATEGORY_CONVICTION: Record<ConvictionCategory, number> = {
  Low: 0.25,
  Medium: 0.5,
  High: 0.75,
};

export interface SelfReviewMarker {
  readonly label: string;
  readonly fingerprint: string;
  readonly adjusted: boolean;
}

export interface SpecialistVerdict {
  analyst: string;
  recommendation: Recommendation;
  conviction: number;                 // 0-1
  conviction_category: ConvictionCategory;
  evidence_strength: number;          // 0-1
  signal_clarity: number;             // 0-1
  data_quality: number;               // 0-1
  uncertainty_penalty: number;        // 0-1
  key_factors: string[];              // >= 5
  risks: string[];                    // >= 2
  overall_comment: string;
  time_horizon: string;               // months, e.g. "6-12"
  confidence_level: ConvictionCategory;
  data_sources: string[];
  self_review?: SelfReviewMarker;
}

export interface SpecialistOutput {
  readonly kind: SpecialistKind;
  readonly label: string;
  /** Accepted JSON text published into the stage mapping */
  readonly raw: string;
  /** Schema-valid parse of `raw`, null when the text does not match the verdict schema */
  readonly verdict: SpecialistVerdict | null;
  readonly reviewStatus: 'reviewed' | 'unchanged' | 'skipped' | 'fallback' | 'not_run';
  readonly toolInvocations: readonly ToolInvocation[];
  readonly warnings: string[];
  readonly error?: string;
  readonly completedAt: Date;
}

export interface ToolInvocation {
  invocationId: string;
  specialist: SpecialistKind;
  toolName: string;
  params: Record<string, unknown>;
  result?: unknown;
  error?: string;
  duration?: number;     // ms
  timestamp: Date;
}
