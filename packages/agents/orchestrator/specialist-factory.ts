// Factory for creating specialist instances by kind

import type { SpecialistKind } from '../types/agents.js';
import type { BaseAnalyst } from '../agents/base-analyst.js';
import { MarketAnalyst } from '../agents/market-analyst.js';
import { SentimentAnalyst } from '../agents/sentiment-analyst.js';
import { NewsAnalyst } from '../agents/news-analyst.js';
import { FundamentalsAnalyst } from '../agents/fundamentals-analyst.js';
import { ValuationAnalyst } from '../agents/valuation-analyst.js';

const FACTORY: Record<SpecialistKind, () => BaseAnalyst> = {
  market: () => new MarketAnalyst(),
  sentiment: () => new SentimentAnalyst(),
  news: () => new NewsAnalyst(),
  fundamentals: () => new FundamentalsAnalyst(),
  valuation: () => new ValuationAnalyst(),
};

export function createSpecialist(kind: SpecialistKind): BaseAnalyst {
  return FACTORY[kind]();
}
