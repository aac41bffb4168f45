// Runtime configuration - parsed once from environment variables through zod
// Entry points load .env via dotenv before calling loadConfig()

import { z } from 'zod';
import { SELECTABLE_SPECIALISTS, type SpecialistKind } from '../types/agents.js';
import { ConfigurationError } from '../orchestrator/errors.js';

export type MemoryBackend = 'local' | 'postgres';

function isSelectable(value: string): value is SpecialistKind {
  return SELECTABLE_SPECIALISTS.some(kind => kind === value);
}

/** Parse a comma list of specialist names; unknown names are reported, not dropped */
export function parseSpecialistList(raw: string): { kinds: SpecialistKind[]; unknown: string[] } {
  const kinds: SpecialistKind[] = [];
  const unknown: string[] = [];
  for (const part of raw.split(',')) {
    const name = part.trim().toLowerCase();
    if (!name) continue;
    if (isSelectable(name)) {
      if (!kinds.includes(name)) kinds.push(name);
    } else {
      unknown.push(name);
    }
  }
  return { kinds, unknown };
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  STOCKDESK_QUICK_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
  STOCKDESK_DEEP_MODEL: z.string().min(1).default('claude-sonnet-4-5-20250929'),
  STOCKDESK_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  STOCKDESK_PM_THRESHOLD: z.coerce.number().min(0).max(1).default(0.33),
  STOCKDESK_ANALYSTS: z.string().default('market,sentiment,news,fundamentals'),
  STOCKDESK_MARKET_LOOKBACK_DAYS: z.coerce.number().int().positive().default(120),
  STOCKDESK_NEWS_LOOKBACK_DAYS: z.coerce.number().int().positive().default(7),
  STOCKDESK_INDICATOR_LOOKBACK_DAYS: z.coerce.number().int().positive().default(60),
  STOCKDESK_MEMORY_BACKEND: z.enum(['local', 'postgres']).default('local'),
  STOCKDESK_MEMORY_MATCHES: z.coerce.number().int().min(0).default(2),
  STOCKDESK_REMEMBER_DECISIONS: booleanFlag.default('false'),
});

export interface StockdeskConfig {
  anthropicApiKey?: string;
  quickModel: string;
  deepModel: string;
  maxTokens: number;
  pmThreshold: number;
  analysts: SpecialistKind[];
  marketLookbackDays: number;
  newsLookbackDays: number;
  indicatorLookbackDays: number;
  memoryBackend: MemoryBackend;
  memoryMatches: number;
  rememberDecisions: boolean;
}

export const DEFAULT_CONFIG: StockdeskConfig = {
  quickModel: 'claude-haiku-4-5-20251001',
  deepModel: 'claude-sonnet-4-5-20250929',
  maxTokens: 4096,
  pmThreshold: 0.33,
  analysts: ['market', 'sentiment', 'news', 'fundamentals'],
  marketLookbackDays: 120,
  newsLookbackDays: 7,
  indicatorLookbackDays: 60,
  memoryBackend: 'local',
  memoryMatches: 2,
  rememberDecisions: false,
};

/**
 * Build the typed configuration from an environment map.
 * Blank values count as unset so an empty line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StockdeskConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') present[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  const { kinds, unknown } = parseSpecialistList(e.STOCKDESK_ANALYSTS);
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Invalid configuration: STOCKDESK_ANALYSTS has unknown specialists: ${unknown.join(', ')}`,
      unknown.map(u => `STOCKDESK_ANALYSTS: unknown specialist "${u}"`),
    );
  }
  if (kinds.length === 0) {
    throw new ConfigurationError(
      'Invalid configuration: STOCKDESK_ANALYSTS selects no specialists',
      ['STOCKDESK_ANALYSTS: empty'],
    );
  }

  return {
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    quickModel: e.STOCKDESK_QUICK_MODEL,
    deepModel: e.STOCKDESK_DEEP_MODEL,
    maxTokens: e.STOCKDESK_MAX_TOKENS,
    pmThreshold: e.STOCKDESK_PM_THRESHOLD,
    analysts: kinds,
    marketLookbackDays: e.STOCKDESK_MARKET_LOOKBACK_DAYS,
    newsLookbackDays: e.STOCKDESK_NEWS_LOOKBACK_DAYS,
    indicatorLookbackDays: e.STOCKDESK_INDICATOR_LOOKBACK_DAYS,
    memoryBackend: e.STOCKDESK_MEMORY_BACKEND,
    memoryMatches: e.STOCKDESK_MEMORY_MATCHES,
    rememberDecisions: e.STOCKDESK_REMEMBER_DECISIONS,
  };
}

export { createSituationMemory } from './database.js';
