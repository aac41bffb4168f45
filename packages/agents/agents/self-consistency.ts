// Self-consistency reviewer - second pass over a draft structured verdict
// Only adjustable keys are taken from the reviewer; the draft's structure always survives

import { createHash } from 'node:crypto';
import type { VerdictProducer } from '../utils/verdict-producer.js';
import { extractJsonObject, isRecord } from '../utils/json.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { selfConsistencyPrompt, selfConsistencySystem } from './prompts.js';

const logger = createLogger('SelfConsistency');

export type ReviewStatus = 'reviewed' | 'unchanged' | 'skipped' | 'fallback';

export interface ReviewOptions<T> {
  label: string;
  adjustableKeys: readonly string[];
  /** Extra rules appended to the reviewer prompt */
  instructions?: string;
  /** Validate a candidate; null rejects it */
  parse: (value: Record<string, unknown>) => T | null;
  /** Cross-field check required before a marked value may skip review */
  isConsistent?: (value: T) => boolean;
  maxTokens?: number;
}

export interface ReviewResult<T> {
  /** Accepted JSON object (reviewed, or the draft on skip/fallback) */
  value: Record<string, unknown>;
  parsed: T | null;
  status: ReviewStatus;
  reason?: string;
}

/** SHA-256 over the adjustable fields, in the order given */
export function fingerprint(value: Record<string, unknown>, keys: readonly string[]): string {
  const picked = keys.map(key => [key, key in value ? value[key] : null]);
  return createHash('sha256').update(JSON.stringify(picked)).digest('hex');
}

function readMarker(value: Record<string, unknown>): { label: string; fingerprint: string } | null {
  const marker = value.self_review;
  if (!isRecord(marker)) return null;
  const { label, fingerprint: fp } = marker;
  if (typeof label !== 'string' || typeof fp !== 'string') return null;
  return { label, fingerprint: fp };
}

export class SelfConsistencyReviewer {
  constructor(private readonly producer: VerdictProducer) {}

  async review<T>(draft: Record<string, unknown>, options: ReviewOptions<T>): Promise<ReviewResult<T>> {
    const keys = options.adjustableKeys;
    const draftParsed = options.parse(draft);

    // Already reviewed and unchanged since: applying again must not drift
    const marker = readMarker(draft);
    if (marker && marker.fingerprint === fingerprint(draft, keys) && draftParsed !== null
      && (options.isConsistent?.(draftParsed) ?? true)) {
      return { value: draft, parsed: draftParsed, status: 'skipped', reason: 'already reviewed' };
    }

    const unmarked = Object.fromEntries(Object.entries(draft).filter(([key]) => key !== 'self_review'));
    const fallback = (reason: string): ReviewResult<T> => {
      logger.warn(`${options.label}: review fell back to draft`, { reason });
      return { value: draft, parsed: draftParsed, status: 'fallback', reason };
    };

    let text: string;
    try {
      text = await this.producer.complete({
        system: selfConsistencySystem(options.label),
        prompt: selfConsistencyPrompt(JSON.stringify(unmarked, null, 2), options.instructions),
        maxTokens: options.maxTokens,
      });
    } catch (err) {
      return fallback(`reviewer error: ${errorMessage(err)}`);
    }

    const reviewed = extractJsonObject(text);
    if (!reviewed) return fallback(text.trim() ? 'reviewer output is not a JSON object' : 'reviewer output is empty');

    const merged: Record<string, unknown> = { ...unmarked };
    for (const key of keys) {
      if (key in reviewed) merged[key] = reviewed[key];
    }

    const parsed = options.parse(merged);
    if (parsed === null) return fallback('reviewed output failed validation');

    const adjusted = fingerprint(merged, keys) !== fingerprint(draft, keys);
    const value: Record<string, unknown> = {
      ...merged,
      self_review: { label: options.label, fingerprint: fingerprint(merged, keys), adjusted },
    };
    return {
      value,
      parsed: options.parse(value),
      status: adjusted ? 'reviewed' : 'unchanged',
    };
  }
}
