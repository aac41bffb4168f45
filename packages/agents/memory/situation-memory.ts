// Situation Memory - past market situations and the recommendation recorded for each
// Retrieval only enriches manager prompts; nothing here feeds the numeric pipeline

import { randomUUID } from 'node:crypto';
import type { SimilarSituation, StoredSituation } from '../types/memory.js';

export interface SituationMemory {
  store(situation: string, recommendation: string): Promise<StoredSituation>;
  /** Best `n` matches, most similar first */
  retrieveSimilar(situation: string, n?: number): Promise<SimilarSituation[]>;
}

/** Lower-cased alphanumeric words, deduplicated */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^a-z0-9]+/).filter(w => w.length > 1));
}

/** Share of the query's words that appear in the candidate */
export function wordOverlap(query: Set<string>, candidate: Set<string>): number {
  if (query.size === 0) return 0;
  let shared = 0;
  for (const word of query) {
    if (candidate.has(word)) shared++;
  }
  return shared / query.size;
}

// In-memory backend
export class LocalSituationMemory implements SituationMemory {
  private entries: Array<StoredSituation & { words: Set<string> }> = [];

  async store(situation: string, recommendation: string): Promise<StoredSituation> {
    const entry: StoredSituation = {
      situationId: randomUUID(),
      situation,
      recommendation,
      createdAt: new Date(),
    };
    this.entries.push({ ...entry, words: tokenize(situation) });
    return entry;
  }

  async addSituations(pairs: ReadonlyArray<readonly [string, string]>): Promise<StoredSituation[]> {
    const stored: StoredSituation[] = [];
    for (const [situation, recommendation] of pairs) {
      stored.push(await this.store(situation, recommendation));
    }
    return stored;
  }

  async retrieveSimilar(situation: string, n = 1): Promise<SimilarSituation[]> {
    if (n <= 0) return [];
    const query = tokenize(situation);
    return this.entries
      .map((entry, index) => ({ entry, index, score: wordOverlap(query, entry.words) }))
      .filter(r => r.score > 0)
      // newer entries win ties
      .sort((a, b) => b.score - a.score || b.index - a.index)
      .slice(0, n)
      .map(({ entry, score }) => ({
        matchedSituation: entry.situation,
        recommendation: entry.recommendation,
        similarityScore: score,
      }));
  }

  get size(): number {
    return this.entries.length;
  }
}
