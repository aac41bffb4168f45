// PgSituationMemory - PostgreSQL-backed SituationMemory
// Ranks with ts_rank_cd over an english tsvector of the stored situation

import { randomUUID } from 'node:crypto';
import { queryWithRetry } from '../db/pg-client.js';
import type { SituationMemory } from './situation-memory.js';
import { tokenize } from './situation-memory.js';
import type { SimilarSituation, StoredSituation } from '../types/memory.js';

/** OR-query over the situation's words; only [a-z0-9] reach to_tsquery */
export function toOrQuery(situation: string): string {
  return [...tokenize(situation)].join(' | ');
}

export class PgSituationMemory implements SituationMemory {
  async store(situation: string, recommendation: string): Promise<StoredSituation> {
    const situationId = randomUUID();
    const { rows } = await queryWithRetry<{ created_at: Date }>(
      `INSERT INTO situation_memories (id, situation, recommendation)
       VALUES ($1, $2, $3)
       RETURNING created_at`,
      [situationId, situation, recommendation],
    );
    return {
      situationId,
      situation,
      recommendation,
      createdAt: rows[0] ? new Date(rows[0].created_at) : new Date(),
    };
  }

  async retrieveSimilar(situation: string, n = 1): Promise<SimilarSituation[]> {
    const query = toOrQuery(situation);
    if (!query || n <= 0) return [];

    // normalization 32 maps the rank into [0, 1) as rank / (rank + 1)
    const { rows } = await queryWithRetry<{
      situation: string;
      recommendation: string;
      similarity: number;
    }>(
      `SELECT situation, recommendation, ts_rank_cd(search, q, 32) AS similarity
       FROM situation_memories, to_tsquery('english', $1) AS q
       WHERE search @@ q
       ORDER BY similarity DESC, created_at DESC
       LIMIT $2`,
      [query, n],
    );

    return rows.map(r => ({
      matchedSituation: r.situation,
      recommendation: r.recommendation,
      similarityScore: Number(r.similarity),
    }));
  }
}
