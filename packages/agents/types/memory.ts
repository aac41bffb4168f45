// Similarity Memory - past situations and the recommendation recorded for them
// Only ever used to enrich prompts; never feeds numeric computation

export interface SimilarSituation {
  readonly matchedSituation: string;
  readonly recommendation: string;
  readonly similarityScore: number;   // 0-1
}

export interface StoredSituation {
  readonly situationId: string;
  readonly situation: string;
  readonly recommendation: string;
  readonly createdAt: Date;
}
