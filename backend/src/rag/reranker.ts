// backend/src/rag/reranker.ts

import type { EmbeddingClient } from "../ai/clients";
import type { RankedPassage, RetrievedPassage } from "../types";
import { cosineDistance } from "./vectorMath";

export type Reranker = {
  score: (query: string, passages: RetrievedPassage[]) => Promise<RankedPassage[]>;
};

export function rankByScore(passages: RetrievedPassage[], scores: number[]): RankedPassage[] {
  return passages
    .map((p, i) => ({ p, score: scores[i] ?? 0 }))
    .sort((a, b) => b.score - a.score)
    .map(({ p, score }, i) => ({ ...p, rerankScore: score, rerankPosition: i + 1 }));
}

/**
 * Second-pass scorer that compares the query with each passage's own
 * embedding. Stands in for a cross-encoder behind the same contract.
 */
export function createEmbeddingReranker(embeddings: EmbeddingClient): Reranker {
  return {
    async score(query, passages) {
      if (passages.length === 0) return [];
      const [q, docs] = await Promise.all([
        embeddings.embedQuery(query),
        embeddings.embedDocuments(passages.map((p) => p.content)),
      ]);
      return rankByScore(
        passages,
        docs.map((d) => 1 - cosineDistance(q, d))
      );
    },
  };
}
