// backend/src/rag/relevanceGate.ts

import type { RetrievedPassage } from "../types";

export type RelevanceVerdict<P extends RetrievedPassage> = {
  isRelevant: boolean;
  maxScore: number;
  threshold: number;
  selected: P[];
};

/**
 * Relevant when the best score reaches the threshold. An empty set is never
 * relevant. `topN` is independent of the retriever's topK.
 */
export function checkRelevance<P extends RetrievedPassage>(
  passages: P[],
  threshold: number,
  topN: number
): RelevanceVerdict<P> {
  if (passages.length === 0) {
    return { isRelevant: false, maxScore: 0, threshold, selected: [] };
  }

  const maxScore = Math.max(...passages.map((p) => p.similarityScore));
  const selected = [...passages].sort((a, b) => b.similarityScore - a.similarityScore).slice(0, Math.max(0, topN));

  return { isRelevant: maxScore >= threshold, maxScore, threshold, selected };
}
