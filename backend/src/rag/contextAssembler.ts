// backend/src/rag/contextAssembler.ts

import type { RetrievedPassage } from "../types";
import { truncate } from "../utils/text";

export const NO_CONTEXT_TEXT = "No relevant documents found.";
const PASSAGE_SEPARATOR = "\n\n---\n\n";

export type ContextSource = {
  id: string;
  source: string;
  similarityScore: number;
};

export type StructuredContext = {
  context: string;
  sources: ContextSource[];
  totalDocuments: number;
};

function topByScore(passages: RetrievedPassage[], maxDocs: number): RetrievedPassage[] {
  return [...passages].sort((a, b) => b.similarityScore - a.similarityScore).slice(0, Math.max(0, maxDocs));
}

function header(p: RetrievedPassage): string {
  const page = p.page !== null ? `, page ${p.page}` : "";
  const score = p.similarityScore > 0 ? ` (Similarity: ${p.similarityScore.toFixed(3)})` : "";
  return `Source: ${p.source}${page}${score}`;
}

/** Same passages and limits always yield the same text. */
export function buildContext(passages: RetrievedPassage[], maxDocs: number, maxChars: number): string {
  const top = topByScore(passages, maxDocs);
  if (top.length === 0) return NO_CONTEXT_TEXT;
  return top.map((p) => `${header(p)}\nContent: ${truncate(p.content, maxChars)}`).join(PASSAGE_SEPARATOR);
}

export function buildStructuredContext(
  passages: RetrievedPassage[],
  maxDocs: number,
  maxChars: number
): StructuredContext {
  const top = topByScore(passages, maxDocs);
  return {
    context: top.length === 0 ? NO_CONTEXT_TEXT : buildContext(top, maxDocs, maxChars),
    sources: top.map((p) => ({ id: p.id, source: p.source, similarityScore: p.similarityScore })),
    totalDocuments: top.length,
  };
}
