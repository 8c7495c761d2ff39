// backend/src/agents/documentAnalysis.ts

import type { Reranker } from "../rag/reranker";
import type { Retriever } from "../rag/retriever";
import type { ChunkFilter, RankedPassage } from "../types";
import { errorMessage } from "../utils/errors";
import { logServerError } from "../utils/logger";

export type RelevanceBand = "high" | "medium" | "low";

export type AnalyzedPassage = {
  position: number;
  documentId: string;
  source: string;
  page: number | null;
  score: number;
  band: RelevanceBand;
  preview: string;
};

export type DocumentAnalysis = {
  query: string;
  passageCount: number;
  threshold: number;
  topScore: number;
  meetsThreshold: boolean;
  passages: AnalyzedPassage[];
  recommendations: string[];
};

export type DocumentAnalysisResult =
  | { status: "analyzed"; analysis: DocumentAnalysis; report: string }
  | { status: "no_documents"; analysis: null; report: string }
  | { status: "error"; analysis: null; report: string };

export type DocumentAnalysisRequest = {
  query: string;
  filter?: ChunkFilter;
  requestId?: string;
};

export type DocumentAnalysisSettings = { threshold: number; topK: number };

export type DocumentAnalysisDeps = { retriever: Retriever; reranker: Reranker };

export const NO_ANALYSIS_DOCUMENTS = "No documents available for analysis.";

const MEDIUM_BAND = 0.5;
const PREVIEW_CHARS = 150;
const DETAIL_LIMIT = 5;

const RELEVANT_ADVICE = [
  "The documents are relevant to this query.",
  "You can ask specific questions about their content.",
  "Consider generating learning units from this material.",
];

const WEAK_ADVICE = [
  "The documents may not be relevant to this query.",
  "Try rephrasing the question.",
  "Consider uploading material that covers the topic.",
  "General questions can still be answered without the documents.",
];

export function relevanceBand(score: number, threshold: number): RelevanceBand {
  if (score >= threshold) return "high";
  return score >= MEDIUM_BAND ? "medium" : "low";
}

export function previewOf(content: string): string {
  const flat = content.slice(0, PREVIEW_CHARS).replace(/\n/g, " ");
  return content.length > PREVIEW_CHARS ? `${flat}...` : flat;
}

/** ranked must be ordered by descending rerankScore */
export function buildAnalysis(query: string, ranked: RankedPassage[], threshold: number): DocumentAnalysis {
  const topScore = ranked[0]?.rerankScore ?? 0;
  const meetsThreshold = ranked.length > 0 && topScore >= threshold;
  return {
    query,
    passageCount: ranked.length,
    threshold,
    topScore,
    meetsThreshold,
    passages: ranked.slice(0, DETAIL_LIMIT).map((p) => ({
      position: p.rerankPosition,
      documentId: p.documentId,
      source: p.source,
      page: p.page,
      score: p.rerankScore,
      band: relevanceBand(p.rerankScore, threshold),
      preview: previewOf(p.content),
    })),
    recommendations: meetsThreshold ? RELEVANT_ADVICE : WEAK_ADVICE,
  };
}

export function renderAnalysis(a: DocumentAnalysis): string {
  const lines = [
    "Document Analysis Report",
    `Query: "${a.query}"`,
    `Passages analyzed: ${a.passageCount}`,
    `Relevance threshold: ${a.threshold.toFixed(3)}`,
    `Highest relevance score: ${a.topScore.toFixed(3)}`,
    `Meets threshold: ${a.meetsThreshold ? "yes" : "no"}`,
    "",
    "Passage details:",
  ];
  for (const p of a.passages) {
    const where = p.page !== null ? `${p.source}, page ${p.page}` : p.source;
    lines.push(`${p.position}. [${p.band}] ${where} (score ${p.score.toFixed(3)})`, `   ${p.preview}`);
  }
  lines.push("", "Recommendations:", ...a.recommendations.map((r) => `- ${r}`));
  return lines.join("\n");
}

/**
 * Reports how well the stored documents cover a query, without calling the
 * completion model.
 */
export function createDocumentAnalysis(settings: DocumentAnalysisSettings, deps: DocumentAnalysisDeps) {
  return async function analyze(req: DocumentAnalysisRequest): Promise<DocumentAnalysisResult> {
    try {
      const passages = await deps.retriever.retrieve(req.query, settings.topK, req.filter);
      if (passages.length === 0) return { status: "no_documents", analysis: null, report: NO_ANALYSIS_DOCUMENTS };

      const ranked = await deps.reranker.score(req.query, passages);
      const analysis = buildAnalysis(req.query, ranked, settings.threshold);
      return { status: "analyzed", analysis, report: renderAnalysis(analysis) };
    } catch (err) {
      logServerError("document_analysis", err, req.requestId);
      return { status: "error", analysis: null, report: `Error analyzing documents: ${errorMessage(err)}` };
    }
  };
}

export type DocumentAnalyzer = ReturnType<typeof createDocumentAnalysis>;
