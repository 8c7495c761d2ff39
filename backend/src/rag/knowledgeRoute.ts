// backend/src/rag/knowledgeRoute.ts

import type { ChunkFilter } from "../types";
import { errorMessage } from "../utils/errors";
import { logInfo, logServerError } from "../utils/logger";
import type { AnswerGenerator } from "./answerGenerator";
import { buildStructuredContext, type ContextSource } from "./contextAssembler";
import { checkRelevance } from "./relevanceGate";
import type { Reranker } from "./reranker";
import type { Retriever } from "./retriever";
import type { SessionMemory } from "./sessionMemory";

export const NO_DOCUMENTS_MESSAGE =
  "I don't have any documents to reference. Please upload documents first before asking questions about their content.";
export const NOT_RELEVANT_MESSAGE =
  "I couldn't find relevant information in the uploaded documents to answer your question. Please try rephrasing your question or check if the documents contain the information you're looking for.";

export function processingErrorMessage(err: unknown): string {
  return `I encountered an error while processing your question: ${errorMessage(err)}`;
}

export type KnowledgeRouteSettings = {
  name: string;
  threshold: number;
  topK: number;
  maxContextDocs: number;
  maxContextChars: number;
  historyTurns: number;
};

export type KnowledgeRouteDeps<T> = {
  retriever: Retriever;
  generator: AnswerGenerator<T>;
  memory: SessionMemory;
  /** when present, decides which retrieved passages reach the gate */
  reranker?: Reranker | null;
  /** read on every call; defaults to on when a reranker is given */
  rerankEnabled?: () => boolean;
};

export type KnowledgeQuery = {
  query: string;
  sessionId: string | null;
  filter?: ChunkFilter;
  requestId?: string;
};

export type KnowledgeResult<T> =
  | { status: "answered"; answer: string; payload: T; sources: ContextSource[]; maxScore: number }
  | { status: "no_documents" | "not_relevant" | "error"; answer: string; payload: null; sources: []; maxScore: number };

export type KnowledgeRoute<T> = (input: KnowledgeQuery) => Promise<KnowledgeResult<T>>;

/** Retriever, gate, assembler, generator: strictly in that order, no retries. */
export function createKnowledgeRoute<T>(
  settings: KnowledgeRouteSettings,
  deps: KnowledgeRouteDeps<T>
): KnowledgeRoute<T> {
  return async function answer(input: KnowledgeQuery): Promise<KnowledgeResult<T>> {
    try {
      const retrieved = await deps.retriever.retrieve(input.query, settings.topK, input.filter);
      if (retrieved.length === 0) {
        return { status: "no_documents", answer: NO_DOCUMENTS_MESSAGE, payload: null, sources: [], maxScore: 0 };
      }

      const reranker = deps.reranker && (deps.rerankEnabled?.() ?? true) ? deps.reranker : null;
      const candidates = reranker
        ? (await reranker.score(input.query, retrieved)).slice(0, settings.maxContextDocs)
        : retrieved;

      const verdict = checkRelevance(candidates, settings.threshold, settings.maxContextDocs);
      deps.memory.recordRetrieval(input.sessionId, {
        chunkIds: verdict.selected.map((p) => p.id),
        similarityScores: verdict.selected.map((p) => p.similarityScore),
        numChunks: verdict.selected.length,
      });

      logInfo("knowledge_route", {
        route: settings.name,
        requestId: input.requestId,
        retrieved: retrieved.length,
        maxScore: Math.round(verdict.maxScore * 1000) / 1000,
        relevant: verdict.isRelevant,
      });

      if (!verdict.isRelevant) {
        return {
          status: "not_relevant",
          answer: NOT_RELEVANT_MESSAGE,
          payload: null,
          sources: [],
          maxScore: verdict.maxScore,
        };
      }

      const context = buildStructuredContext(verdict.selected, settings.maxContextDocs, settings.maxContextChars);
      const payload = await deps.generator.generate({
        query: input.query,
        context: context.context,
        history: deps.memory.history(input.sessionId, settings.historyTurns),
      });
      const text = deps.generator.render(payload);
      deps.memory.append(input.sessionId, input.query, text);

      return { status: "answered", answer: text, payload, sources: context.sources, maxScore: verdict.maxScore };
    } catch (err) {
      logServerError(`knowledge:${settings.name}`, err, input.requestId);
      return { status: "error", answer: processingErrorMessage(err), payload: null, sources: [], maxScore: 0 };
    }
  };
}

