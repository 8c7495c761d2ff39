// backend/src/agents/contentAgent.ts

import { isTutorDelegationEnabled } from "../config/featureFlags";
import type { JsonAnswer } from "../rag/answerGenerator";
import type { KnowledgeResult, KnowledgeRoute } from "../rag/knowledgeRoute";
import type { RouterDecisionStore } from "../types";
import { logWarn } from "../utils/logger";
import type { DocumentAnalysisResult, DocumentAnalyzer } from "./documentAnalysis";
import type { ExplainableUnits, UnitsResult } from "./explainableUnits";
import { isTutoringRequest } from "./tutoringDetection";
import type { TutorAgent, TutorResult } from "./tutorAgent";

export type ContentHandler = "rag_chat" | "document_analysis" | "explainable_units";

export type ContentAgentRequest = {
  query: string;
  sessionId: string | null;
  learnerId: string | null;
  documentId: string | null;
  state?: Record<string, unknown>;
  requestId?: string;
};

export type ContentAgentResult = {
  handler: ContentHandler;
  status: "ok" | "no_documents" | "error";
  answer: string;
  delegated: boolean;
  knowledge: KnowledgeResult<JsonAnswer> | null;
  tutoring: TutorResult | null;
  analysis: DocumentAnalysisResult | null;
  units: UnitsResult | null;
};

export type ContentAgentDeps = {
  knowledge: KnowledgeRoute<JsonAnswer>;
  tutor: TutorAgent;
  decisions: RouterDecisionStore;
  analyze: DocumentAnalyzer;
  buildUnits: ExplainableUnits;
};

// checked in order; the first table with a matching cue wins
const HANDLER_CUES: [Exclude<ContentHandler, "rag_chat">, readonly string[]][] = [
  [
    "explainable_units",
    ["learning unit", "teachable unit", "explainable unit", "study unit", "into units", "وحدات تعليمية"],
  ],
  [
    "document_analysis",
    [
      "analyze the document",
      "analyse the document",
      "analyze my document",
      "analyze the documents",
      "document analysis",
      "which documents",
      "what documents",
      "how relevant",
      "حلل المستند",
    ],
  ],
];

export function selectContentHandler(query: string): ContentHandler {
  const lowered = String(query || "").toLowerCase();
  for (const [handler, cues] of HANDLER_CUES) {
    if (cues.some((cue) => lowered.includes(cue))) return handler;
  }
  return "rag_chat";
}

function stateText(req: ContentAgentRequest, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = req.state?.[key];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return null;
}

function learnerIdFrom(req: ContentAgentRequest): string | null {
  return req.learnerId ?? stateText(req, "learnerId", "learner_id");
}

const idle = { delegated: false, knowledge: null, tutoring: null, analysis: null, units: null };

/**
 * Document-level requests (coverage analysis, unit generation) go to their
 * own handlers. Everything else is answered from the documents first and
 * then handed to the tutor when it reads as a tutoring need; the tutor sees
 * the grounded answer as context.
 */
export function createContentAgent(deps: ContentAgentDeps) {
  async function analyzeDocuments(req: ContentAgentRequest): Promise<ContentAgentResult> {
    const analysis = await deps.analyze({
      query: req.query,
      filter: req.documentId ? { documentId: req.documentId } : undefined,
      requestId: req.requestId,
    });
    return {
      ...idle,
      handler: "document_analysis",
      status: analysis.status === "analyzed" ? "ok" : analysis.status,
      answer: analysis.report,
      analysis,
    };
  }

  async function generateUnits(req: ContentAgentRequest): Promise<ContentAgentResult> {
    const units = await deps.buildUnits({
      query: req.query,
      sessionId: req.sessionId,
      documentId: req.documentId,
      adaptation: stateText(req, "adaptationInstruction", "adaptation_instruction"),
      requestId: req.requestId,
    });
    return {
      ...idle,
      handler: "explainable_units",
      status: units.status === "generated" ? "ok" : units.status,
      answer: units.message,
      units,
    };
  }

  async function chat(req: ContentAgentRequest): Promise<ContentAgentResult> {
    const knowledge = await deps.knowledge({
      query: req.query,
      sessionId: req.sessionId,
      filter: req.documentId ? { documentId: req.documentId } : undefined,
      requestId: req.requestId,
    });
    const base = {
      ...idle,
      handler: "rag_chat" as const,
      status: knowledge.status === "error" ? ("error" as const) : ("ok" as const),
      answer: knowledge.answer,
      knowledge,
    };

    if (!isTutorDelegationEnabled() || !isTutoringRequest(req.query)) return base;

    try {
      await deps.decisions.append(req.query, "tutor_agent");
    } catch (err) {
      logWarn("router_decision_write_failed", err, { requestId: req.requestId });
    }

    const tutoring = await deps.tutor.handle({
      query: req.query,
      learnerId: learnerIdFrom(req),
      groundingContext: knowledge.status === "answered" ? knowledge.answer : null,
      requestId: req.requestId,
    });

    if (tutoring.status === "error") {
      // a tutoring failure falls back to the document answer
      return { ...base, tutoring };
    }
    return { ...base, status: "ok", answer: tutoring.response, delegated: true, tutoring };
  }

  return async function handle(req: ContentAgentRequest): Promise<ContentAgentResult> {
    switch (selectContentHandler(req.query)) {
      case "document_analysis":
        return analyzeDocuments(req);
      case "explainable_units":
        return generateUnits(req);
      case "rag_chat":
        return chat(req);
    }
  };
}

export type ContentAgent = ReturnType<typeof createContentAgent>;
