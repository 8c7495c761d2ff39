// backend/src/agents/explainableUnits.ts

import { randomUUID } from "crypto";
import type { CompletionClient } from "../ai/clients";
import { isRecord, parseJsonArray, parseJsonObject } from "../ai/jsonBlock";
import { buildUnitsUserMessage, EXPLAINABLE_UNITS_INSTRUCTIONS } from "../ai/prompts/answerPrompts";
import { learningUnitSchema } from "../rag/answerSchemas";
import { detectLanguage } from "../services/ingestion";
import type { DocumentRecord, DocumentStore, LearningUnit, LearningUnitRecord, LearningUnitStore } from "../types";
import { errorMessage } from "../utils/errors";
import { logInfo, logServerError, logWarn } from "../utils/logger";
import { truncate } from "../utils/text";

export type UnitsRequest = {
  query: string;
  sessionId: string | null;
  documentId: string | null;
  adaptation: string | null;
  requestId?: string;
};

export type UnitsResult =
  | { status: "generated"; documentId: string; units: LearningUnitRecord[]; stored: boolean; message: string }
  | { status: "no_documents"; units: []; message: string }
  | { status: "error"; units: []; message: string };

export type ExplainableUnitsDeps = {
  completion: CompletionClient;
  documents: Pick<DocumentStore, "get" | "latest">;
  units: LearningUnitStore;
  maxContentChars: number;
  newId?: () => string;
  now?: () => Date;
};

export const NO_UNIT_DOCUMENTS = "No documents available to generate learning units from.";

/** Either a JSON array of units, an object with a "units" array, or a single unit object. */
export function parseUnitsOutput(text: string): Record<string, unknown>[] {
  const arrayAt = text.indexOf("[");
  const objectAt = text.indexOf("{");
  if (arrayAt >= 0 && (objectAt < 0 || arrayAt < objectAt)) {
    return (parseJsonArray(text) ?? []).filter(isRecord);
  }
  const obj = parseJsonObject(text);
  if (Array.isArray(obj.units)) return obj.units.filter(isRecord);
  return Object.keys(obj).length ? [obj] : [];
}

function textOf(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value : fallback;
}

function stringsOf(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

/** Schema-valid units pass through; anything else is filled in field by field. */
export function toLearningUnit(raw: Record<string, unknown>): LearningUnit {
  const parsed = learningUnitSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  return {
    title: textOf(raw.title, "Untitled Unit"),
    subtopics: stringsOf(raw.subtopics),
    detailedExplanation: textOf(raw.detailed_explanation, ""),
    keyPoints: stringsOf(raw.key_points),
    difficultyLevel: textOf(raw.difficulty_level, "intermediate"),
    learningObjectives: stringsOf(raw.learning_objectives),
    keywords: stringsOf(raw.keywords),
  };
}

function metadataText(doc: DocumentRecord, keys: string[], fallback: string): string {
  for (const key of keys) {
    const value = doc.metadata[key];
    if (typeof value === "string" && value.trim()) return value.trim();
    if (typeof value === "number") return String(value);
  }
  return fallback;
}

/**
 * Breaks one document into teachable units. Storage is best-effort: the
 * generated units are returned even when the write fails.
 */
export function createExplainableUnits(deps: ExplainableUnitsDeps) {
  const newId = deps.newId ?? randomUUID;
  const now = deps.now ?? (() => new Date());

  async function draft(doc: DocumentRecord, req: UnitsRequest): Promise<LearningUnitRecord[]> {
    const subject = metadataText(doc, ["subject"], "General");
    const gradeLevel = metadataText(doc, ["gradeLevel", "grade_level"], "12");
    const output = await deps.completion.complete([
      { role: "system", content: EXPLAINABLE_UNITS_INSTRUCTIONS },
      {
        role: "user",
        content: buildUnitsUserMessage({
          content: truncate(doc.content.trim(), deps.maxContentChars),
          subject,
          gradeLevel,
          language: detectLanguage(doc.content) === "ar" ? "Arabic" : "English",
          adaptation: req.adaptation,
        }),
      },
    ]);

    return parseUnitsOutput(output).map((raw) => ({
      ...toLearningUnit(raw),
      id: newId(),
      sourceDocumentId: doc.id,
      subject,
      gradeLevel,
      adaptationApplied: req.adaptation !== null,
      createdAt: now(),
    }));
  }

  async function loadAndDraft(req: UnitsRequest): Promise<{ doc: DocumentRecord; units: LearningUnitRecord[] } | null> {
    const doc = req.documentId ? await deps.documents.get(req.documentId) : await deps.documents.latest(req.sessionId);
    if (!doc || !doc.content.trim()) return null;
    return { doc, units: await draft(doc, req) };
  }

  return async function generate(req: UnitsRequest): Promise<UnitsResult> {
    let drafted: { doc: DocumentRecord; units: LearningUnitRecord[] } | null = null;
    try {
      drafted = await loadAndDraft(req);
    } catch (err) {
      logServerError("explainable_units", err, req.requestId);
      return { status: "error", units: [], message: `Error generating learning units: ${errorMessage(err)}` };
    }
    if (!drafted) return { status: "no_documents", units: [], message: NO_UNIT_DOCUMENTS };

    const { doc, units } = drafted;
    if (units.length === 0) {
      return { status: "error", units: [], message: "Error generating learning units: the model returned no units." };
    }

    let stored = true;
    try {
      await deps.units.insertMany(units);
    } catch (err) {
      stored = false;
      logWarn("learning_units_write_failed", err, { requestId: req.requestId, documentId: doc.id });
    }

    logInfo("learning_units_generated", { requestId: req.requestId, documentId: doc.id, count: units.length, stored });
    return {
      status: "generated",
      documentId: doc.id,
      units,
      stored,
      message: `Generated ${units.length} learning unit(s) from "${doc.title}".`,
    };
  };
}

export type ExplainableUnits = ReturnType<typeof createExplainableUnits>;
