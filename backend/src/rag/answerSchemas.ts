// backend/src/rag/answerSchemas.ts

import { z } from "zod";
import type { LearningUnit } from "../types";
import { truncate } from "../utils/text";
import type { SchemaGeneratorOptions } from "./answerGenerator";

const stringList = z.array(z.string()).default([]);

export type { LearningUnit };

export const learningUnitSchema = z
  .object({
    title: z.string().min(1),
    subtopics: stringList,
    detailed_explanation: z.string(),
    key_points: stringList,
    difficulty_level: z.string().default("intermediate"),
    learning_objectives: stringList,
    keywords: stringList,
  })
  .transform(
    (u): LearningUnit => ({
      title: u.title,
      subtopics: u.subtopics,
      detailedExplanation: u.detailed_explanation,
      keyPoints: u.key_points,
      difficultyLevel: u.difficulty_level,
      learningObjectives: u.learning_objectives,
      keywords: u.keywords,
    })
  );

function errorUnit(message: string): LearningUnit {
  return {
    title: "Error in Processing",
    subtopics: [],
    detailedExplanation: `An error occurred while building the learning unit: ${message}`,
    keyPoints: [],
    difficultyLevel: "unknown",
    learningObjectives: [],
    keywords: [],
  };
}

export const learningUnitOptions: SchemaGeneratorOptions<LearningUnit> = {
  name: "learning_unit",
  schema: learningUnitSchema,
  fromUnstructured: (raw) => errorUnit(raw.trim() ? "response did not match the learning unit shape" : "empty model response"),
  onError: errorUnit,
  render: (u) =>
    [
      `# ${u.title}`,
      u.detailedExplanation,
      u.keyPoints.length ? `Key points:\n${u.keyPoints.map((p) => `- ${p}`).join("\n")}` : "",
    ]
      .filter(Boolean)
      .join("\n\n"),
};

export type DocumentSummary = {
  title: string;
  content: string;
  keyPoints: string[];
  language: string | null;
};

const summarySchema = z
  .object({
    title: z.string().default("Document Summary"),
    content: z.string().min(1),
    key_points: stringList,
    language: z.string().nullable().default(null),
  })
  .transform(
    (s): DocumentSummary => ({ title: s.title, content: s.content, keyPoints: s.key_points, language: s.language })
  );

export const summaryOptions: SchemaGeneratorOptions<DocumentSummary> = {
  name: "summary",
  schema: summarySchema,
  fromUnstructured: (raw) => ({
    title: "Document Summary",
    content: truncate(raw.trim(), 500) || "Summary not available",
    keyPoints: ["Summary generated from document content"],
    language: null,
  }),
  onError: () => ({
    title: "Summary Error",
    content: "Error during summary generation.",
    keyPoints: ["Error in summary generation"],
    language: null,
  }),
  render: (s) =>
    [`${s.title}`, s.content, s.keyPoints.length ? s.keyPoints.map((p) => `- ${p}`).join("\n") : ""]
      .filter(Boolean)
      .join("\n\n"),
};
