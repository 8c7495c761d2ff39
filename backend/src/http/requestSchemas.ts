// backend/src/http/requestSchemas.ts

import type { Response } from "express";
import { z } from "zod";
import {
  DIFFICULTY_PREFERENCES,
  LEARNING_STYLES,
  type LearnerProfileData,
} from "../types";
import { sendError } from "./sendError";

const optionalId = z
  .string()
  .trim()
  .max(128)
  .nullish()
  .transform((v) => (v ? v : null));

const text = (max: number) => z.string().trim().min(1).max(max);

const record = z
  .record(z.unknown())
  .optional()
  .transform((v) => v ?? {});

export const routerBody = z.object({
  message: text(4000),
  sessionId: optionalId,
  documentId: optionalId,
  learnerId: optionalId,
  currentPage: z
    .number()
    .int()
    .nonnegative()
    .nullish()
    .transform((v) => v ?? null),
  state: record,
});

export const knowledgeBody = z.object({
  query: text(4000),
  sessionId: optionalId,
  documentId: optionalId,
});

export const agentsBody = z.object({
  query: text(4000),
  sessionId: optionalId,
  documentId: optionalId,
  learnerId: optionalId,
  state: record,
});

const pageKey = /^[1-9]\d*$/;

export const uploadBody = z
  .object({
    title: text(300),
    pages: z
      .record(z.string())
      .nullish()
      .transform((v) => v ?? null)
      .refine((v) => v === null || Object.keys(v).every((k) => pageKey.test(k)), "page keys must be positive integers"),
    text: z
      .string()
      .nullish()
      .transform((v) => v ?? null),
    sessionId: optionalId,
    metadata: record,
  })
  .refine(
    (b) => (b.pages !== null && Object.values(b.pages).some((p) => p.trim())) || (b.text !== null && b.text.trim() !== ""),
    { message: "pages or text is required", path: ["pages"] }
  );

export const sessionCreateBody = z.object({ metadata: record });

export const sessionPatchBody = z.object({ metadata: z.record(z.unknown()) });

export const chatHistoryQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export const tutoringStartBody = z.object({
  learnerId: text(128),
  topic: optionalId,
});

export const tutoringEndBody = z.object({
  endedBy: z.enum(["learner", "session_manager"]).default("learner"),
});

const metrics = z.object({
  accuracyRate: z.number().min(0).max(1).default(0),
  avgResponseTime: z.number().nonnegative().default(0),
  completionRate: z.number().min(0).max(1).default(0),
  totalSessions: z.number().int().nonnegative().default(0),
});

export const learnerCreateBody = z.object({
  gradeLevel: z.number().int().min(0).max(20).default(0),
  learningStyle: z.enum(LEARNING_STYLES).default("Mixed"),
  preferredLanguage: z.string().trim().min(1).default("English"),
  difficultyPreference: z.enum(DIFFICULTY_PREFERENCES).default("medium"),
  metrics: metrics.default({}),
  interactionPatterns: record,
  struggles: z
    .array(z.object({ topic: z.string(), type: z.string(), timestamp: z.string() }))
    .default([]),
  masteredTopics: z.array(z.string()).default([]),
  preferredExplanationStyles: z
    .array(z.object({ style: z.string(), effectiveness: z.number().min(0).max(1) }))
    .default([]),
  preferredFormats: z.array(z.string()).default([]),
}) satisfies z.ZodType<Omit<LearnerProfileData, "id">, z.ZodTypeDef, unknown>;

export const learnerUpdateBody = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("performance"),
    accuracy: z.number().min(0).max(1).optional(),
    responseTimeSeconds: z.number().nonnegative().optional(),
    completed: z.boolean().optional(),
  }),
  z.object({ kind: z.literal("mastered_topic"), topic: text(200) }),
  z.object({ kind: z.literal("struggle"), topic: text(200), type: text(100) }),
  z.object({
    kind: z.literal("preferences"),
    gradeLevel: z.number().int().min(0).max(20).optional(),
    learningStyle: z.enum(LEARNING_STYLES).optional(),
    preferredLanguage: z.string().trim().min(1).optional(),
    difficultyPreference: z.enum(DIFFICULTY_PREFERENCES).optional(),
  }),
]);

/** Parses or answers 400 naming the first offending field. */
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, res: Response): T | null {
  const parsed = schema.safeParse(value ?? {});
  if (parsed.success) return parsed.data;
  const field = parsed.error.issues[0]?.path.join(".") || "body";
  sendError(res, 400, `Invalid request: ${field}`, "INVALID_REQUEST");
  return null;
}
