// backend/src/tutoring/practiceGenerator.ts

import { z } from "zod";
import type { CompletionClient } from "../ai/clients";
import { parseJsonArray } from "../ai/jsonBlock";
import { buildPracticePrompt } from "../ai/prompts/tutoringPrompts";
import type { AnyLearnerProfile, LearningStyle, PracticeDifficulty, PracticeType } from "../types";
import { logWarn } from "../utils/logger";

export type PracticeItem = {
  id: string;
  question: string;
  answer: string | null;
  explanation: string | null;
  difficulty: PracticeDifficulty;
  type: PracticeType;
};

export type PracticeRequest = {
  topic: string;
  practiceType: PracticeType | null;
  difficulty: PracticeDifficulty | null;
  count: number;
};

const TYPE_KEYWORDS: [string, PracticeType][] = [
  ["flashcard", "flashcards"],
  ["cards", "flashcards"],
  ["memorize", "flashcards"],
  ["quiz", "quiz"],
  ["test", "quiz"],
  ["questions", "quiz"],
  ["exercise", "exercises"],
  ["activity", "exercises"],
  ["assessment", "assessment"],
  ["exam", "assessment"],
  ["evaluation", "assessment"],
  ["problem", "problems"],
  ["math", "problems"],
];

const DIFFICULTY_KEYWORDS: [string, PracticeDifficulty][] = [
  ["easy", "easy"],
  ["medium", "medium"],
  ["hard", "hard"],
  ["challenging", "hard"],
];

const STYLE_PRACTICE_TYPES: Partial<Record<LearningStyle, PracticeType>> = {
  Kinesthetic: "exercises",
  Analytical: "problems",
  Visual: "flashcards",
  Auditory: "quiz",
};

const DEFAULT_COUNT = 5;
const MAX_COUNT = 10;
const FALLBACK_LIMIT = 3;

export function parsePracticeRequest(query: string): PracticeRequest {
  const text = String(query || "").trim();
  const lowered = text.toLowerCase();
  const countMatch = /(\d+)\s*(?:questions|problems|items|exercises|cards|flashcards)/.exec(lowered);
  const count = countMatch?.[1] ? Math.min(MAX_COUNT, Math.max(1, Number(countMatch[1]))) : DEFAULT_COUNT;
  const topic = text
    .replace(/^(please\s+)?(give me|generate|create|make)\s+/i, "")
    .replace(/^(some|\d+)\s+/i, "")
    .replace(/^(easy|medium|hard|challenging)\s+/i, "")
    .replace(/^(practice\s+)?(problems|questions|exercises|quiz|flashcards|assessment)\s+(on|about|for)\s+/i, "")
    .trim();

  return {
    topic: topic || text,
    practiceType: TYPE_KEYWORDS.find(([k]) => lowered.includes(k))?.[1] ?? null,
    difficulty: DIFFICULTY_KEYWORDS.find(([k]) => lowered.includes(k))?.[1] ?? null,
    count,
  };
}

export type DifficultyDecision = {
  difficulty: PracticeDifficulty;
  reason: "requested" | "stored_preference" | "struggle" | "grade" | "default";
};

function storedDifficulty(profile: AnyLearnerProfile): PracticeDifficulty | null {
  // "medium" is the neutral default every profile starts with, not a stated preference
  if (profile.difficultyPreference === "easy") return "easy";
  if (profile.difficultyPreference === "challenging") return "hard";
  return null;
}

function gradeDifficulty(grade: number, accuracy: number): PracticeDifficulty | null {
  if (!Number.isFinite(grade) || grade <= 0) return null;
  const baseline: PracticeDifficulty = grade <= 6 ? "easy" : "medium";
  if (accuracy > 0.75) return baseline === "easy" ? "medium" : "hard";
  if (accuracy < 0.65) return "easy";
  return baseline;
}

/**
 * explicit request > stored preference > struggle > grade (tuned by accuracy) > default.
 * Learning style has no difficulty mapping; it picks the practice type instead.
 */
export function selectPracticeDifficulty(
  profile: AnyLearnerProfile,
  requested: PracticeDifficulty | null
): DifficultyDecision {
  if (requested) return { difficulty: requested, reason: "requested" };

  const stored = storedDifficulty(profile);
  if (stored) return { difficulty: stored, reason: "stored_preference" };

  if (profile.struggles.length > 0 || profile.metrics.accuracyRate < 0.6) {
    return { difficulty: "easy", reason: "struggle" };
  }

  const byGrade = gradeDifficulty(profile.gradeLevel, profile.metrics.accuracyRate);
  if (byGrade) return { difficulty: byGrade, reason: "grade" };

  return { difficulty: "medium", reason: "default" };
}

export function selectPracticeType(profile: AnyLearnerProfile, requested: PracticeType | null): PracticeType {
  return requested ?? STYLE_PRACTICE_TYPES[profile.learningStyle] ?? "problems";
}

const itemSchema = z.object({
  question: z.string().min(1),
  answer: z.string().nullish(),
  explanation: z.string().nullish(),
});

export function parsePracticeItems(raw: string, difficulty: PracticeDifficulty, type: PracticeType): PracticeItem[] {
  const array = parseJsonArray(raw);
  if (array) {
    const items = array.flatMap((entry) => {
      const parsed = itemSchema.safeParse(entry);
      return parsed.success ? [parsed.data] : [];
    });
    if (items.length > 0) {
      return items.map((it, i) => ({
        id: `practice_${i + 1}`,
        question: it.question,
        answer: it.answer ?? null,
        explanation: it.explanation ?? null,
        difficulty,
        type,
      }));
    }
  }

  // numbered plain-text list
  const numbered = String(raw || "")
    .split("\n")
    .map((line) => /^\s*\d+[.)]\s+(.+)$/.exec(line)?.[1]?.trim())
    .filter((q): q is string => Boolean(q));

  return numbered.map((question, i) => ({
    id: `practice_${i + 1}`,
    question,
    answer: null,
    explanation: null,
    difficulty,
    type,
  }));
}

export function fallbackPracticeItems(
  topic: string,
  difficulty: PracticeDifficulty,
  type: PracticeType,
  count: number
): PracticeItem[] {
  const items: PracticeItem[] = [];
  for (let i = 1; i <= Math.min(count, FALLBACK_LIMIT); i++) {
    items.push({
      id: `fallback_${i}`,
      question: `Practice question ${i} about ${topic}. Work through the idea step by step.`,
      answer: `Work through this ${topic} problem systematically, applying the key concepts.`,
      explanation: `This checks your understanding of ${topic}. Take your time with the approach.`,
      difficulty,
      type,
    });
  }
  return items;
}

export function formatPractice(items: PracticeItem[], type: PracticeType, difficulty: PracticeDifficulty): string {
  const title = type.charAt(0).toUpperCase() + type.slice(1);
  const lines = [`**Practice ${title} (${difficulty}):**`, ""];
  items.forEach((item, i) => {
    lines.push(`${i + 1}. ${item.question}`);
    if (item.answer) lines.push(`   Answer: ${item.answer}`);
  });
  return lines.join("\n");
}

export type PracticeResult = {
  text: string;
  items: PracticeItem[];
  practiceType: PracticeType;
  difficulty: PracticeDifficulty;
  reason: DifficultyDecision["reason"];
  source: "ai" | "fallback";
};

export async function generatePractice(
  query: string,
  profile: AnyLearnerProfile,
  deps: { completion: CompletionClient }
): Promise<PracticeResult> {
  const request = parsePracticeRequest(query);
  const decision = selectPracticeDifficulty(profile, request.difficulty);
  const practiceType = selectPracticeType(profile, request.practiceType);

  let raw = "";
  try {
    raw = await deps.completion.complete(
      buildPracticePrompt({
        topic: request.topic,
        practiceType,
        difficulty: decision.difficulty,
        count: request.count,
        profile,
      }),
      { temperature: 0.5, maxOutputTokens: 900 }
    );
  } catch (err) {
    logWarn("practice_generation_failed", err, { practiceType });
  }

  const parsed = parsePracticeItems(raw, decision.difficulty, practiceType).slice(0, request.count);
  const source = parsed.length > 0 ? "ai" : "fallback";
  const items =
    source === "ai" ? parsed : fallbackPracticeItems(request.topic, decision.difficulty, practiceType, request.count);

  return {
    text: formatPractice(items, practiceType, decision.difficulty),
    items,
    practiceType,
    difficulty: decision.difficulty,
    reason: decision.reason,
    source,
  };
}
