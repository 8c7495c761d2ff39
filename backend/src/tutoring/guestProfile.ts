// backend/src/tutoring/guestProfile.ts

import { z } from "zod";
import {
  DIFFICULTY_PREFERENCES,
  LEARNING_STYLES,
  type DifficultyPreference,
  type GuestLearnerProfile,
  type LearningStyle,
} from "../types";
import rulesJson from "./data/guestProfileRules.json";
import { firstMatch } from "./ruleTable";

const keywords = z.array(z.string()).optional();
const learningStyle = z.enum(LEARNING_STYLES);

const rulesSchema = z.object({
  explicitGradePattern: z.string(),
  gradeRules: z.array(z.object({ any: keywords, all: keywords, none: keywords, grade: z.number().int() })),
  defaultGrade: z.number().int(),
  styleRules: z.array(z.object({ any: keywords, style: learningStyle })),
  defaultStyle: learningStyle,
  difficultyRules: z.array(z.object({ any: keywords, difficulty: z.enum(DIFFICULTY_PREFERENCES) })),
  defaultDifficulty: z.enum(DIFFICULTY_PREFERENCES),
  languageRules: z.array(z.object({ any: keywords, language: z.string() })),
  defaultLanguage: z.string(),
  preferredFormats: z.record(learningStyle, z.array(z.string())),
});

const RULES = rulesSchema.parse(rulesJson);
const EXPLICIT_GRADE = new RegExp(RULES.explicitGradePattern);

export type GuestTraits = {
  gradeLevel: number;
  learningStyle: LearningStyle;
  difficultyPreference: DifficultyPreference;
  preferredLanguage: string;
};

export function inferGradeLevel(lowered: string): number {
  const explicit = EXPLICIT_GRADE.exec(lowered);
  if (explicit?.[1]) return Number(explicit[1]);
  return firstMatch(RULES.gradeRules, lowered)?.grade ?? RULES.defaultGrade;
}

/**
 * The four tables are independent: each scans the same query and none
 * sees another's result. Language cues are matched on the original casing.
 */
export function inferGuestTraits(query: string): GuestTraits {
  const original = String(query || "");
  const lowered = original.toLowerCase();

  return {
    gradeLevel: inferGradeLevel(lowered),
    learningStyle: firstMatch(RULES.styleRules, lowered)?.style ?? RULES.defaultStyle,
    difficultyPreference: firstMatch(RULES.difficultyRules, lowered)?.difficulty ?? RULES.defaultDifficulty,
    preferredLanguage: firstMatch(RULES.languageRules, original)?.language ?? RULES.defaultLanguage,
  };
}

export function preferredFormatsFor(style: LearningStyle): string[] {
  return [...(RULES.preferredFormats[style] ?? [])];
}

/** Pure in (query, issuedAt). The result is never persisted. */
export function inferGuestProfile(query: string, issuedAt: number): GuestLearnerProfile {
  const traits = inferGuestTraits(query);
  const id = `guest_${issuedAt}`;

  return {
    id,
    sessionId: `guest_session_${id}`,
    guestSession: true,
    ...traits,
    metrics: { accuracyRate: 0.7, avgResponseTime: 15.0, completionRate: 0.8, totalSessions: 0 },
    interactionPatterns: {},
    struggles: [],
    masteredTopics: [],
    preferredExplanationStyles: [
      { style: traits.learningStyle.toLowerCase(), effectiveness: 0.9 },
      { style: "encouraging", effectiveness: 0.8 },
    ],
    preferredFormats: preferredFormatsFor(traits.learningStyle),
  };
}
