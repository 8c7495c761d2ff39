// backend/src/tutoring/explanationEngine.ts

import type { CompletionClient } from "../ai/clients";
import { buildExplanationPrompt } from "../ai/prompts/tutoringPrompts";
import { EXPLANATION_STYLES, type AnyLearnerProfile, type ExplanationStyle, type LearningStyle } from "../types";
import { logWarn } from "../utils/logger";

// scanned in order, first keyword found wins
const STYLE_KEYWORDS: [string, ExplanationStyle][] = [
  ["simple", "simplified"],
  ["easy", "simplified"],
  ["basic", "simplified"],
  ["detail", "detailed"],
  ["thorough", "detailed"],
  ["comprehensive", "detailed"],
  ["analogy", "analogy"],
  ["metaphor", "analogy"],
  ["step", "step-by-step"],
  ["sequential", "step-by-step"],
  ["visual", "visual"],
  ["picture", "visual"],
  ["diagram", "visual"],
  ["interactive", "interactive"],
  ["engaging", "interactive"],
  ["practical", "practical"],
  ["real-world", "practical"],
  ["hands-on", "practical"],
];

const LEARNING_STYLE_DEFAULTS: Partial<Record<LearningStyle, ExplanationStyle>> = {
  Visual: "visual",
  Kinesthetic: "practical",
  Auditory: "interactive",
};

export const GLOBAL_DEFAULT_STYLE: ExplanationStyle = "analogy";

export type ExplanationRequest = {
  topic: string;
  requestedStyle: ExplanationStyle | null;
};

function isExplanationStyle(value: string): value is ExplanationStyle {
  return EXPLANATION_STYLES.some((s) => s === value);
}

export function parseExplanationRequest(query: string): ExplanationRequest {
  const text = String(query || "").trim();
  const lowered = text.toLowerCase();
  const topic = text.replace(/^(please\s+)?(explain|describe|what is|how does|how do|tell me about)\s+/i, "").trim();
  const hit = STYLE_KEYWORDS.find(([keyword]) => lowered.includes(keyword));
  return { topic: topic || text, requestedStyle: hit ? hit[1] : null };
}

export function isStruggling(profile: AnyLearnerProfile): boolean {
  return profile.struggles.length > 0 || profile.difficultyPreference === "easy";
}

function gradeDefault(grade: number): ExplanationStyle | null {
  if (!Number.isFinite(grade) || grade <= 0) return null;
  if (grade <= 6) return "simplified";
  if (grade <= 9) return "analogy";
  return "detailed";
}

export type StyleDecision = {
  style: ExplanationStyle;
  reason: "requested" | "stored_preference" | "struggle" | "grade" | "learning_style" | "default";
};

/**
 * explicit request > stored preference > struggle > grade > learning style > default.
 * Each step only runs when every step before it produced nothing.
 */
export function selectExplanationStyle(profile: AnyLearnerProfile, requested: ExplanationStyle | null): StyleDecision {
  if (requested) return { style: requested, reason: "requested" };

  const stored = profile.preferredExplanationStyles.map((p) => p.style).find(isExplanationStyle);
  if (stored) return { style: stored, reason: "stored_preference" };

  if (isStruggling(profile)) return { style: "simplified", reason: "struggle" };

  const byGrade = gradeDefault(profile.gradeLevel);
  if (byGrade) return { style: byGrade, reason: "grade" };

  const byStyle = LEARNING_STYLE_DEFAULTS[profile.learningStyle];
  if (byStyle) return { style: byStyle, reason: "learning_style" };

  return { style: GLOBAL_DEFAULT_STYLE, reason: "default" };
}

function styleTitle(style: ExplanationStyle): string {
  return style
    .split("-")
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

export function formatExplanation(text: string, style: ExplanationStyle): string {
  let body = text.trim();
  if (style === "step-by-step" && !/^\d+\./m.test(body)) {
    let step = 0;
    body = body
      .split("\n")
      .map((line) => (line.trim() && !line.startsWith("*") ? `${++step}. ${line.trim()}` : line))
      .join("\n");
  }
  return `**${styleTitle(style)} Explanation:**\n\n${body}`;
}

export type ExplanationResult = {
  text: string;
  topic: string;
  style: ExplanationStyle;
  reason: StyleDecision["reason"];
  usedFallback: boolean;
};

export async function generateExplanation(
  query: string,
  profile: AnyLearnerProfile,
  deps: { completion: CompletionClient; groundingContext?: string | null }
): Promise<ExplanationResult> {
  const request = parseExplanationRequest(query);
  const decision = selectExplanationStyle(profile, request.requestedStyle);

  let raw = "";
  try {
    raw = await deps.completion.complete(
      buildExplanationPrompt({
        topic: request.topic,
        style: decision.style,
        profile,
        groundingContext: deps.groundingContext,
      }),
      { temperature: 0.4, maxOutputTokens: 700 }
    );
  } catch (err) {
    logWarn("explanation_generation_failed", err, { style: decision.style });
  }

  const usedFallback = !raw.trim();
  const body = usedFallback
    ? `I understand you want to learn about ${request.topic}. Let's work through it together in a way that suits how you learn.`
    : raw;

  return {
    text: formatExplanation(body, decision.style),
    topic: request.topic,
    style: decision.style,
    reason: decision.reason,
    usedFallback,
  };
}
