// backend/src/tutoring/interactionLogger.ts

import {
  INTERACTION_TYPES,
  type InteractionStore,
  type InteractionSummary,
  type InteractionType,
  type LearnerInteractionRecord,
  type LearningProgress,
  type TutoringSessionRecord,
  type TutoringSessionState,
  type TutoringSessionStore,
} from "../types";
import { logWarn } from "../utils/logger";
import { truncate } from "../utils/text";

const HISTORY_LIMIT = 50;
const RATINGS_LIMIT = 20;
const SUMMARY_TEXT_LIMIT = 200;

export function emptyProgress(): LearningProgress {
  return { counts: {}, totalInteractions: 0, lastInteraction: null, difficultyRatings: [] };
}

export function emptySessionState(): TutoringSessionState {
  return { history: [], learningProgress: emptyProgress() };
}

export function toInteractionType(value: unknown): InteractionType {
  return INTERACTION_TYPES.find((t) => t === value) ?? "question";
}

/** Integer ratings 1..5 only; anything else is dropped. */
export function validRating(value: unknown): number | null {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 5 ? value : null;
}

export type InteractionInput = {
  type: InteractionType;
  query: string;
  response: string;
  wasHelpful?: boolean | null;
  difficultyRating?: number | null;
  responseTimeSeconds?: number | null;
  adaptationRequested?: boolean;
  metadata?: Record<string, unknown>;
};

/** Pure: folds one interaction into the session state's history and counters. */
export function applyInteraction(state: TutoringSessionState, summary: InteractionSummary): TutoringSessionState {
  const prev = state.learningProgress;
  const ratings =
    summary.difficultyRating !== null
      ? [...prev.difficultyRatings, summary.difficultyRating].slice(-RATINGS_LIMIT)
      : prev.difficultyRatings;

  return {
    history: [...state.history, summary].slice(-HISTORY_LIMIT),
    learningProgress: {
      counts: { ...prev.counts, [summary.type]: (prev.counts[summary.type] ?? 0) + 1 },
      totalInteractions: prev.totalInteractions + 1,
      lastInteraction: summary.timestamp,
      difficultyRatings: ratings,
    },
  };
}

export function summarizeInteraction(
  interactionId: string,
  input: InteractionInput,
  timestamp: string
): InteractionSummary {
  return {
    interactionId,
    type: input.type,
    query: truncate(input.query, SUMMARY_TEXT_LIMIT),
    response: truncate(input.response, SUMMARY_TEXT_LIMIT),
    timestamp,
    wasHelpful: input.wasHelpful ?? null,
    difficultyRating: validRating(input.difficultyRating),
  };
}

export type InteractionLoggerDeps = {
  interactions: InteractionStore;
  sessions: TutoringSessionStore;
  now?: () => Date;
};

/**
 * Appends the interaction and folds it into the session state. Best-effort:
 * a storage failure is logged and the unchanged session is returned.
 */
export async function logInteraction(
  deps: InteractionLoggerDeps,
  session: TutoringSessionRecord,
  input: InteractionInput
): Promise<{ session: TutoringSessionRecord; interaction: LearnerInteractionRecord | null }> {
  try {
    const interaction = await deps.interactions.append({
      sessionId: session.id,
      interactionType: input.type,
      queryText: input.query,
      responseText: input.response,
      wasHelpful: input.wasHelpful ?? null,
      difficultyRating: validRating(input.difficultyRating),
      responseTimeSeconds: input.responseTimeSeconds ?? null,
      adaptationRequested: input.adaptationRequested ?? false,
      metadata: input.metadata ?? {},
    });

    const timestamp = (deps.now?.() ?? interaction.createdAt).toISOString();
    const updated: TutoringSessionRecord = {
      ...session,
      sessionState: applyInteraction(session.sessionState, summarizeInteraction(interaction.id, input, timestamp)),
      interactionHistory: [...session.interactionHistory, interaction.id],
    };
    await deps.sessions.save(updated);
    return { session: updated, interaction };
  } catch (err) {
    logWarn("interaction_log_failed", err, { sessionId: session.id, type: input.type });
    return { session, interaction: null };
  }
}
