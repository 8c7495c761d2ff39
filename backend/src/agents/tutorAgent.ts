// backend/src/agents/tutorAgent.ts

import type { CompletionClient } from "../ai/clients";
import { generateExplanation, type ExplanationResult } from "../tutoring/explanationEngine";
import { inferGuestProfile } from "../tutoring/guestProfile";
import {
  applyInteraction,
  emptySessionState,
  logInteraction,
  summarizeInteraction,
  type InteractionLoggerDeps,
} from "../tutoring/interactionLogger";
import { generatePractice, type PracticeResult } from "../tutoring/practiceGenerator";
import { guestSessionMessage, type SessionManager } from "../tutoring/sessionManager";
import type { GuestLearnerProfile, LearnerProfile, LearningProgress } from "../types";
import { logInfo } from "../utils/logger";

export type TutorMode = "explanation" | "practice";

const PRACTICE_CUES = ["practice", "quiz", "exercise", "problems", "flashcard", "test me", "assessment", "worksheet"];

export function detectTutorMode(query: string): TutorMode {
  const lowered = query.toLowerCase();
  return PRACTICE_CUES.some((c) => lowered.includes(c)) ? "practice" : "explanation";
}

export type TutorRequest = {
  query: string;
  learnerId: string | null;
  topic?: string | null;
  groundingContext?: string | null;
  requestId?: string;
};

type TutorOutput = {
  status: "ok";
  response: string;
  mode: TutorMode;
  sessionId: string;
  learningProgress: LearningProgress;
  explanation: ExplanationResult | null;
  practice: PracticeResult | null;
};

export type TutorResult =
  | (TutorOutput & { guestSession: true; profile: GuestLearnerProfile; notice: string })
  | (TutorOutput & { guestSession: false; profile: LearnerProfile; notice: string | null })
  | { status: "error"; message: string };

export type TutorAgentDeps = {
  completion: CompletionClient;
  sessions: SessionManager;
  logger: InteractionLoggerDeps;
  clock?: () => number;
};

export function createTutorAgent(deps: TutorAgentDeps) {
  const clock = deps.clock ?? (() => Date.now());

  async function produce(query: string, profile: GuestLearnerProfile | LearnerProfile, groundingContext: string | null) {
    const mode = detectTutorMode(query);
    if (mode === "practice") {
      const practice = await generatePractice(query, profile, deps);
      return { mode, text: practice.text, explanation: null, practice };
    }
    const explanation = await generateExplanation(query, profile, { completion: deps.completion, groundingContext });
    return { mode, text: explanation.text, explanation, practice: null };
  }

  /**
   * Guest when no learner id is present: a profile is inferred from the
   * query and the whole exchange lives only in this call.
   */
  async function handle(req: TutorRequest): Promise<TutorResult> {
    const grounding = req.groundingContext ?? null;

    if (!req.learnerId) {
      const issuedAt = clock();
      const profile = inferGuestProfile(req.query, issuedAt);
      const out = await produce(req.query, profile, grounding);
      const state = applyInteraction(
        emptySessionState(),
        summarizeInteraction(`${profile.sessionId}_1`, { type: out.mode, query: req.query, response: out.text }, new Date(issuedAt).toISOString())
      );
      logInfo("tutor_guest_turn", { requestId: req.requestId, mode: out.mode, grade: profile.gradeLevel });
      return {
        status: "ok",
        guestSession: true,
        profile,
        notice: guestSessionMessage("start", profile),
        response: out.text,
        mode: out.mode,
        sessionId: profile.sessionId,
        learningProgress: state.learningProgress,
        explanation: out.explanation,
        practice: out.practice,
      };
    }

    const opened = await deps.sessions.resume(req.learnerId, req.topic ?? null);
    if (opened.status === "error") return { status: "error", message: opened.message };

    const out = await produce(req.query, opened.profile, grounding);
    const logged = await logInteraction(deps.logger, opened.session, {
      type: out.mode,
      query: req.query,
      response: out.text,
      metadata: out.explanation
        ? { style: out.explanation.style, styleReason: out.explanation.reason }
        : { difficulty: out.practice?.difficulty, practiceType: out.practice?.practiceType },
    });

    return {
      status: "ok",
      guestSession: false,
      profile: opened.profile,
      notice: opened.endedPrevious ? "Your previous tutoring session was closed and a new one started." : null,
      response: out.text,
      mode: out.mode,
      sessionId: logged.session.id,
      learningProgress: logged.session.sessionState.learningProgress,
      explanation: out.explanation,
      practice: out.practice,
    };
  }

  return { handle };
}

export type TutorAgent = ReturnType<typeof createTutorAgent>;
