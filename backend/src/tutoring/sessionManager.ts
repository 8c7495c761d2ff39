// backend/src/tutoring/sessionManager.ts

import type {
  GuestLearnerProfile,
  LearnerProfile,
  LearnerProfileStore,
  LearningProgress,
  PerformanceSummary,
  SessionEndedBy,
  TutoringSessionRecord,
  TutoringSessionStore,
} from "../types";
import { logInfo } from "../utils/logger";
import { emptyProgress, emptySessionState } from "./interactionLogger";

export type SessionManagerDeps = {
  profiles: LearnerProfileStore;
  sessions: TutoringSessionStore;
  now?: () => Date;
};

export type SessionOutcome =
  | { status: "ok"; session: TutoringSessionRecord; profile: LearnerProfile; endedPrevious: TutoringSessionRecord | null }
  | { status: "error"; message: string };

type ClosedSession = { status: "ok"; session: TutoringSessionRecord; summary: PerformanceSummary };

export type EndOutcome = ClosedSession | { status: "error"; message: string };

export type SessionContext =
  | {
      status: "ok";
      profile: LearnerProfile;
      activeSession: TutoringSessionRecord | null;
      learningProgress: LearningProgress;
    }
  | { status: "error"; message: string };

export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  return `${Math.floor(totalSeconds / 60)}min ${totalSeconds % 60}s`;
}

export function buildPerformanceSummary(
  session: TutoringSessionRecord,
  endedBy: SessionEndedBy,
  endedAt: Date
): PerformanceSummary {
  const progress = session.sessionState.learningProgress;
  return {
    sessionEndedAt: endedAt.toISOString(),
    endedBy,
    duration: formatDuration(endedAt.getTime() - session.startedAt.getTime()),
    totalInteractions: progress.totalInteractions,
    interactionTypes: { ...progress.counts },
    learningProgress: progress,
  };
}

const PROFILE_MISSING = "Learner profile not found. Create a profile before starting a tutoring session.";

/**
 * none -> active -> ended. At most one active session per learner: starting
 * ends the current one first with endedBy "new_session_started".
 */
export function createSessionManager(deps: SessionManagerDeps) {
  const now = deps.now ?? (() => new Date());

  async function close(session: TutoringSessionRecord, endedBy: SessionEndedBy): Promise<ClosedSession> {
    const endedAt = now();
    const summary = buildPerformanceSummary(session, endedBy, endedAt);
    const ended: TutoringSessionRecord = { ...session, isActive: false, endedAt, performanceSummary: summary };
    await deps.sessions.save(ended);
    logInfo("tutoring_session_ended", { sessionId: session.id, endedBy, interactions: summary.totalInteractions });
    return { status: "ok", session: ended, summary };
  }

  async function start(learnerId: string, topic: string | null = null): Promise<SessionOutcome> {
    const profile = await deps.profiles.get(learnerId);
    if (!profile) return { status: "error", message: PROFILE_MISSING };

    const active = await deps.sessions.findActive(learnerId);
    let endedPrevious: TutoringSessionRecord | null = null;
    if (active) {
      endedPrevious = (await close(active, "new_session_started")).session;
    }

    const session = await deps.sessions.create({
      learnerId,
      currentTopic: topic,
      sessionState: emptySessionState(),
      interactionHistory: [],
      isActive: true,
      startedAt: now(),
      endedAt: null,
      performanceSummary: null,
    });
    logInfo("tutoring_session_started", { sessionId: session.id, learnerId });
    return { status: "ok", session, profile, endedPrevious };
  }

  /** Resumes the active session, starting one when there is none. */
  async function resume(learnerId: string, topic: string | null = null): Promise<SessionOutcome> {
    const profile = await deps.profiles.get(learnerId);
    if (!profile) return { status: "error", message: PROFILE_MISSING };

    const active = await deps.sessions.findActive(learnerId);
    if (!active) return start(learnerId, topic);

    if (topic && topic !== active.currentTopic) {
      const moved = { ...active, currentTopic: topic };
      await deps.sessions.save(moved);
      return { status: "ok", session: moved, profile, endedPrevious: null };
    }
    return { status: "ok", session: active, profile, endedPrevious: null };
  }

  async function end(learnerId: string, endedBy: SessionEndedBy = "learner"): Promise<EndOutcome> {
    const active = await deps.sessions.findActive(learnerId);
    if (!active) return { status: "error", message: "No active tutoring session to end." };
    return close(active, endedBy);
  }

  async function loadContext(learnerId: string): Promise<SessionContext> {
    const profile = await deps.profiles.get(learnerId);
    if (!profile) return { status: "error", message: PROFILE_MISSING };
    const activeSession = await deps.sessions.findActive(learnerId);
    return {
      status: "ok",
      profile,
      activeSession,
      learningProgress: activeSession?.sessionState.learningProgress ?? emptyProgress(),
    };
  }

  return { start, resume, end, loadContext };
}

export type SessionManager = ReturnType<typeof createSessionManager>;

export type SessionAction = "start" | "continue" | "end" | "load_context";

/** Guests have no stored transitions: every action just answers in words. */
export function guestSessionMessage(action: SessionAction, profile: GuestLearnerProfile): string {
  switch (action) {
    case "start":
      return (
        "Welcome to your tutoring session! I've created a personalized learning profile based on your query. " +
        `Grade level: ${profile.gradeLevel}, Learning style: ${profile.learningStyle}, ` +
        `Difficulty: ${profile.difficultyPreference}. Let's start learning together!`
      );
    case "continue":
      return "Let's keep going! Ask me anything about the topic, or request practice when you're ready.";
    case "end":
      return "Thanks for learning with me! Guest sessions aren't saved, so create a profile to track your progress.";
    case "load_context":
      return `You're in a guest session tailored for grade ${profile.gradeLevel} with a ${profile.learningStyle} learning style.`;
  }
}
