// backend/src/types/tutoring.ts

export const LEARNING_STYLES = ["Visual", "Auditory", "Kinesthetic", "Analytical", "Creative", "Mixed"] as const;
export type LearningStyle = (typeof LEARNING_STYLES)[number];

export const DIFFICULTY_PREFERENCES = ["easy", "medium", "challenging"] as const;
export type DifficultyPreference = (typeof DIFFICULTY_PREFERENCES)[number];

export const INTERACTION_TYPES = ["question", "explanation", "practice", "assessment", "hint", "feedback"] as const;
export type InteractionType = (typeof INTERACTION_TYPES)[number];

export const EXPLANATION_STYLES = [
  "simplified",
  "detailed",
  "analogy",
  "step-by-step",
  "visual",
  "interactive",
  "practical",
] as const;
export type ExplanationStyle = (typeof EXPLANATION_STYLES)[number];

export const PRACTICE_TYPES = ["problems", "quiz", "exercises", "assessment", "flashcards"] as const;
export type PracticeType = (typeof PRACTICE_TYPES)[number];

export type PracticeDifficulty = "easy" | "medium" | "hard";

export type PerformanceMetrics = {
  accuracyRate: number;
  avgResponseTime: number;
  completionRate: number;
  totalSessions: number;
};

export type Struggle = {
  topic: string;
  type: string;
  timestamp: string;
};

export type ExplanationStylePreference = {
  style: string;
  effectiveness: number;
};

export type LearnerProfileData = {
  id: string;
  gradeLevel: number;
  learningStyle: LearningStyle;
  preferredLanguage: string;
  difficultyPreference: DifficultyPreference;
  metrics: PerformanceMetrics;
  interactionPatterns: Record<string, unknown>;
  struggles: Struggle[];
  masteredTopics: string[];
  preferredExplanationStyles: ExplanationStylePreference[];
  preferredFormats: string[];
};

export type LearnerProfile = LearnerProfileData & {
  guestSession: false;
  createdAt: Date;
  updatedAt: Date;
};

/** Built per anonymous request from the query wording; never stored. */
export type GuestLearnerProfile = LearnerProfileData & {
  guestSession: true;
  sessionId: string;
};

export type AnyLearnerProfile = LearnerProfile | GuestLearnerProfile;

export type InteractionSummary = {
  interactionId: string;
  type: InteractionType;
  query: string;
  response: string;
  timestamp: string;
  wasHelpful: boolean | null;
  difficultyRating: number | null;
};

export type LearningProgress = {
  counts: Partial<Record<InteractionType, number>>;
  totalInteractions: number;
  lastInteraction: string | null;
  difficultyRatings: number[];
};

export type TutoringSessionState = {
  history: InteractionSummary[];
  learningProgress: LearningProgress;
};

export type SessionEndedBy = "new_session_started" | "learner" | "session_manager";

export type PerformanceSummary = {
  sessionEndedAt: string;
  endedBy: SessionEndedBy;
  duration: string;
  totalInteractions: number;
  interactionTypes: Partial<Record<InteractionType, number>>;
  learningProgress: LearningProgress;
};

export type TutoringSessionRecord = {
  id: string;
  learnerId: string;
  currentTopic: string | null;
  sessionState: TutoringSessionState;
  interactionHistory: string[];
  isActive: boolean;
  startedAt: Date;
  endedAt: Date | null;
  performanceSummary: PerformanceSummary | null;
};

export type LearnerInteractionRecord = {
  id: string;
  sessionId: string;
  interactionType: InteractionType;
  queryText: string;
  responseText: string;
  wasHelpful: boolean | null;
  difficultyRating: number | null;
  responseTimeSeconds: number | null;
  adaptationRequested: boolean;
  metadata: Record<string, unknown>;
  createdAt: Date;
};
