// backend/src/tutoring/learnerModel.ts

import type {
  DifficultyPreference,
  LearnerProfile,
  LearnerProfileData,
  LearnerProfileStore,
  LearningStyle,
} from "../types";

export type LearnerModelUpdate =
  | {
      kind: "performance";
      accuracy?: number;
      responseTimeSeconds?: number;
      completed?: boolean;
    }
  | { kind: "mastered_topic"; topic: string }
  | { kind: "struggle"; topic: string; type: string }
  | {
      kind: "preferences";
      gradeLevel?: number;
      learningStyle?: LearningStyle;
      preferredLanguage?: string;
      difficultyPreference?: DifficultyPreference;
    };

function runningAverage(old: number, n: number, next: number): number {
  return (old * n + next) / (n + 1);
}

/** Pure. Metrics move by incremental averages over totalSessions, never by overwrite. */
export function applyLearnerUpdate(
  profile: LearnerProfileData,
  update: LearnerModelUpdate,
  now: Date = new Date()
): LearnerProfileData {
  switch (update.kind) {
    case "performance": {
      const m = profile.metrics;
      const n = m.totalSessions;
      return {
        ...profile,
        metrics: {
          accuracyRate: typeof update.accuracy === "number" ? runningAverage(m.accuracyRate, n, update.accuracy) : m.accuracyRate,
          avgResponseTime:
            typeof update.responseTimeSeconds === "number"
              ? runningAverage(m.avgResponseTime, n, update.responseTimeSeconds)
              : m.avgResponseTime,
          completionRate:
            typeof update.completed === "boolean"
              ? runningAverage(m.completionRate, n, update.completed ? 1 : 0)
              : m.completionRate,
          totalSessions: update.completed ? n + 1 : n,
        },
      };
    }
    case "mastered_topic": {
      const topic = update.topic.trim();
      if (!topic || profile.masteredTopics.includes(topic)) return profile;
      return { ...profile, masteredTopics: [...profile.masteredTopics, topic] };
    }
    case "struggle":
      return {
        ...profile,
        struggles: [...profile.struggles, { topic: update.topic, type: update.type, timestamp: now.toISOString() }],
      };
    case "preferences":
      return {
        ...profile,
        gradeLevel: update.gradeLevel ?? profile.gradeLevel,
        learningStyle: update.learningStyle ?? profile.learningStyle,
        preferredLanguage: update.preferredLanguage ?? profile.preferredLanguage,
        difficultyPreference: update.difficultyPreference ?? profile.difficultyPreference,
      };
  }
}

export async function updateLearnerModel(
  store: LearnerProfileStore,
  learnerId: string,
  update: LearnerModelUpdate
): Promise<LearnerProfile | null> {
  const profile = await store.get(learnerId);
  if (!profile) return null;
  return store.update(learnerId, applyLearnerUpdate(profile, update));
}
