// backend/src/storage/learnerProfileStore.ts

import { requireMongo } from "../db/mongo";
import { LearnerProfileModel, type LearnerProfileDoc } from "../state/learnerProfileState";
import type { LearnerProfile, LearnerProfileStore } from "../types";

function toProfile(doc: LearnerProfileDoc): LearnerProfile {
  return {
    id: doc._id,
    gradeLevel: doc.gradeLevel,
    learningStyle: doc.learningStyle,
    preferredLanguage: doc.preferredLanguage,
    difficultyPreference: doc.difficultyPreference,
    metrics: {
      accuracyRate: doc.metrics?.accuracyRate ?? 0,
      avgResponseTime: doc.metrics?.avgResponseTime ?? 0,
      completionRate: doc.metrics?.completionRate ?? 0,
      totalSessions: doc.metrics?.totalSessions ?? 0,
    },
    interactionPatterns: doc.interactionPatterns ?? {},
    struggles: doc.struggles ?? [],
    masteredTopics: doc.masteredTopics ?? [],
    preferredExplanationStyles: doc.preferredExplanationStyles ?? [],
    preferredFormats: doc.preferredFormats ?? [],
    guestSession: false,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export const mongoLearnerProfileStore: LearnerProfileStore = {
  async get(id) {
    requireMongo();
    const doc = await LearnerProfileModel.findById(id).lean<LearnerProfileDoc>();
    return doc ? toProfile(doc) : null;
  },

  async create(data) {
    requireMongo();
    const created = await LearnerProfileModel.create(data);
    return toProfile(created.toObject());
  },

  async update(id, data) {
    requireMongo();
    const fields = {
      gradeLevel: data.gradeLevel,
      learningStyle: data.learningStyle,
      preferredLanguage: data.preferredLanguage,
      difficultyPreference: data.difficultyPreference,
      metrics: data.metrics,
      interactionPatterns: data.interactionPatterns,
      struggles: data.struggles,
      masteredTopics: data.masteredTopics,
      preferredExplanationStyles: data.preferredExplanationStyles,
      preferredFormats: data.preferredFormats,
    };
    const doc = await LearnerProfileModel.findByIdAndUpdate(id, { $set: fields }, { new: true }).lean<LearnerProfileDoc>();
    return doc ? toProfile(doc) : null;
  },
};
