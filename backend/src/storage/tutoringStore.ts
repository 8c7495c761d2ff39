// backend/src/storage/tutoringStore.ts

import { requireMongo } from "../db/mongo";
import {
  LearnerInteractionModel,
  TutoringSessionModel,
  type LearnerInteractionDoc,
  type TutoringSessionDoc,
} from "../state/tutoringState";
import type { InteractionStore, LearnerInteractionRecord, TutoringSessionRecord, TutoringSessionStore } from "../types";

function toSession(doc: TutoringSessionDoc): TutoringSessionRecord {
  return {
    id: doc._id,
    learnerId: doc.learnerId,
    currentTopic: doc.currentTopic ?? null,
    sessionState: doc.sessionState,
    interactionHistory: doc.interactionHistory ?? [],
    isActive: doc.isActive,
    startedAt: doc.startedAt,
    endedAt: doc.endedAt ?? null,
    performanceSummary: doc.performanceSummary ?? null,
  };
}

function toInteraction(doc: LearnerInteractionDoc): LearnerInteractionRecord {
  return {
    id: doc._id,
    sessionId: doc.sessionId,
    interactionType: doc.interactionType,
    queryText: doc.queryText,
    responseText: doc.responseText,
    wasHelpful: doc.wasHelpful ?? null,
    difficultyRating: doc.difficultyRating ?? null,
    responseTimeSeconds: doc.responseTimeSeconds ?? null,
    adaptationRequested: doc.adaptationRequested,
    metadata: doc.metadata ?? {},
    createdAt: doc.createdAt,
  };
}

export const mongoTutoringSessionStore: TutoringSessionStore = {
  async findActive(learnerId) {
    requireMongo();
    const doc = await TutoringSessionModel.findOne({ learnerId, isActive: true }).lean<TutoringSessionDoc>();
    return doc ? toSession(doc) : null;
  },

  async create(session) {
    requireMongo();
    const created = await TutoringSessionModel.create(session);
    return toSession(created.toObject());
  },

  async save(session) {
    requireMongo();
    const { id, ...fields } = session;
    await TutoringSessionModel.updateOne({ _id: id }, { $set: fields });
  },
};

export const mongoInteractionStore: InteractionStore = {
  async append(interaction) {
    requireMongo();
    const created = await LearnerInteractionModel.create(interaction);
    return toInteraction(created.toObject());
  },
};
