// backend/src/state/tutoringState.ts

import { randomUUID } from "crypto";
import mongoose from "mongoose";
import {
  INTERACTION_TYPES,
  type InteractionType,
  type PerformanceSummary,
  type TutoringSessionState,
} from "../types";

export type TutoringSessionDoc = {
  _id: string;
  learnerId: string;
  currentTopic: string | null;
  sessionState: TutoringSessionState;
  interactionHistory: string[];
  isActive: boolean;
  startedAt: Date;
  endedAt: Date | null;
  performanceSummary: PerformanceSummary | null;
};

const TutoringSessionSchema = new mongoose.Schema<TutoringSessionDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    learnerId: { type: String, required: true },
    currentTopic: { type: String, default: null },
    sessionState: { type: mongoose.Schema.Types.Mixed, required: true },
    interactionHistory: { type: [String], default: [] },
    isActive: { type: Boolean, default: true },
    startedAt: { type: Date, required: true },
    endedAt: { type: Date, default: null },
    performanceSummary: { type: mongoose.Schema.Types.Mixed, default: null },
  },
  { minimize: false }
);

// at most one active session per learner
TutoringSessionSchema.index(
  { learnerId: 1 },
  { unique: true, partialFilterExpression: { isActive: true } }
);

export type LearnerInteractionDoc = {
  _id: string;
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

const LearnerInteractionSchema = new mongoose.Schema<LearnerInteractionDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    sessionId: { type: String, required: true, index: true },
    interactionType: { type: String, enum: INTERACTION_TYPES, required: true },
    queryText: { type: String, required: true },
    responseText: { type: String, default: "" },
    wasHelpful: { type: Boolean, default: null },
    difficultyRating: { type: Number, default: null, min: 1, max: 5 },
    responseTimeSeconds: { type: Number, default: null },
    adaptationRequested: { type: Boolean, default: false },
    metadata: { type: mongoose.Schema.Types.Mixed, default: {} },
  },
  { timestamps: { createdAt: true, updatedAt: false }, minimize: false }
);

export const TutoringSessionModel: mongoose.Model<TutoringSessionDoc> =
  mongoose.models.TutoringSession ?? mongoose.model<TutoringSessionDoc>("TutoringSession", TutoringSessionSchema);

export const LearnerInteractionModel: mongoose.Model<LearnerInteractionDoc> =
  mongoose.models.LearnerInteraction ??
  mongoose.model<LearnerInteractionDoc>("LearnerInteraction", LearnerInteractionSchema);
