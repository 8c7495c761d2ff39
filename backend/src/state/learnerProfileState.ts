// backend/src/state/learnerProfileState.ts

import { randomUUID } from "crypto";
import mongoose from "mongoose";
import {
  DIFFICULTY_PREFERENCES,
  LEARNING_STYLES,
  type DifficultyPreference,
  type ExplanationStylePreference,
  type LearningStyle,
  type PerformanceMetrics,
  type Struggle,
} from "../types";

export type LearnerProfileDoc = {
  _id: string;
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
  createdAt: Date;
  updatedAt: Date;
};

const MetricsSchema = new mongoose.Schema<PerformanceMetrics>(
  {
    accuracyRate: { type: Number, default: 0 },
    avgResponseTime: { type: Number, default: 0 },
    completionRate: { type: Number, default: 0 },
    totalSessions: { type: Number, default: 0 },
  },
  { _id: false }
);

const StruggleSchema = new mongoose.Schema<Struggle>(
  {
    topic: { type: String, required: true },
    type: { type: String, required: true },
    timestamp: { type: String, required: true },
  },
  { _id: false }
);

const StylePreferenceSchema = new mongoose.Schema<ExplanationStylePreference>(
  {
    style: { type: String, required: true },
    effectiveness: { type: Number, default: 0.5 },
  },
  { _id: false }
);

const LearnerProfileSchema = new mongoose.Schema<LearnerProfileDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    gradeLevel: { type: Number, default: 0 },
    learningStyle: { type: String, enum: LEARNING_STYLES, default: "Mixed" },
    preferredLanguage: { type: String, default: "English" },
    difficultyPreference: { type: String, enum: DIFFICULTY_PREFERENCES, default: "medium" },
    metrics: { type: MetricsSchema, default: () => ({}) },
    interactionPatterns: { type: mongoose.Schema.Types.Mixed, default: {} },
    struggles: { type: [StruggleSchema], default: [] },
    masteredTopics: { type: [String], default: [] },
    preferredExplanationStyles: { type: [StylePreferenceSchema], default: [] },
    preferredFormats: { type: [String], default: [] },
  },
  { timestamps: true, minimize: false }
);

export const LearnerProfileModel: mongoose.Model<LearnerProfileDoc> =
  mongoose.models.LearnerProfile ?? mongoose.model<LearnerProfileDoc>("LearnerProfile", LearnerProfileSchema);
