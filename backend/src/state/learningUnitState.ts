// backend/src/state/learningUnitState.ts

import { randomUUID } from "crypto";
import mongoose from "mongoose";

export type LearningUnitDoc = {
  _id: string;
  sourceDocumentId: string;
  subject: string;
  gradeLevel: string;
  title: string;
  subtopics: string[];
  detailedExplanation: string;
  keyPoints: string[];
  difficultyLevel: string;
  learningObjectives: string[];
  keywords: string[];
  adaptationApplied: boolean;
  createdAt: Date;
};

const LearningUnitSchema = new mongoose.Schema<LearningUnitDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    sourceDocumentId: { type: String, required: true, index: true },
    subject: { type: String, default: "General" },
    gradeLevel: { type: String, default: "12" },
    title: { type: String, required: true },
    subtopics: { type: [String], default: [] },
    detailedExplanation: { type: String, default: "" },
    // key points keep their order; position is the array index
    keyPoints: { type: [String], default: [] },
    difficultyLevel: { type: String, default: "medium" },
    learningObjectives: { type: [String], default: [] },
    keywords: { type: [String], default: [] },
    adaptationApplied: { type: Boolean, default: false },
    createdAt: { type: Date, default: () => new Date() },
  }
);

export const LearningUnitModel: mongoose.Model<LearningUnitDoc> =
  mongoose.models.LearningUnit ?? mongoose.model<LearningUnitDoc>("LearningUnit", LearningUnitSchema);
