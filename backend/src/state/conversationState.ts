// backend/src/state/conversationState.ts
// Router decisions, conversation turns and notes: append-mostly records.

import { randomUUID } from "crypto";
import mongoose from "mongoose";
import type { RouteName } from "../types";

export const ROUTE_NAMES: RouteName[] = ["qa", "summarization", "content_agent", "tutor_agent"];

export type RouterDecisionDoc = {
  _id: string;
  query: string;
  route: RouteName;
  createdAt: Date;
};

const RouterDecisionSchema = new mongoose.Schema<RouterDecisionDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    query: { type: String, required: true },
    route: { type: String, enum: ROUTE_NAMES, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

export type ConversationTurnDoc = {
  _id: string;
  sessionId: string | null;
  query: string;
  answer: string;
  createdAt: Date;
};

const ConversationTurnSchema = new mongoose.Schema<ConversationTurnDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    sessionId: { type: String, default: null },
    query: { type: String, required: true },
    answer: { type: String, default: "" },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

ConversationTurnSchema.index({ sessionId: 1, createdAt: 1 });

export type NoteDoc = {
  _id: string;
  sessionId: string;
  documentId: string | null;
  content: string;
  page: number | null;
  createdAt: Date;
};

const NoteSchema = new mongoose.Schema<NoteDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    sessionId: { type: String, required: true, index: true },
    documentId: { type: String, default: null },
    content: { type: String, required: true },
    page: { type: Number, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

export const RouterDecisionModel: mongoose.Model<RouterDecisionDoc> =
  mongoose.models.RouterDecision ?? mongoose.model<RouterDecisionDoc>("RouterDecision", RouterDecisionSchema);

export const ConversationTurnModel: mongoose.Model<ConversationTurnDoc> =
  mongoose.models.ConversationTurn ?? mongoose.model<ConversationTurnDoc>("ConversationTurn", ConversationTurnSchema);

export const NoteModel: mongoose.Model<NoteDoc> = mongoose.models.Note ?? mongoose.model<NoteDoc>("Note", NoteSchema);
