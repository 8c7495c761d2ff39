// backend/src/state/documentState.ts

import { randomUUID } from "crypto";
import mongoose from "mongoose";
import type { Metadata } from "../types";

export type DocumentDoc = {
  _id: string;
  sessionId: string | null;
  title: string;
  content: string;
  pages: Map<string, string>;
  language: string;
  metadata: Metadata;
  createdAt: Date;
  updatedAt: Date;
};

const DocumentSchema = new mongoose.Schema<DocumentDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    sessionId: { type: String, default: null, index: true },
    title: { type: String, required: true },
    content: { type: String, required: true },
    pages: { type: Map, of: String, default: () => new Map() },
    language: { type: String, default: "en" },
    metadata: { type: mongoose.Schema.Types.Mixed, default: {} },
  },
  { timestamps: true, minimize: false }
);

DocumentSchema.index({ sessionId: 1, createdAt: -1 });

export const DocumentModel: mongoose.Model<DocumentDoc> =
  mongoose.models.Document ?? mongoose.model<DocumentDoc>("Document", DocumentSchema);
