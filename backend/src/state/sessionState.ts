// backend/src/state/sessionState.ts

import { randomUUID } from "crypto";
import mongoose from "mongoose";
import type { Metadata } from "../types";

export type SessionCursor = { documentId: string; page: number };

export type SessionDoc = {
  _id: string;
  metadata: Metadata;
  /** pagination cursor for the document the session has open */
  cursor: SessionCursor | null;
  createdAt: Date;
  updatedAt: Date;
};

const CursorSchema = new mongoose.Schema<SessionCursor>(
  {
    documentId: { type: String, required: true },
    page: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

const SessionSchema = new mongoose.Schema<SessionDoc>(
  {
    _id: { type: String, default: () => randomUUID() },
    metadata: { type: mongoose.Schema.Types.Mixed, default: {} },
    cursor: { type: CursorSchema, default: null },
  },
  { timestamps: true, minimize: false }
);

export const SessionModel: mongoose.Model<SessionDoc> =
  mongoose.models.Session ?? mongoose.model<SessionDoc>("Session", SessionSchema);
