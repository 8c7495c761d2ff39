// backend/src/storage/sessionStore.ts

import { requireMongo } from "../db/mongo";
import { SessionModel, type SessionDoc } from "../state/sessionState";
import type { CursorStore, Metadata, SessionRecord, SessionStore } from "../types";

function toRecord(doc: SessionDoc): SessionRecord {
  return {
    id: doc._id,
    metadata: doc.metadata ?? {},
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export const mongoSessionStore: SessionStore = {
  async create(metadata: Metadata = {}) {
    requireMongo();
    const created = await SessionModel.create({ metadata });
    return toRecord(created.toObject());
  },

  async get(id) {
    requireMongo();
    const doc = await SessionModel.findById(id).lean<SessionDoc>();
    return doc ? toRecord(doc) : null;
  },

  async patchMetadata(id, patch) {
    requireMongo();
    const set: Record<string, unknown> = { updatedAt: new Date() };
    for (const [key, value] of Object.entries(patch)) {
      // keys are client supplied; keep them off Mongo's dot-path syntax
      set[`metadata.${key.replace(/[.$]/g, "_")}`] = value;
    }
    const doc = await SessionModel.findByIdAndUpdate(id, { $set: set }, { new: true }).lean<SessionDoc>();
    return doc ? toRecord(doc) : null;
  },
};

/** Cursor is a field on the Session document; it belongs to whichever document was opened last. */
export const mongoCursorStore: CursorStore = {
  async get({ sessionId, documentId }) {
    requireMongo();
    const doc = await SessionModel.findById(sessionId, { cursor: 1 }).lean<Pick<SessionDoc, "_id" | "cursor">>();
    if (!doc?.cursor || doc.cursor.documentId !== documentId) return null;
    return doc.cursor.page;
  },

  async set({ sessionId, documentId }, page) {
    requireMongo();
    await SessionModel.updateOne({ _id: sessionId }, { $set: { cursor: { documentId, page } } });
  },

  async clear(sessionId) {
    requireMongo();
    await SessionModel.updateOne({ _id: sessionId }, { $set: { cursor: null } });
  },
};
