// backend/src/storage/conversationStore.ts

import { requireMongo } from "../db/mongo";
import {
  ConversationTurnModel,
  NoteModel,
  RouterDecisionModel,
  type ConversationTurnDoc,
  type NoteDoc,
} from "../state/conversationState";
import type { ConversationStore, ConversationTurnRecord, NoteRecord, NoteStore, RouterDecisionStore } from "../types";

function toTurn(doc: ConversationTurnDoc): ConversationTurnRecord {
  return { id: doc._id, sessionId: doc.sessionId ?? null, query: doc.query, answer: doc.answer, createdAt: doc.createdAt };
}

function toNote(doc: NoteDoc): NoteRecord {
  return {
    id: doc._id,
    sessionId: doc.sessionId,
    documentId: doc.documentId ?? null,
    content: doc.content,
    page: doc.page ?? null,
    createdAt: doc.createdAt,
  };
}

export const mongoRouterDecisionStore: RouterDecisionStore = {
  async append(query, route) {
    requireMongo();
    const created = await RouterDecisionModel.create({ query, route });
    return { id: created._id, query: created.query, route: created.route, createdAt: created.createdAt };
  },
};

export const mongoConversationStore: ConversationStore = {
  async append(turn) {
    requireMongo();
    const created = await ConversationTurnModel.create(turn);
    return toTurn(created.toObject());
  },

  async listBySession(sessionId, { limit, offset }) {
    requireMongo();
    const [docs, total] = await Promise.all([
      ConversationTurnModel.find({ sessionId }, undefined, { sort: { createdAt: 1 }, skip: offset, limit }).lean<
        ConversationTurnDoc[]
      >(),
      ConversationTurnModel.countDocuments({ sessionId }),
    ]);
    return { turns: docs.map(toTurn), total };
  },
};

export const mongoNoteStore: NoteStore = {
  async create(note) {
    requireMongo();
    const created = await NoteModel.create(note);
    return toNote(created.toObject());
  },

  async list(sessionId, page) {
    requireMongo();
    const query: Record<string, unknown> = { sessionId };
    if (typeof page === "number") query.page = page;
    const docs = await NoteModel.find(query, undefined, { sort: { createdAt: 1 } }).lean<NoteDoc[]>();
    return docs.map(toNote);
  },
};
