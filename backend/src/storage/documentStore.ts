// backend/src/storage/documentStore.ts

import { requireMongo } from "../db/mongo";
import { rankByCosineDistance } from "../rag/vectorMath";
import { ChunkModel, type ChunkDoc } from "../state/chunkState";
import { DocumentModel, type DocumentDoc } from "../state/documentState";
import type { ChunkStore, DocumentRecord, DocumentStore } from "../types";
import { mapLikeToRecord, type MapLike } from "../utils/mapLike";

type DocumentShape = Omit<DocumentDoc, "pages"> & { pages: MapLike<string> };

function toRecord(doc: DocumentShape): DocumentRecord {
  return {
    id: doc._id,
    sessionId: doc.sessionId ?? null,
    title: doc.title,
    content: doc.content,
    pages: mapLikeToRecord(doc.pages),
    language: doc.language,
    metadata: doc.metadata ?? {},
    createdAt: doc.createdAt,
  };
}

export const mongoDocumentStore: DocumentStore = {
  async create(doc) {
    requireMongo();
    const created = await DocumentModel.create({ ...doc, pages: new Map(Object.entries(doc.pages)) });
    return toRecord(created.toObject());
  },

  async get(id) {
    requireMongo();
    const doc = await DocumentModel.findById(id).lean<DocumentShape>();
    return doc ? toRecord(doc) : null;
  },

  async latest(sessionId) {
    requireMongo();
    const query = sessionId ? { sessionId } : {};
    const doc = await DocumentModel.findOne(query, undefined, { sort: { createdAt: -1 } }).lean<DocumentShape>();
    return doc ? toRecord(doc) : null;
  },

  async titles(ids) {
    requireMongo();
    if (ids.length === 0) return new Map();
    const docs = await DocumentModel.find({ _id: { $in: ids } }, { title: 1 }).lean<Pick<DocumentDoc, "_id" | "title">[]>();
    return new Map(docs.map((d) => [d._id, d.title]));
  },
};

/** Exact cosine ranking over the stored chunks, optionally restricted to one document. */
export const mongoChunkStore: ChunkStore = {
  async insertMany(chunks) {
    requireMongo();
    if (chunks.length === 0) return 0;
    const inserted = await ChunkModel.insertMany(chunks);
    return inserted.length;
  },

  async nearest(embedding, k, filter) {
    requireMongo();
    const query = filter?.documentId ? { documentId: filter.documentId } : {};
    const rows = await ChunkModel.find(query).lean<ChunkDoc[]>();
    return rankByCosineDistance(embedding, rows, k).map(({ item, distance }) => ({
      chunk: {
        id: item._id,
        documentId: item.documentId,
        content: item.content,
        page: item.page ?? null,
        language: item.language,
      },
      distance,
    }));
  },
};
