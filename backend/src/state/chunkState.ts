// backend/src/state/chunkState.ts

import { randomUUID } from "crypto";
import mongoose from "mongoose";

export type ChunkDoc = {
  _id: string;
  documentId: string;
  content: string;
  embedding: number[];
  page: number | null;
  language: string;
};

const ChunkSchema = new mongoose.Schema<ChunkDoc>({
  _id: { type: String, default: () => randomUUID() },
  documentId: { type: String, required: true, index: true },
  content: { type: String, required: true },
  embedding: { type: [Number], required: true },
  page: { type: Number, default: null },
  language: { type: String, default: "en" },
});

export const ChunkModel: mongoose.Model<ChunkDoc> =
  mongoose.models.Chunk ?? mongoose.model<ChunkDoc>("Chunk", ChunkSchema);
