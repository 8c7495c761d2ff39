// backend/src/services/ingestion.ts

import type { EmbeddingClient } from "../ai/clients";
import type { PipelineConfig } from "../config/pipelineConfig";
import type { ChunkStore, DocumentRecord, DocumentStore, Metadata, PageMap } from "../types";
import { DimensionMismatchError } from "../utils/errors";
import { logInfo } from "../utils/logger";

export type PageChunk = { content: string; page: number | null };

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Fixed word windows; consecutive windows share `overlap` words. */
export function chunkWords(text: string, size: number, overlap: number): string[] {
  const words = normalizeWhitespace(text).split(" ").filter(Boolean);
  if (words.length === 0) return [];
  const step = Math.max(1, size - overlap);
  const out: string[] = [];
  for (let start = 0; start < words.length; start += step) {
    out.push(words.slice(start, start + size).join(" "));
    if (start + size >= words.length) break;
  }
  return out;
}

/** Chunks never span pages; each one keeps the page it came from. */
export function chunkPages(pages: PageMap, size: number, overlap: number): PageChunk[] {
  return sortedPages(pages).flatMap(([page, text]) =>
    chunkWords(text, size, overlap).map((content) => ({ content, page }))
  );
}

function sortedPages(pages: PageMap): [number, string][] {
  return Object.entries(pages)
    .map(([key, text]): [number, string] => [Number(key), text])
    .filter(([n]) => Number.isInteger(n) && n > 0)
    .sort((a, b) => a[0] - b[0]);
}

const LETTER = /\p{L}/u;
const ARABIC = /\p{Script=Arabic}/u;

/** "ar" once Arabic-script letters make up at least 30% of all letters. */
export function detectLanguage(text: string): "ar" | "en" {
  let letters = 0;
  let arabic = 0;
  for (const ch of text) {
    if (!LETTER.test(ch)) continue;
    letters += 1;
    if (ARABIC.test(ch)) arabic += 1;
  }
  return letters > 0 && arabic / letters >= 0.3 ? "ar" : "en";
}

export type IngestInput = {
  title: string;
  sessionId: string | null;
  metadata: Metadata;
  /** either explicit pages or plain text, which becomes page 1 */
  pages: PageMap | null;
  text: string | null;
};

export type IngestResult = {
  document: DocumentRecord;
  chunkCount: number;
};

export type IngestionDeps = {
  documents: DocumentStore;
  chunks: ChunkStore;
  embeddings: EmbeddingClient;
  chunking: PipelineConfig["chunking"];
};

export function createIngestion(deps: IngestionDeps) {
  return async function ingest(input: IngestInput, requestId?: string): Promise<IngestResult> {
    const pages: PageMap = input.pages ?? { "1": input.text ?? "" };
    const content = sortedPages(pages)
      .map(([, text]) => text.trim())
      .filter(Boolean)
      .join("\n\n");

    const pieces = chunkPages(pages, deps.chunking.words, deps.chunking.overlapWords);
    // embed before anything is written so a failed call leaves no orphan document
    const vectors = await deps.embeddings.embedDocuments(pieces.map((p) => p.content));
    for (const v of vectors) {
      if (v.length !== deps.embeddings.dimensions) {
        throw new DimensionMismatchError(deps.embeddings.dimensions, v.length);
      }
    }

    const document = await deps.documents.create({
      sessionId: input.sessionId,
      title: input.title,
      content,
      pages,
      language: detectLanguage(content),
      metadata: input.metadata,
    });

    const chunkCount = await deps.chunks.insertMany(
      pieces.map((piece, i) => ({
        documentId: document.id,
        content: piece.content,
        embedding: vectors[i] ?? [],
        page: piece.page,
        language: detectLanguage(piece.content),
      }))
    );

    logInfo("document_ingested", {
      requestId,
      documentId: document.id,
      pages: Object.keys(pages).length,
      chunks: chunkCount,
      language: document.language,
    });

    return { document, chunkCount };
  };
}

export type Ingestion = ReturnType<typeof createIngestion>;
