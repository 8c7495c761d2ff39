// backend/src/rag/retriever.ts

import type { EmbeddingClient } from "../ai/clients";
import type { ChunkFilter, ChunkStore, DocumentStore, RetrievedPassage } from "../types";
import { DimensionMismatchError } from "../utils/errors";

export type RetrieverDeps = {
  embeddings: EmbeddingClient;
  chunks: ChunkStore;
  documents: Pick<DocumentStore, "titles">;
};

export type Retriever = {
  retrieve: (query: string, topK: number, filter?: ChunkFilter) => Promise<RetrievedPassage[]>;
};

/**
 * Embeds the query and returns up to topK passages by ascending cosine
 * distance. An empty corpus yields []; a query vector of the wrong size
 * fails before the store is touched.
 */
export function createRetriever(deps: RetrieverDeps): Retriever {
  return {
    async retrieve(query, topK, filter) {
      const vector = await deps.embeddings.embedQuery(query);
      if (vector.length !== deps.embeddings.dimensions) {
        throw new DimensionMismatchError(deps.embeddings.dimensions, vector.length);
      }

      const hits = await deps.chunks.nearest(vector, topK, filter);
      if (hits.length === 0) return [];

      const titles = await deps.documents.titles([...new Set(hits.map((h) => h.chunk.documentId))]);

      return hits
        .map((hit) => ({
          id: hit.chunk.id,
          documentId: hit.chunk.documentId,
          source: titles.get(hit.chunk.documentId) ?? hit.chunk.documentId,
          content: hit.chunk.content,
          page: hit.chunk.page,
          similarityDistance: hit.distance,
          similarityScore: 1 - hit.distance,
        }))
        .sort((a, b) => a.similarityDistance - b.similarityDistance);
    },
  };
}
