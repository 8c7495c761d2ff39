// backend/src/types/domain.ts

export type Metadata = Record<string, unknown>;

export type SessionRecord = {
  id: string;
  metadata: Metadata;
  createdAt: Date;
  updatedAt: Date;
};

/** Page number (as a string key, "1"-based) to page text. */
export type PageMap = Record<string, string>;

export type DocumentRecord = {
  id: string;
  sessionId: string | null;
  title: string;
  content: string;
  pages: PageMap;
  language: string;
  metadata: Metadata;
  createdAt: Date;
};

export type ChunkRecord = {
  id: string;
  documentId: string;
  content: string;
  embedding: number[];
  page: number | null;
  language: string;
};

export type StoredChunk = Omit<ChunkRecord, "embedding">;

export type ChunkSearchHit = {
  chunk: StoredChunk;
  distance: number;
};

/** Transient retrieval result. similarityScore is always 1 - similarityDistance. */
export type RetrievedPassage = {
  id: string;
  documentId: string;
  source: string;
  content: string;
  page: number | null;
  similarityDistance: number;
  similarityScore: number;
};

export type RankedPassage = RetrievedPassage & {
  rerankScore: number;
  rerankPosition: number;
};

export type RouteName = "qa" | "summarization" | "content_agent" | "tutor_agent";

export type RouterDecisionRecord = {
  id: string;
  query: string;
  route: RouteName;
  createdAt: Date;
};

export type ConversationTurnRecord = {
  id: string;
  sessionId: string | null;
  query: string;
  answer: string;
  createdAt: Date;
};

export type NoteRecord = {
  id: string;
  sessionId: string;
  documentId: string | null;
  content: string;
  page: number | null;
  createdAt: Date;
};

export type LearningUnit = {
  title: string;
  subtopics: string[];
  detailedExplanation: string;
  keyPoints: string[];
  difficultyLevel: string;
  learningObjectives: string[];
  keywords: string[];
};

/** A unit cut from one uploaded document, as stored. */
export type LearningUnitRecord = LearningUnit & {
  id: string;
  sourceDocumentId: string;
  subject: string;
  gradeLevel: string;
  adaptationApplied: boolean;
  createdAt: Date;
};
