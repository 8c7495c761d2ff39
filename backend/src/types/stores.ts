// backend/src/types/stores.ts
// Read/write contracts the pipeline needs from persistence. Mongo-backed
// implementations live in ../storage; tests use in-memory ones.

import type {
  ChunkRecord,
  ChunkSearchHit,
  ConversationTurnRecord,
  DocumentRecord,
  LearningUnitRecord,
  Metadata,
  NoteRecord,
  PageMap,
  RouteName,
  RouterDecisionRecord,
  SessionRecord,
} from "./domain";
import type {
  LearnerInteractionRecord,
  LearnerProfile,
  LearnerProfileData,
  TutoringSessionRecord,
} from "./tutoring";

export type SessionStore = {
  create: (metadata?: Metadata) => Promise<SessionRecord>;
  get: (id: string) => Promise<SessionRecord | null>;
  /** shallow-merges patch into metadata */
  patchMetadata: (id: string, patch: Metadata) => Promise<SessionRecord | null>;
};

export type NewDocument = {
  sessionId: string | null;
  title: string;
  content: string;
  pages: PageMap;
  language: string;
  metadata: Metadata;
};

export type DocumentStore = {
  create: (doc: NewDocument) => Promise<DocumentRecord>;
  get: (id: string) => Promise<DocumentRecord | null>;
  /** most recently created document, scoped to the session when one is given */
  latest: (sessionId: string | null) => Promise<DocumentRecord | null>;
  titles: (ids: string[]) => Promise<Map<string, string>>;
};

export type ChunkFilter = { documentId?: string };

export type ChunkStore = {
  insertMany: (chunks: Omit<ChunkRecord, "id">[]) => Promise<number>;
  /** ascending cosine distance, at most k hits */
  nearest: (embedding: number[], k: number, filter?: ChunkFilter) => Promise<ChunkSearchHit[]>;
};

export type RouterDecisionStore = {
  append: (query: string, route: RouteName) => Promise<RouterDecisionRecord>;
};

export type ConversationStore = {
  append: (turn: { sessionId: string | null; query: string; answer: string }) => Promise<ConversationTurnRecord>;
  listBySession: (
    sessionId: string,
    page: { limit: number; offset: number }
  ) => Promise<{ turns: ConversationTurnRecord[]; total: number }>;
};

export type NoteStore = {
  create: (note: Omit<NoteRecord, "id" | "createdAt">) => Promise<NoteRecord>;
  list: (sessionId: string, page?: number | null) => Promise<NoteRecord[]>;
};

export type CursorScope = { sessionId: string; documentId: string };

export type CursorStore = {
  get: (scope: CursorScope) => Promise<number | null>;
  set: (scope: CursorScope, page: number) => Promise<void>;
  clear: (sessionId: string) => Promise<void>;
};

export type LearnerProfileStore = {
  get: (id: string) => Promise<LearnerProfile | null>;
  create: (data: Omit<LearnerProfileData, "id">) => Promise<LearnerProfile>;
  update: (id: string, data: LearnerProfileData) => Promise<LearnerProfile | null>;
};

export type TutoringSessionStore = {
  findActive: (learnerId: string) => Promise<TutoringSessionRecord | null>;
  create: (session: Omit<TutoringSessionRecord, "id">) => Promise<TutoringSessionRecord>;
  save: (session: TutoringSessionRecord) => Promise<void>;
};

export type InteractionStore = {
  append: (interaction: Omit<LearnerInteractionRecord, "id" | "createdAt">) => Promise<LearnerInteractionRecord>;
};

export type LearningUnitStore = {
  /** units arrive with their ids already assigned; resolves to the number written */
  insertMany: (units: LearningUnitRecord[]) => Promise<number>;
};
