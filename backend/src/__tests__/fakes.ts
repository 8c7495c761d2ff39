// backend/src/__tests__/fakes.ts
// In-memory stand-ins for the model clients and stores. Not a test file.

import { vi } from "vitest";
import type { ChatMessage, CompletionClient, EmbeddingClient } from "../ai/clients";
import { loadPipelineConfig, type PipelineConfig } from "../config/pipelineConfig";
import { rankByCosineDistance } from "../rag/vectorMath";
import type { Stores } from "../services/container";
import type {
  ChunkRecord,
  ConversationTurnRecord,
  CursorScope,
  DocumentRecord,
  LearnerInteractionRecord,
  LearnerProfile,
  LearningUnitRecord,
  NoteRecord,
  RouterDecisionRecord,
  SessionRecord,
  TutoringSessionRecord,
} from "../types";

export const testConfig: PipelineConfig = loadPipelineConfig({});

type Reply = string | Error;

/** Replies are consumed in order; the last one repeats. */
export function scriptedCompletion(...replies: Reply[]) {
  const calls: ChatMessage[][] = [];
  let i = 0;
  const complete = vi.fn(async (input: string | ChatMessage[]) => {
    calls.push(typeof input === "string" ? [{ role: "user", content: input }] : input);
    const reply = replies[Math.min(i, replies.length - 1)] ?? "";
    i += 1;
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const client: CompletionClient = { complete };
  return { client, complete, calls };
}

/** Looks vectors up by exact text; anything else embeds to the zero vector. */
export function tableEmbeddings(table: Record<string, number[]>, dimensions = 3): EmbeddingClient {
  const lookup = (text: string) => table[text] ?? new Array<number>(dimensions).fill(0);
  return {
    dimensions,
    embedQuery: vi.fn(async (text: string) => lookup(text)),
    embedDocuments: vi.fn(async (texts: string[]) => texts.map(lookup)),
  };
}

export function memoryStores() {
  let seq = 0;
  const nextId = (prefix: string) => `${prefix}-${++seq}`;
  let tick = Date.parse("2026-03-01T09:00:00.000Z");
  const stamp = () => new Date((tick += 1000));

  const sessions = new Map<string, SessionRecord>();
  const documents: DocumentRecord[] = [];
  const chunks: ChunkRecord[] = [];
  const decisions: RouterDecisionRecord[] = [];
  const turns: ConversationTurnRecord[] = [];
  const notes: NoteRecord[] = [];
  const cursors = new Map<string, { documentId: string; page: number }>();
  const profiles = new Map<string, LearnerProfile>();
  const tutoring: TutoringSessionRecord[] = [];
  const interactions: LearnerInteractionRecord[] = [];
  const learningUnits: LearningUnitRecord[] = [];

  const stores: Stores = {
    sessions: {
      async create(metadata = {}) {
        const at = stamp();
        const s: SessionRecord = { id: nextId("session"), metadata, createdAt: at, updatedAt: at };
        sessions.set(s.id, s);
        return s;
      },
      async get(id) {
        return sessions.get(id) ?? null;
      },
      async patchMetadata(id, patch) {
        const s = sessions.get(id);
        if (!s) return null;
        const next = { ...s, metadata: { ...s.metadata, ...patch }, updatedAt: stamp() };
        sessions.set(id, next);
        return next;
      },
    },
    documents: {
      async create(doc) {
        const d: DocumentRecord = { ...doc, id: nextId("doc"), createdAt: stamp() };
        documents.push(d);
        return d;
      },
      async get(id) {
        return documents.find((d) => d.id === id) ?? null;
      },
      async latest(sessionId) {
        const pool = sessionId ? documents.filter((d) => d.sessionId === sessionId) : documents;
        return pool[pool.length - 1] ?? null;
      },
      async titles(ids) {
        return new Map(documents.filter((d) => ids.includes(d.id)).map((d) => [d.id, d.title]));
      },
    },
    chunks: {
      async insertMany(rows) {
        for (const r of rows) chunks.push({ ...r, id: nextId("chunk") });
        return rows.length;
      },
      async nearest(embedding, k, filter) {
        const pool = filter?.documentId ? chunks.filter((c) => c.documentId === filter.documentId) : chunks;
        return rankByCosineDistance(embedding, pool, k).map(({ item, distance }) => ({
          chunk: { id: item.id, documentId: item.documentId, content: item.content, page: item.page, language: item.language },
          distance,
        }));
      },
    },
    decisions: {
      async append(query, route) {
        const r: RouterDecisionRecord = { id: nextId("decision"), query, route, createdAt: stamp() };
        decisions.push(r);
        return r;
      },
    },
    conversations: {
      async append(turn) {
        const r: ConversationTurnRecord = { ...turn, id: nextId("turn"), createdAt: stamp() };
        turns.push(r);
        return r;
      },
      async listBySession(sessionId, { limit, offset }) {
        const mine = turns.filter((t) => t.sessionId === sessionId);
        return { turns: mine.slice(offset, offset + limit), total: mine.length };
      },
    },
    notes: {
      async create(note) {
        const n: NoteRecord = { ...note, id: nextId("note"), createdAt: stamp() };
        notes.push(n);
        return n;
      },
      async list(sessionId, page) {
        return notes.filter((n) => n.sessionId === sessionId && (typeof page !== "number" || n.page === page));
      },
    },
    cursors: {
      async get({ sessionId, documentId }: CursorScope) {
        const c = cursors.get(sessionId);
        return c && c.documentId === documentId ? c.page : null;
      },
      async set({ sessionId, documentId }, page) {
        cursors.set(sessionId, { documentId, page });
      },
      async clear(sessionId) {
        cursors.delete(sessionId);
      },
    },
    profiles: {
      async get(id) {
        return profiles.get(id) ?? null;
      },
      async create(data) {
        const at = stamp();
        const p: LearnerProfile = { ...data, id: nextId("learner"), guestSession: false, createdAt: at, updatedAt: at };
        profiles.set(p.id, p);
        return p;
      },
      async update(id, data) {
        const p = profiles.get(id);
        if (!p) return null;
        const next: LearnerProfile = { ...p, ...data, id, guestSession: false, updatedAt: stamp() };
        profiles.set(id, next);
        return next;
      },
    },
    tutoringSessions: {
      async findActive(learnerId) {
        return tutoring.find((s) => s.learnerId === learnerId && s.isActive) ?? null;
      },
      async create(session) {
        const s: TutoringSessionRecord = { ...session, id: nextId("tutoring") };
        tutoring.push(s);
        return s;
      },
      async save(session) {
        const i = tutoring.findIndex((s) => s.id === session.id);
        if (i >= 0) tutoring[i] = session;
      },
    },
    interactions: {
      async append(interaction) {
        const r: LearnerInteractionRecord = { ...interaction, id: nextId("interaction"), createdAt: stamp() };
        interactions.push(r);
        return r;
      },
    },
    learningUnits: {
      async insertMany(units) {
        learningUnits.push(...units);
        return units.length;
      },
    },
  };

  return {
    stores,
    data: {
      sessions,
      documents,
      chunks,
      decisions,
      turns,
      notes,
      cursors,
      profiles,
      tutoring,
      interactions,
      learningUnits,
    },
  };
}

export function sampleDocument(overrides: Partial<DocumentRecord> = {}): DocumentRecord {
  return {
    id: "doc-physics",
    sessionId: "session-a",
    title: "Physics Notes",
    content: "Force equals mass times acceleration.\n\nEnergy is conserved.\n\nMomentum is mass times velocity.",
    pages: {
      "1": "Force equals mass times acceleration.",
      "2": "Energy is conserved.",
      "3": "Momentum is mass times velocity.",
    },
    language: "en",
    metadata: {},
    createdAt: new Date("2026-03-01T08:00:00.000Z"),
    ...overrides,
  };
}

export function sampleProfile(overrides: Partial<LearnerProfile> = {}): LearnerProfile {
  return {
    id: "learner-1",
    gradeLevel: 10,
    learningStyle: "Mixed",
    preferredLanguage: "English",
    difficultyPreference: "medium",
    metrics: { accuracyRate: 0.8, avgResponseTime: 20, completionRate: 0.9, totalSessions: 4 },
    interactionPatterns: {},
    struggles: [],
    masteredTopics: [],
    preferredExplanationStyles: [],
    preferredFormats: [],
    guestSession: false,
    createdAt: new Date("2026-01-01T00:00:00.000Z"),
    updatedAt: new Date("2026-01-01T00:00:00.000Z"),
    ...overrides,
  };
}

/** Silences the JSON log lines a test does not assert on. */
export function muteLogs() {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
}
