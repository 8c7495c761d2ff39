// backend/src/rag/sessionMemory.ts

import type { ChatMessage } from "../ai/clients";

export type RetrievalInfo = {
  chunkIds: string[];
  similarityScores: number[];
  numChunks: number;
};

type Entry = {
  messages: ChatMessage[];
  lastRetrieval: RetrievalInfo | null;
};

export const NO_HISTORY_TEXT = "No previous conversation.";

export function formatHistory(messages: ChatMessage[], turns: number): string {
  const recent = turns > 0 ? messages.slice(-turns) : [];
  if (recent.length === 0) return NO_HISTORY_TEXT;
  return recent.map((m) => `${m.role === "user" ? "Human" : "Assistant"}: ${m.content}`).join("\n");
}

/**
 * Rolling conversation memory keyed by session id. Requests without a
 * session get no memory at all, so two anonymous callers never see each
 * other's turns.
 */
export class SessionMemory {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly windowSize: number,
    private readonly maxSessions = 1000
  ) {}

  private entry(sessionId: string): Entry {
    let e = this.entries.get(sessionId);
    if (e) {
      // refresh recency
      this.entries.delete(sessionId);
    } else {
      e = { messages: [], lastRetrieval: null };
    }
    this.entries.set(sessionId, e);
    if (this.entries.size > this.maxSessions) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    return e;
  }

  messages(sessionId: string | null): ChatMessage[] {
    if (!sessionId) return [];
    return [...(this.entries.get(sessionId)?.messages ?? [])];
  }

  history(sessionId: string | null, turns: number): string {
    return formatHistory(this.messages(sessionId), turns);
  }

  append(sessionId: string | null, query: string, answer: string) {
    if (!sessionId) return;
    const e = this.entry(sessionId);
    e.messages.push({ role: "user", content: query }, { role: "assistant", content: answer });
    if (e.messages.length > this.windowSize) {
      e.messages.splice(0, e.messages.length - this.windowSize);
    }
  }

  recordRetrieval(sessionId: string | null, info: RetrievalInfo) {
    if (!sessionId) return;
    this.entry(sessionId).lastRetrieval = info;
  }

  lastRetrieval(sessionId: string | null): RetrievalInfo | null {
    if (!sessionId) return null;
    return this.entries.get(sessionId)?.lastRetrieval ?? null;
  }

  clear(sessionId: string) {
    this.entries.delete(sessionId);
  }
}
