// backend/src/rag/__tests__/sessionMemory.test.ts

import { describe, expect, it } from "vitest";
import { NO_HISTORY_TEXT, SessionMemory } from "../sessionMemory";

describe("SessionMemory", () => {
  it("keeps only the newest messages within the window", () => {
    const memory = new SessionMemory(4);
    memory.append("s1", "q1", "a1");
    memory.append("s1", "q2", "a2");
    memory.append("s1", "q3", "a3");

    expect(memory.messages("s1").map((m) => m.content)).toEqual(["q2", "a2", "q3", "a3"]);
  });

  it("formats the last turns for a prompt", () => {
    const memory = new SessionMemory(10);
    memory.append("s1", "q1", "a1");
    memory.append("s1", "q2", "a2");

    expect(memory.history("s1", 2)).toBe("Human: q2\nAssistant: a2");
    expect(memory.history("s1", 0)).toBe(NO_HISTORY_TEXT);
  });

  it("keeps sessions apart and remembers nothing without one", () => {
    const memory = new SessionMemory(10);
    memory.append("s1", "q1", "a1");
    memory.append(null, "anonymous", "reply");

    expect(memory.messages("s2")).toEqual([]);
    expect(memory.messages(null)).toEqual([]);
    expect(memory.history(null, 6)).toBe(NO_HISTORY_TEXT);
  });

  it("evicts the least recently used session", () => {
    const memory = new SessionMemory(10, 2);
    memory.append("s1", "q", "a");
    memory.append("s2", "q", "a");
    memory.append("s1", "q again", "a again");
    memory.append("s3", "q", "a");

    expect(memory.messages("s1")).toHaveLength(4);
    expect(memory.messages("s2")).toEqual([]);
  });

  it("tracks the last retrieval per session", () => {
    const memory = new SessionMemory(10);
    memory.recordRetrieval("s1", { chunkIds: ["c1"], similarityScores: [0.7], numChunks: 1 });

    expect(memory.lastRetrieval("s1")).toEqual({ chunkIds: ["c1"], similarityScores: [0.7], numChunks: 1 });
    memory.clear("s1");
    expect(memory.lastRetrieval("s1")).toBeNull();
  });
});
