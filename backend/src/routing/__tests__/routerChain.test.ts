// backend/src/routing/__tests__/routerChain.test.ts

import { beforeEach, describe, expect, it, vi } from "vitest";
import { memoryStores, muteLogs, sampleDocument, scriptedCompletion, tableEmbeddings, testConfig } from "../../__tests__/fakes";
import { NO_DOCUMENTS_MESSAGE } from "../../rag/knowledgeRoute";
import { buildServices } from "../../services/container";
import type { RouterInput } from "../routerChain";

function input(utterance: string, overrides: Partial<RouterInput> = {}): RouterInput {
  return {
    utterance,
    sessionId: "session-a",
    documentId: null,
    learnerId: null,
    currentPage: null,
    state: {},
    ...overrides,
  };
}

describe("router chain", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    muteLogs();
  });

  it("classifies an Arabic command as an action and opens the document", async () => {
    const { stores, data } = memoryStores();
    data.documents.push(sampleDocument());
    const { client, complete } = scriptedCompletion(
      '{"intent_type": "action", "intent_confidence": 0.9, "intent_details": "open"}',
      '{"action_type": "open_doc", "action_confidence": 0.85}'
    );
    const { router } = buildServices({ config: testConfig, completion: client, embeddings: tableEmbeddings({}), stores });

    const outcome = await router.route(input("افتح الفيزياء"));

    expect(complete).toHaveBeenCalledTimes(2);
    expect(outcome.kind).toBe("action");
    expect(outcome.intent).toMatchObject({ intentType: "action", intentConfidence: 0.9, overridden: false });
    expect(outcome.result.status).toBe("ok");
    if (outcome.kind !== "action") throw new Error("expected an action");
    expect(outcome.decision.type).toBe("open_doc");
    expect(outcome.result.message).toBe('Opened "Physics Notes" (3 pages).');
  });

  it("answers 'test me' with the no-documents message when nothing is uploaded", async () => {
    const { stores, data } = memoryStores();
    const { client } = scriptedCompletion(
      '{"intent_type": "query", "intent_confidence": 0.8}',
      '{"route": "qa", "route_confidence": 0.9}'
    );
    const { router } = buildServices({ config: testConfig, completion: client, embeddings: tableEmbeddings({}), stores });

    const outcome = await router.route(input("test me", { sessionId: null }));

    if (outcome.kind !== "query") throw new Error("expected a query");
    expect(outcome.route).toBe("qa");
    expect(outcome.result).toMatchObject({ status: "no_document", answer: NO_DOCUMENTS_MESSAGE });
    expect(data.decisions.map((d) => [d.query, d.route])).toEqual([["test me", "qa"]]);
    expect(data.turns).toHaveLength(1);
  });

  it("grounds a qa answer in the nearest chunk", async () => {
    const { stores, data } = memoryStores();
    data.documents.push(sampleDocument());
    data.chunks.push({
      id: "chunk-momentum",
      documentId: "doc-physics",
      content: "Momentum is mass times velocity.",
      embedding: [0, 1, 0],
      page: 3,
      language: "en",
    });
    const { client, calls } = scriptedCompletion(
      '{"intent_type": "query", "intent_confidence": 0.95}',
      '{"route": "qa", "route_confidence": 0.9}',
      "Momentum is mass times velocity."
    );
    const { router, memory } = buildServices({
      config: testConfig,
      completion: client,
      embeddings: tableEmbeddings({ "what is momentum?": [0, 1, 0] }),
      stores,
    });

    const outcome = await router.route(input("what is momentum?"));

    expect(outcome.result).toMatchObject({
      status: "ok",
      answer: "Momentum is mass times velocity.",
      knowledgeStatus: "answered",
      sources: [{ id: "chunk-momentum", source: "Physics Notes", similarityScore: 1 }],
    });
    expect(calls[2]?.[1]?.content).toContain(
      "Source: Physics Notes, page 3 (Similarity: 1.000)\nContent: Momentum is mass times velocity."
    );
    expect(memory.messages("session-a")).toEqual([
      { role: "user", content: "what is momentum?" },
      { role: "assistant", content: "Momentum is mass times velocity." },
    ]);
  });

  it("sends low-confidence messages to the content agent", async () => {
    const { stores, data } = memoryStores();
    const { client } = scriptedCompletion(
      '{"intent_type": "action", "intent_confidence": 0.3}',
      '{"route": "qa", "route_confidence": 0.2}'
    );
    const { router } = buildServices({ config: testConfig, completion: client, embeddings: tableEmbeddings({}), stores });

    const outcome = await router.route(input("hmm"));

    expect(outcome.intent).toMatchObject({ intentType: "query", overridden: true });
    if (outcome.kind !== "query") throw new Error("expected a query");
    expect(outcome.decision.type).toBe("unknown");
    expect(outcome.route).toBe("content_agent");
    expect(outcome.result).toMatchObject({ status: "ok", answer: NO_DOCUMENTS_MESSAGE, delegated: false });
    expect(data.decisions.map((d) => d.route)).toEqual(["content_agent"]);
  });

  it("routes a bare action without classifying intent", async () => {
    const { stores, data } = memoryStores();
    data.documents.push(sampleDocument());
    const { client, complete } = scriptedCompletion('{"action_type": "next_section", "action_confidence": 0.9}');
    const { router } = buildServices({ config: testConfig, completion: client, embeddings: tableEmbeddings({}), stores });

    const { decision, result } = await router.routeAction(input("next page"));

    expect(complete).toHaveBeenCalledTimes(1);
    expect(decision.type).toBe("next_section");
    expect(result).toMatchObject({ status: "ok", page: 1, message: "Page 1 of 3." });
  });
});
