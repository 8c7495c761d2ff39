// backend/src/routing/__tests__/subRouters.test.ts

import { beforeEach, describe, expect, it, vi } from "vitest";
import { muteLogs, scriptedCompletion } from "../../__tests__/fakes";
import { ACTION_CLARIFICATION, createActionRouter, readActionArguments } from "../actionRouter";
import { QUERY_CLARIFICATION, createQueryRouter, resolveQueryRoute } from "../queryRouter";
import { UNPARSEABLE_ROUTE_DETAILS } from "../subRouter";

describe("action router", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    muteLogs();
  });

  it("resolves a confident action with its arguments", async () => {
    const { client } = scriptedCompletion(
      '{"action_type": "add_note", "action_confidence": 0.9, "action_details": "note", "arguments": {"note_text": "check units", "page_num": "٣"}}'
    );

    const decision = await createActionRouter({ completion: client, threshold: 0.6 })("add a note on page 3");

    expect(decision.type).toBe("add_note");
    expect(decision.confidence).toBe(0.9);
    expect(decision.overridden).toBe(false);
    expect(decision.arguments).toEqual({ docId: null, pageNum: 3, noteText: "check units" });
  });

  it("degrades to unknown with a clarification below the threshold", async () => {
    const { client } = scriptedCompletion('{"action_type": "open_doc", "action_confidence": 0.4}');

    const decision = await createActionRouter({ completion: client, threshold: 0.6 })("hmm the doc");

    expect(decision.type).toBe("unknown");
    expect(decision.confidence).toBe(0.4);
    expect(decision.details).toBe(ACTION_CLARIFICATION);
  });

  it("degrades to unknown when the output has no JSON block", async () => {
    const { client } = scriptedCompletion("open_doc, probably");

    const decision = await createActionRouter({ completion: client, threshold: 0.6 })("open it");

    expect(decision.type).toBe("unknown");
    expect(decision.confidence).toBe(0);
    expect(decision.details).toBe(UNPARSEABLE_ROUTE_DETAILS);
  });

  it("prefers nested arguments over flat ones", () => {
    expect(
      readActionArguments({ doc_id: "flat", arguments: { doc_id: "nested" }, page_num: 4, note_text: "  " })
    ).toEqual({ docId: "nested", pageNum: 4, noteText: null });
  });
});

describe("query router", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    muteLogs();
  });

  it("maps the agents alias onto content_agent", async () => {
    const { client } = scriptedCompletion('{"route": "agents", "route_confidence": 0.8, "route_details": "explain"}');

    const decision = await createQueryRouter({ completion: client, threshold: 0.6 })("explain photosynthesis");

    expect(decision.type).toBe("content_agent");
    expect(decision.details).toBe("explain");
  });

  it("sends an unknown route on to the content agent", async () => {
    const { client } = scriptedCompletion('{"route": "qa", "route_confidence": 0.3}');

    const decision = await createQueryRouter({ completion: client, threshold: 0.6 })("what?");

    expect(decision.type).toBe("unknown");
    expect(decision.details).toBe(QUERY_CLARIFICATION);
    expect(resolveQueryRoute(decision)).toBe("content_agent");
  });

  it("keeps a confident summarization route", async () => {
    const { client } = scriptedCompletion('{"route": "summarization", "route_confidence": 0.95}');

    const decision = await createQueryRouter({ completion: client, threshold: 0.6 })("summarize chapter 2");

    expect(resolveQueryRoute(decision)).toBe("summarization");
  });
});
