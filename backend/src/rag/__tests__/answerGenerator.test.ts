// backend/src/rag/__tests__/answerGenerator.test.ts

import { beforeEach, describe, expect, it, vi } from "vitest";
import { muteLogs, scriptedCompletion } from "../../__tests__/fakes";
import { createJsonAnswerGenerator, createSchemaAnswerGenerator, createTextAnswerGenerator } from "../answerGenerator";
import { learningUnitOptions, summaryOptions } from "../answerSchemas";

const input = { query: "what is force?", context: "Source: Physics Notes\nContent: F = ma", history: "No previous conversation." };

describe("text answers", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    muteLogs();
  });

  it("sends the instructions and the assembled prompt", async () => {
    const { client, calls } = scriptedCompletion("Force is mass times acceleration.");

    const answer = await createTextAnswerGenerator({ completion: client, instructions: "Be brief." }).generate(input);

    expect(answer).toBe("Force is mass times acceleration.");
    expect(calls[0]).toEqual([
      { role: "system", content: "Be brief." },
      {
        role: "user",
        content:
          "Context:\nSource: Physics Notes\nContent: F = ma\n\nConversation so far:\nNo previous conversation.\n\nQuestion: what is force?",
      },
    ]);
  });

  it("returns an apology instead of throwing", async () => {
    const { client } = scriptedCompletion(new Error("quota exceeded"));

    const answer = await createTextAnswerGenerator({ completion: client, instructions: "x" }).generate(input);

    expect(answer).toBe("I'm sorry, I encountered an error while processing your question: quota exceeded");
  });
});

describe("json answers", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    muteLogs();
  });

  it("reads the structured reply", async () => {
    const { client } = scriptedCompletion(
      'Here you go: {"response": "F = ma", "sources_referenced": ["Physics Notes"], "confidence": "high"}'
    );

    const answer = await createJsonAnswerGenerator({ completion: client, instructions: "x" }).generate(input);

    expect(answer).toEqual({ response: "F = ma", sourcesReferenced: ["Physics Notes"], confidence: "high" });
  });

  it("falls back to medium for an unknown confidence", async () => {
    const { client } = scriptedCompletion('{"response": "F = ma", "confidence": "certain"}');

    const answer = await createJsonAnswerGenerator({ completion: client, instructions: "x" }).generate(input);

    expect(answer).toEqual({ response: "F = ma", sourcesReferenced: [], confidence: "medium" });
  });

  it("keeps prose as a low-confidence answer", async () => {
    const { client } = scriptedCompletion("Force is mass times acceleration.");

    const answer = await createJsonAnswerGenerator({ completion: client, instructions: "x" }).generate(input);

    expect(answer).toEqual({ response: "Force is mass times acceleration.", sourcesReferenced: [], confidence: "low" });
  });
});

describe("schema answers", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    muteLogs();
  });

  it("validates a summary and renders it", async () => {
    const { client } = scriptedCompletion(
      '{"title": "Mechanics", "content": "Forces change motion.", "key_points": ["F = ma"], "language": "en"}'
    );
    const generator = createSchemaAnswerGenerator({ completion: client, instructions: "x" }, summaryOptions);

    const summary = await generator.generate(input);

    expect(summary).toEqual({ title: "Mechanics", content: "Forces change motion.", keyPoints: ["F = ma"], language: "en" });
    expect(generator.render(summary)).toBe("Mechanics\n\nForces change motion.\n\n- F = ma");
  });

  it("wraps an unstructured summary reply", async () => {
    const { client } = scriptedCompletion("Forces change motion.");

    const summary = await createSchemaAnswerGenerator({ completion: client, instructions: "x" }, summaryOptions).generate(input);

    expect(summary).toEqual({
      title: "Document Summary",
      content: "Forces change motion.",
      keyPoints: ["Summary generated from document content"],
      language: null,
    });
  });

  it("maps learning unit fields and reports failures in the unit itself", async () => {
    const ok = scriptedCompletion(
      '{"title": "Newton", "detailed_explanation": "Three laws.", "key_points": ["inertia"], "difficulty_level": "beginner"}'
    );
    const failing = scriptedCompletion(new Error("timeout"));

    const unit = await createSchemaAnswerGenerator({ completion: ok.client, instructions: "x" }, learningUnitOptions).generate(input);
    const broken = await createSchemaAnswerGenerator({ completion: failing.client, instructions: "x" }, learningUnitOptions).generate(input);

    expect(unit).toEqual({
      title: "Newton",
      subtopics: [],
      detailedExplanation: "Three laws.",
      keyPoints: ["inertia"],
      difficultyLevel: "beginner",
      learningObjectives: [],
      keywords: [],
    });
    expect(broken.title).toBe("Error in Processing");
    expect(broken.detailedExplanation).toBe("An error occurred while building the learning unit: timeout");
  });
});
