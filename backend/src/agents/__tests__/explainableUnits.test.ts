// backend/src/agents/__tests__/explainableUnits.test.ts

import { beforeEach, describe, expect, it, vi } from "vitest";
import { memoryStores, muteLogs, sampleDocument, scriptedCompletion } from "../../__tests__/fakes";
import { EXPLAINABLE_UNITS_INSTRUCTIONS } from "../../ai/prompts/answerPrompts";
import type { DocumentRecord, LearningUnitStore } from "../../types";
import { createExplainableUnits, parseUnitsOutput, type UnitsRequest } from "../explainableUnits";

const createdAt = new Date("2026-03-02T10:00:00.000Z");

const forcesUnit = {
  title: "Forces",
  subtopics: ["Newton's second law"],
  detailed_explanation: "Force is mass times acceleration.",
  key_points: ["F = ma"],
  difficulty_level: "beginner",
  learning_objectives: ["Apply F = ma"],
  keywords: ["force"],
};

const request: UnitsRequest = {
  query: "turn my notes into learning units",
  sessionId: "session-a",
  documentId: null,
  adaptation: null,
};

function setup(reply: string | Error, docs: DocumentRecord[] = [sampleDocument()], units?: LearningUnitStore) {
  const { stores, data } = memoryStores();
  data.documents.push(...docs);
  const { client, complete, calls } = scriptedCompletion(reply);
  let seq = 0;
  const generate = createExplainableUnits({
    completion: client,
    documents: stores.documents,
    units: units ?? stores.learningUnits,
    maxContentChars: 4000,
    newId: () => `unit-${++seq}`,
    now: () => createdAt,
  });
  return { generate, complete, calls, data };
}

describe("explainable units", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    muteLogs();
  });

  it("builds and stores units from the session's latest document", async () => {
    const doc = sampleDocument({ metadata: { subject: "Physics", grade_level: 11 } });
    const { generate, calls, data } = setup(JSON.stringify([forcesUnit]), [doc]);

    const result = await generate(request);

    expect(result).toEqual({
      status: "generated",
      documentId: "doc-physics",
      stored: true,
      message: 'Generated 1 learning unit(s) from "Physics Notes".',
      units: [
        {
          id: "unit-1",
          title: "Forces",
          subtopics: ["Newton's second law"],
          detailedExplanation: "Force is mass times acceleration.",
          keyPoints: ["F = ma"],
          difficultyLevel: "beginner",
          learningObjectives: ["Apply F = ma"],
          keywords: ["force"],
          sourceDocumentId: "doc-physics",
          subject: "Physics",
          gradeLevel: "11",
          adaptationApplied: false,
          createdAt,
        },
      ],
    });
    expect(data.learningUnits.map((u) => u.id)).toEqual(["unit-1"]);
    expect(calls[0]).toEqual([
      { role: "system", content: EXPLAINABLE_UNITS_INSTRUCTIONS },
      {
        role: "user",
        content: [
          "Subject: Physics",
          "Grade level: 11",
          "Language: English",
          "",
          "Material:",
          "Force equals mass times acceleration.\n\nEnergy is conserved.\n\nMomentum is mass times velocity.",
        ].join("\n"),
      },
    ]);
  });

  it("reads a units object, repairs malformed entries and passes the adaptation on", async () => {
    const reply = JSON.stringify({ units: [forcesUnit, { title: "", key_points: ["mass", 3] }] });
    const { generate, calls } = setup(reply);

    const result = await generate({ ...request, documentId: "doc-physics", adaptation: "use short sentences" });

    if (result.status !== "generated") throw new Error("expected units");
    expect(result.units.map((u) => u.id)).toEqual(["unit-1", "unit-2"]);
    expect(result.units[1]).toMatchObject({
      title: "Untitled Unit",
      subtopics: [],
      detailedExplanation: "",
      keyPoints: ["mass"],
      difficultyLevel: "intermediate",
      learningObjectives: [],
      keywords: [],
      subject: "General",
      gradeLevel: "12",
      adaptationApplied: true,
    });
    expect(calls[0]?.[1]?.content).toContain("\nAdaptation: use short sentences\n");
  });

  it("keeps the units when the write fails", async () => {
    const units: LearningUnitStore = {
      insertMany: vi.fn(async () => {
        throw new Error("write refused");
      }),
    };
    const { generate } = setup(JSON.stringify(forcesUnit), [sampleDocument()], units);

    const result = await generate(request);

    if (result.status !== "generated") throw new Error("expected units");
    expect(result.stored).toBe(false);
    expect(result.units.map((u) => u.title)).toEqual(["Forces"]);
  });

  it("reports no documents without calling the model", async () => {
    const empty = setup("[]", []);
    const blank = setup("[]", [sampleDocument({ content: "   " })]);

    const none = await empty.generate(request);
    const whitespace = await blank.generate({ ...request, documentId: "doc-physics" });

    expect(none).toEqual({
      status: "no_documents",
      units: [],
      message: "No documents available to generate learning units from.",
    });
    expect(whitespace.status).toBe("no_documents");
    expect(empty.complete).not.toHaveBeenCalled();
    expect(blank.complete).not.toHaveBeenCalled();
  });

  it("reports an error when the model returns no units", async () => {
    const { generate, data } = setup("I could not find any units in this material.");

    const result = await generate(request);

    expect(result).toEqual({
      status: "error",
      units: [],
      message: "Error generating learning units: the model returned no units.",
    });
    expect(data.learningUnits).toEqual([]);
  });

  it("reports a model failure as an error result", async () => {
    const { generate } = setup(new Error("model offline"));

    const result = await generate(request);

    expect(result).toEqual({ status: "error", units: [], message: "Error generating learning units: model offline" });
  });
});

describe("parseUnitsOutput", () => {
  it("takes an array wrapped in prose and drops non-objects", () => {
    expect(parseUnitsOutput('Units:\n[1, {"title": "A"}, "x"]\nDone.')).toEqual([{ title: "A" }]);
  });

  it("takes a single unit object", () => {
    expect(parseUnitsOutput('{"title": "B"}')).toEqual([{ title: "B" }]);
  });

  it("returns nothing for an empty object or plain text", () => {
    expect(parseUnitsOutput("{}")).toEqual([]);
    expect(parseUnitsOutput("no units here")).toEqual([]);
  });
});
