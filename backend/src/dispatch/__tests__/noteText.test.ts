// backend/src/dispatch/__tests__/noteText.test.ts

import { describe, expect, it } from "vitest";
import { extractNoteFromText, extractPage, resolveNote } from "../noteText";

describe("extractNoteFromText", () => {
  it("takes quoted text and the page reference", () => {
    expect(extractNoteFromText('Add note "revise this" on page 12')).toEqual({ noteText: "revise this", page: 12 });
  });

  it("reads parenthesised Arabic notes with Arabic-Indic page digits", () => {
    expect(extractNoteFromText("(حلو اوي) زود نوته في صفحة ٨")).toEqual({ noteText: "حلو اوي", page: 8 });
  });

  it("strips the English command phrase and the page reference", () => {
    expect(extractNoteFromText("add a note remember the formula on page 3")).toEqual({
      noteText: "remember the formula",
      page: 3,
    });
  });

  it("strips the Arabic command phrase", () => {
    expect(extractNoteFromText("زود نوتة ذاكر دي كويس")).toEqual({ noteText: "ذاكر دي كويس", page: null });
  });

  it("returns no text for a bare command", () => {
    expect(extractNoteFromText("add note")).toEqual({ noteText: null, page: null });
  });
});

describe("extractPage", () => {
  it("understands short page forms", () => {
    expect(extractPage("see p. 7")).toBe(7);
    expect(extractPage("pg 4 please")).toBe(4);
    expect(extractPage("ص ١٥")).toBe(15);
  });

  it("ignores numbers that are not page references", () => {
    expect(extractPage("chapter 2 has 30 problems")).toBeNull();
  });
});

describe("resolveNote", () => {
  it("prefers structured arguments and fills gaps from the utterance", () => {
    expect(
      resolveNote({ docId: null, pageNum: null, noteText: "from the router" }, "add note x on page 2")
    ).toEqual({ noteText: "from the router", page: 2 });
  });
});
