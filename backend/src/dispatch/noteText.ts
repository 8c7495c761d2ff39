// backend/src/dispatch/noteText.ts

import type { ActionArguments } from "../types";
import { normalizeDigits } from "../utils/text";

export type ExtractedNote = {
  noteText: string | null;
  page: number | null;
};

// "page 12", "on p. 3", "pg 4", "في صفحة ٨", "ص 5"
const PAGE_REF = /(?:^|\s)(?:(?:on|in|at|في|ف)\s+)?(?:page|pg\.?|p\.?|صفحة|صفحه|ص)\s*(\d+)/i;

const QUOTED = [/\(([^)]+)\)/, /"([^"]+)"/, /“([^”]+)”/, /«([^»]+)»/];

const COMMAND_PREFIXES = [
  /^(?:please\s+)?(?:add|create|write|make|take|save)\s+(?:a\s+)?(?:new\s+)?note(?:\s+(?:that|saying))?\s*[:\-]?\s*/i,
  /^note\s*:\s*/i,
  /^(?:زود|زوّد|اضف|أضف|ضيف|حطلي|حط|اكتب)\s*(?:لي\s+)?(?:نوت[ةه]|ملاحظ[ةه]|نوت)\s*[:\-]?\s*/,
];

const DANGLING = /\s+(?:on|in|at|في)$/i;

export function extractPage(text: string): number | null {
  const m = PAGE_REF.exec(normalizeDigits(text));
  if (!m?.[1]) return null;
  const n = Number(m[1]);
  return n > 0 ? n : null;
}

/**
 * Free-text note extraction. Quoted or parenthesised text wins; otherwise the
 * command words are stripped. The page reference never ends up in the note.
 */
export function extractNoteFromText(utterance: string): ExtractedNote {
  const normalized = normalizeDigits(String(utterance || "")).trim();
  const page = extractPage(normalized);

  for (const pattern of QUOTED) {
    const quoted = pattern.exec(normalized)?.[1]?.trim();
    if (quoted) return { noteText: quoted, page };
  }

  let body = normalized.replace(PAGE_REF, " ").replace(/\s+/g, " ").trim();
  for (const prefix of COMMAND_PREFIXES) {
    body = body.replace(prefix, "");
  }
  body = body.replace(DANGLING, "").trim();

  return { noteText: body || null, page };
}

/** Structured router arguments first, free text for whatever they lack. */
export function resolveNote(args: ActionArguments, utterance: string): ExtractedNote {
  const fromText = extractNoteFromText(utterance);
  return {
    noteText: args.noteText?.trim() || fromText.noteText,
    page: args.pageNum ?? fromText.page,
  };
}
