// backend/src/ai/jsonBlock.ts

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Greedy: from the first "{" to the last "}", tolerating prose around it. */
export function extractJsonBlock(text: string): string | null {
  const raw = String(text || "").trim();
  if (!raw) return null;
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start >= 0 && end > start) {
    return raw.slice(start, end + 1);
  }
  return null;
}

/** Parses the first object block in model output; {} when there is none or it is malformed. */
export function parseJsonObject(text: string): Record<string, unknown> {
  const block = extractJsonBlock(text);
  if (!block) return {};
  try {
    const parsed: unknown = JSON.parse(block);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export function parseJsonArray(text: string): unknown[] | null {
  const raw = String(text || "");
  const start = raw.indexOf("[");
  const end = raw.lastIndexOf("]");
  if (start < 0 || end <= start) return null;
  try {
    const parsed: unknown = JSON.parse(raw.slice(start, end + 1));
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
