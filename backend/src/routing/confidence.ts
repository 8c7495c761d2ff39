// backend/src/routing/confidence.ts

// a model that omits its confidence is trusted at this level
const MISSING_CONFIDENCE = 0.8;

export function readConfidence(value: unknown): number {
  if (value === undefined) return MISSING_CONFIDENCE;
  const n = typeof value === "number" ? value : typeof value === "string" && value.trim() ? Number(value) : NaN;
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

export function readDetails(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function pickFromVocabulary<T extends string>(
  value: unknown,
  vocabulary: readonly T[],
  aliases: Partial<Record<string, T>> = {}
): T | null {
  if (typeof value !== "string") return null;
  const key = value.trim().toLowerCase();
  if (!key) return null;
  return aliases[key] ?? vocabulary.find((v) => v === key) ?? null;
}
