// backend/src/agents/tutoringDetection.ts

import indicators from "./data/tutoringIndicators.json";

const TUTORING_INDICATORS: readonly string[] = indicators;

export function isTutoringRequest(query: string): boolean {
  const lowered = String(query || "").toLowerCase();
  return TUTORING_INDICATORS.some((k) => lowered.includes(k));
}
