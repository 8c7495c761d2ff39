//backend/src/config/featureFlags.ts

function readFlag(name: string): boolean | null {
  const raw = String(process.env[name] || "").toLowerCase().trim();
  if (!raw) return null;
  return raw === "1" || raw === "true";
}

export function isRerankEnabled(): boolean {
  return readFlag("RERANK_ENABLED") ?? false;
}

// on unless explicitly switched off
export function isTutorDelegationEnabled(): boolean {
  return readFlag("TUTOR_DELEGATION_ENABLED") ?? true;
}
