// backend/src/utils/errors.ts

export type ExternalStage = "completion" | "embedding" | "rerank" | "storage";

/** A call to a model or storage collaborator failed or timed out. Never retried. */
export class ExternalCallError extends Error {
  public readonly stage: ExternalStage;
  public readonly timedOut: boolean;

  constructor(stage: ExternalStage, cause: unknown) {
    const timedOut = isTimeout(cause);
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${stage} call failed${timedOut ? " (timeout)" : ""}: ${detail}`);
    this.name = "ExternalCallError";
    this.stage = stage;
    this.timedOut = timedOut;
  }
}

export class DimensionMismatchError extends Error {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Embedding dimension mismatch: expected ${expected}, got ${actual}`);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

function isTimeout(cause: unknown): boolean {
  if (!(cause instanceof Error)) return false;
  return cause.name === "APIConnectionTimeoutError" || cause.name === "TimeoutError" || /timed? ?out/i.test(cause.message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
