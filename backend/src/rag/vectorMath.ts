// backend/src/rag/vectorMath.ts

import { DimensionMismatchError } from "../utils/errors";

/** 1 - cos(a, b), in [0, 2]. A zero vector is treated as orthogonal to everything. */
export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) throw new DimensionMismatchError(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 1;
  const cos = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return 1 - Math.min(1, Math.max(-1, cos));
}

/**
 * Exact nearest-neighbour ranking. Ascending distance; Array.prototype.sort
 * is stable, so equal distances keep their input order.
 */
export function rankByCosineDistance<T extends { embedding: number[] }>(
  query: number[],
  items: T[],
  k: number
): { item: T; distance: number }[] {
  return items
    .map((item) => ({ item, distance: cosineDistance(query, item.embedding) }))
    .sort((x, y) => x.distance - y.distance)
    .slice(0, Math.max(0, k));
}
