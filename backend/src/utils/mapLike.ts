// backend/src/utils/mapLike.ts
// Mongoose Map paths are Maps on hydrated documents and plain objects on lean ones.

export type MapLike<V> = Map<string, V> | Record<string, V> | null | undefined;

export function mapLikeEntries<V>(m: MapLike<V>): [string, V][] {
  if (!m) return [];
  if (m instanceof Map) return Array.from(m.entries());
  return Object.entries(m);
}

export function mapLikeToRecord<V>(m: MapLike<V>): Record<string, V> {
  return Object.fromEntries(mapLikeEntries(m));
}
