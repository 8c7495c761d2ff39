// backend/src/dispatch/bookmarks.ts
// Bookmarks live in Session.metadata.bookmarks.

import { z } from "zod";
import type { Metadata } from "../types";

const bookmarkSchema = z.object({
  documentId: z.string(),
  page: z.number().int().positive(),
  createdAt: z.string(),
});

export type Bookmark = z.infer<typeof bookmarkSchema>;

export function readBookmarks(metadata: Metadata | null | undefined): Bookmark[] {
  const raw = metadata?.bookmarks;
  if (!Array.isArray(raw)) return [];
  const out: Bookmark[] = [];
  for (const item of raw) {
    const parsed = bookmarkSchema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}

/** Same document and page replaces the older entry. */
export function withBookmark(existing: Bookmark[], next: Bookmark): Bookmark[] {
  return [...existing.filter((b) => b.documentId !== next.documentId || b.page !== next.page), next];
}
