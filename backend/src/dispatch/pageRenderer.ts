// backend/src/dispatch/pageRenderer.ts

import type { DocumentRecord } from "../types";

export type RenderedPage = {
  pageNumber: number;
  mimeType: string;
  /** base64 payload, ready to send to a client */
  data: string;
};

export type PageRenderer = {
  render: (doc: DocumentRecord, pageNumbers: number[]) => Promise<RenderedPage[]>;
};

/**
 * Ships each page's extracted text. A rasterizing renderer can replace it
 * behind the same contract.
 */
export const textPageRenderer: PageRenderer = {
  async render(doc, pageNumbers) {
    return pageNumbers.map((pageNumber) => ({
      pageNumber,
      mimeType: "text/plain; charset=utf-8",
      data: Buffer.from(doc.pages[String(pageNumber)] ?? "", "utf8").toString("base64"),
    }));
  },
};

export function pageNumbersOf(doc: DocumentRecord): number[] {
  return Object.keys(doc.pages)
    .map(Number)
    .filter((n) => Number.isInteger(n) && n > 0)
    .sort((a, b) => a - b);
}
