// packages/text-chunker/src/plan-chunks.ts
import { splitText } from './split-text.js';

export const PAGE_BREAK = '\f';

export interface TextChunk {
  /** 1-based page number the chunk came from. */
  page: number;
  /** Position of the chunk across the whole document, starting at 0. */
  index: number;
  text: string;
}

export function splitPages(text: string): string[] {
  return text.split(PAGE_BREAK);
}

// planPageChunks.declaration()
// Chunks never span pages, so translated output can be regrouped per page.
export function planPageChunks(pages: readonly string[], maxChars: number): TextChunk[] {
  const chunks: TextChunk[] = [];

  pages.forEach((pageText, pageIndex) => {
    for (const text of splitText(pageText, maxChars)) {
      chunks.push({ page: pageIndex + 1, index: chunks.length, text });
    }
  });

  return chunks;
}
