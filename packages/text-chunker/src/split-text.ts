// packages/text-chunker/src/split-text.ts
//
// Size-bounded text splitting.
// Paragraphs (blank-line separated) are packed first; a paragraph that does not fit on its
// own is split on sentence ends, and a sentence that still does not fit is hard-cut.

const PARAGRAPH_BREAK = /\n[ \t]*\n/;
// Latin sentence ends need trailing whitespace; CJK full-width ends split without it.
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+|(?<=[。！？])\s*/u;

// splitText.declaration()
export function splitText(text: string, maxChars: number): string[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(`maxChars must be a positive integer (got ${maxChars})`);
  }

  const normalized = text.replace(/\r\n?/g, '\n').trim();
  if (normalized.length === 0) return [];
  if (normalized.length <= maxChars) return [normalized];

  const paragraphs = normalized
    .split(PARAGRAPH_BREAK)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);

  const chunks: string[] = [];
  const packer = createPacker(maxChars, '\n\n', chunks);

  for (const paragraph of paragraphs) {
    if (paragraph.length > maxChars) {
      packer.flush();
      chunks.push(...splitParagraph(paragraph, maxChars));
      continue;
    }
    packer.add(paragraph);
  }
  packer.flush();

  return chunks;
}

function splitParagraph(paragraph: string, maxChars: number): string[] {
  const chunks: string[] = [];
  const packer = createPacker(maxChars, ' ', chunks);

  for (const sentence of paragraph.split(SENTENCE_BOUNDARY)) {
    if (sentence.length === 0) continue;
    if (sentence.length > maxChars) {
      packer.flush();
      chunks.push(...hardCut(sentence, maxChars));
      continue;
    }
    packer.add(sentence);
  }
  packer.flush();

  return chunks;
}

function hardCut(text: string, maxChars: number): string[] {
  const pieces: string[] = [];
  for (let offset = 0; offset < text.length; offset += maxChars) {
    const piece = text.slice(offset, offset + maxChars).trim();
    if (piece.length > 0) pieces.push(piece);
  }
  return pieces;
}

function createPacker(maxChars: number, separator: string, out: string[]) {
  let current = '';

  return {
    add(piece: string): void {
      if (current.length === 0) {
        current = piece;
      } else if (current.length + separator.length + piece.length <= maxChars) {
        current += separator + piece;
      } else {
        out.push(current);
        current = piece;
      }
    },
    flush(): void {
      if (current.length > 0) out.push(current);
      current = '';
    },
  };
}
