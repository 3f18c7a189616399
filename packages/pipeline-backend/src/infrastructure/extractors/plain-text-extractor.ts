// packages/pipeline-backend/src/infrastructure/extractors/plain-text-extractor.ts
// Extractor for plain-text documents. Pages are separated by form feeds.
import { readFile } from 'node:fs/promises';

import { InfrastructureError } from '@doc-relay/contracts';
import { splitPages } from '@doc-relay/text-chunker';

import type {
  DocumentExtractor,
  ExtractionProgressListener,
} from '../../domain/document-extractor.js';

export class PlainTextExtractor implements DocumentExtractor {
  readonly extensions = ['.txt', '.text', '.md'] as const;

  async countPages(path: string): Promise<number> {
    return (await this.readPages(path)).length;
  }

  async extract(path: string, onProgress?: ExtractionProgressListener): Promise<string[]> {
    const pages = await this.readPages(path);

    for (let done = 1; done <= pages.length; done++) {
      await onProgress?.(done, pages.length);
    }

    return pages;
  }

  private async readPages(path: string): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error: unknown) {
      throw new InfrastructureError(`Cannot read source document ${path}`, { cause: error });
    }

    const pages = splitPages(content.replace(/^\uFEFF/, ''));
    // A trailing form feed does not open another page.
    if (pages.length > 1 && pages[pages.length - 1] === '') {
      pages.pop();
    }
    return pages;
  }
}
