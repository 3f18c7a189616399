// packages/pipeline-backend/src/infrastructure/extractors/extractor-registry.ts
import path from 'node:path';

import { ValidationError } from '@doc-relay/contracts';

import type { DocumentExtractor } from '../../domain/document-extractor.js';

export class ExtractorRegistry {
  constructor(private readonly extractors: readonly DocumentExtractor[]) {}

  supportedExtensions(): string[] {
    return this.extractors.flatMap((extractor) => [...extractor.extensions]);
  }

  // resolve.declaration()
  // Throws ValidationError for extensions no extractor handles.
  resolve(filePath: string): DocumentExtractor {
    const extension = path.extname(filePath).toLowerCase();
    const extractor = this.extractors.find((candidate) => candidate.extensions.includes(extension));
    if (!extractor) {
      throw new ValidationError(
        `Unsupported file type "${extension || '(none)'}". Supported: ${this.supportedExtensions().join(', ')}`,
        'unsupported_file_type',
      );
    }
    return extractor;
  }
}
