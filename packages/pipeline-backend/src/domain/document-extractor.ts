// packages/pipeline-backend/src/domain/document-extractor.ts
//
// Extraction collaborator: turns a source document into page texts.

export type ExtractionProgressListener = (pagesDone: number, totalPages: number) => Promise<void>;

export interface DocumentExtractor {
  /** Lower-case extensions including the dot, e.g. ".txt". */
  readonly extensions: readonly string[];
  countPages(path: string): Promise<number>;
  extract(path: string, onProgress?: ExtractionProgressListener): Promise<string[]>;
}
