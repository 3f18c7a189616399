// packages/pipeline-backend/src/domain/artifact-store.ts
//
// Storage for stage outputs. Records only hold the returned reference.

export type ArtifactKind = 'extraction' | 'translation' | 'final';

export interface ArtifactStore {
  save(jobId: string, kind: ArtifactKind, content: string): Promise<string>;
  /** Throws when the reference is unknown or expired. */
  load(ref: string): Promise<string>;
}
