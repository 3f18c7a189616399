// packages/pipeline-backend/src/infrastructure/file-artifact-store.ts
// Filesystem artifact store used for final outputs: <outputDir>/<jobId>_translated.txt.
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { InfrastructureError } from '@doc-relay/contracts';

import type { ArtifactKind, ArtifactStore } from '../domain/artifact-store.js';

const FILE_SUFFIX: Record<ArtifactKind, string> = {
  extraction: '_extracted.json',
  translation: '_translation.json',
  final: '_translated.txt',
};

export class FileArtifactStore implements ArtifactStore {
  private readonly root: string;

  constructor(outputDir: string) {
    this.root = path.resolve(outputDir);
  }

  async save(jobId: string, kind: ArtifactKind, content: string): Promise<string> {
    if (jobId.includes('/') || jobId.includes('\\') || jobId.includes('..')) {
      throw new InfrastructureError(`Refusing to write artifact for unsafe job id: ${jobId}`);
    }
    await mkdir(this.root, { recursive: true });
    const target = path.join(this.root, `${jobId}${FILE_SUFFIX[kind]}`);
    await writeFile(target, content, 'utf8');
    return target;
  }

  async load(ref: string): Promise<string> {
    const resolved = path.resolve(ref);
    if (path.dirname(resolved) !== this.root) {
      throw new InfrastructureError(`Artifact ${ref} is outside ${this.root}`);
    }
    try {
      return await readFile(resolved, 'utf8');
    } catch (error: unknown) {
      throw new InfrastructureError(`Artifact ${ref} could not be read`, { cause: error });
    }
  }
}
