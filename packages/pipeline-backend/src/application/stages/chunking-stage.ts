// packages/pipeline-backend/src/application/stages/chunking-stage.ts
//
// CHUNKING -> TRANSLATING. Chunks are planned by the translation stage; this stage only
// checks that the extraction artifact is still readable before handing off.
import type { ArtifactStore } from '../../domain/artifact-store.js';
import { decodeExtractionArtifact } from '../../domain/artifacts.js';
import type { JobRecord } from '../../domain/job-model.js';
import type { Logger } from '../../infrastructure/logger.js';
import { attempt, fail, succeed, type StageOutcome, type StageResult } from '../stage-outcome.js';
import type { StageHandler } from './stage-handler.js';

export class ChunkingStage implements StageHandler {
  readonly stage = 'chunking' as const;
  readonly claimStatus = 'CHUNKING' as const;

  constructor(private readonly artifacts: ArtifactStore) {}

  async run(job: JobRecord, log: Logger): Promise<StageOutcome<StageResult>> {
    const ref = job.extractionOutput;
    if (!ref) return fail('Extraction output missing');

    const extracted = await attempt(async () => decodeExtractionArtifact(await this.artifacts.load(ref)));
    if (!extracted.ok) return extracted;

    log.debug('Extraction output verified', { pages: extracted.value.pages.length });
    return succeed<StageResult>({ kind: 'advance', status: 'TRANSLATING', patch: {} });
  }
}
