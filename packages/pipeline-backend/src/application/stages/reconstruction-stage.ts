// packages/pipeline-backend/src/application/stages/reconstruction-stage.ts
//
// RECONSTRUCTING -> COMPLETED. Regroups translated chunks per page and writes the output.
import type { ArtifactStore } from '../../domain/artifact-store.js';
import { decodeTranslationArtifact, type TranslatedChunk } from '../../domain/artifacts.js';
import type { JobRecord } from '../../domain/job-model.js';
import { PROGRESS } from '../../domain/progress.js';
import type { Logger } from '../../infrastructure/logger.js';
import { attempt, fail, succeed, type StageOutcome, type StageResult } from '../stage-outcome.js';
import type { StageHandler } from './stage-handler.js';

export function pageDelimiter(page: number): string {
  return `--- Page ${page} ---`;
}

// assembleDocument.declaration()
// One section per page in ascending order; pages without text keep their delimiter.
export function assembleDocument(chunks: readonly TranslatedChunk[], totalPages: number): string {
  const lastPage = chunks.reduce((max, chunk) => Math.max(max, chunk.page), totalPages);
  const sections: string[] = [];

  for (let page = 1; page <= lastPage; page++) {
    const texts = chunks
      .filter((chunk) => chunk.page === page)
      .sort((a, b) => a.index - b.index)
      .map((chunk) => chunk.text);
    sections.push(
      texts.length > 0 ? `${pageDelimiter(page)}\n${texts.join('\n\n')}` : pageDelimiter(page),
    );
  }

  return sections.join('\n\n');
}

export interface ReconstructionStageDeps {
  artifacts: ArtifactStore;
  outputs: ArtifactStore;
}

export class ReconstructionStage implements StageHandler {
  readonly stage = 'reconstruction' as const;
  readonly claimStatus = 'RECONSTRUCTING' as const;
  readonly claimProgress = PROGRESS.reconstructionClaimed;

  constructor(private readonly deps: ReconstructionStageDeps) {}

  async run(job: JobRecord, log: Logger): Promise<StageOutcome<StageResult>> {
    const ref = job.translationOutput;
    if (!ref) return fail('Translation output missing');

    const translation = await attempt(async () =>
      decodeTranslationArtifact(await this.deps.artifacts.load(ref)),
    );
    if (!translation.ok) return translation;

    const document = assembleDocument(translation.value.chunks, job.totalPages);
    const output = await attempt(() => this.deps.outputs.save(job.jobId, 'final', document));
    if (!output.ok) return output;

    log.info('Output written', { event: 'output_written', outputRef: output.value });
    return succeed<StageResult>({ kind: 'complete', outputRef: output.value });
  }
}
