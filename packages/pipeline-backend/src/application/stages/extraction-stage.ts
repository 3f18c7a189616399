// packages/pipeline-backend/src/application/stages/extraction-stage.ts
//
// PENDING -> EXTRACTING (claim) -> CHUNKING.
// Pages are stored as an intermediate artifact; progress moves through 0..25 per page.
import type { ArtifactStore } from '../../domain/artifact-store.js';
import { encodeExtractionArtifact } from '../../domain/artifacts.js';
import type { JobRecord } from '../../domain/job-model.js';
import { extractionProgress, PROGRESS } from '../../domain/progress.js';
import type { ExtractorRegistry } from '../../infrastructure/extractors/extractor-registry.js';
import type { Logger } from '../../infrastructure/logger.js';
import type { QueueManager } from '../queue-manager.js';
import { attempt, fail, succeed, type StageOutcome, type StageResult } from '../stage-outcome.js';
import type { StageHandler } from './stage-handler.js';

export const NO_TEXT_EXTRACTED = 'Extraction produced no text';

export interface ExtractionStageDeps {
  manager: QueueManager;
  extractors: ExtractorRegistry;
  artifacts: ArtifactStore;
}

export class ExtractionStage implements StageHandler {
  readonly stage = 'extraction' as const;
  readonly claimStatus = 'EXTRACTING' as const;
  readonly claimProgress = PROGRESS.extractionStart;

  constructor(private readonly deps: ExtractionStageDeps) {}

  async run(job: JobRecord, log: Logger): Promise<StageOutcome<StageResult>> {
    const { manager, extractors, artifacts } = this.deps;

    const extractor = await attempt(async () => extractors.resolve(job.sourcePath));
    if (!extractor.ok) return extractor;

    const pages = await attempt(() =>
      extractor.value.extract(job.sourcePath, async (done, total) => {
        await manager.updateProgress(job.jobId, extractionProgress(done, total));
      }),
    );
    if (!pages.ok) return pages;

    if (pages.value.every((page) => page.trim().length === 0)) {
      return fail(NO_TEXT_EXTRACTED);
    }

    const ref = await attempt(() =>
      artifacts.save(job.jobId, 'extraction', encodeExtractionArtifact({ pages: pages.value })),
    );
    if (!ref.ok) return ref;

    log.info('Extraction finished', { event: 'extraction_done', pages: pages.value.length });

    return succeed<StageResult>({
      kind: 'advance',
      status: 'CHUNKING',
      patch: {
        extractionOutput: ref.value,
        totalPages: pages.value.length,
        progress: PROGRESS.extractionEnd,
      },
    });
  }
}
