// packages/pipeline-backend/src/application/stages/translation-stage.ts
//
// TRANSLATING -> RECONSTRUCTING.
// - Claim sets the 30% hand-off mark; planning the chunks sets 40%.
// - Small documents go out as one batch call, falling back to per-chunk calls if it fails.
// - Progress (40..80) and processedPages are persisted as chunks or pages complete.
import { planPageChunks, type TextChunk } from '@doc-relay/text-chunker';

import type { ArtifactStore } from '../../domain/artifact-store.js';
import {
  decodeExtractionArtifact,
  encodeTranslationArtifact,
  type TranslatedChunk,
} from '../../domain/artifacts.js';
import type { JobRecord } from '../../domain/job-model.js';
import { PROGRESS, translationProgress } from '../../domain/progress.js';
import type { Translator } from '../../domain/translator.js';
import type { Logger } from '../../infrastructure/logger.js';
import type { QueueManager } from '../queue-manager.js';
import { attempt, fail, succeed, type StageOutcome, type StageResult } from '../stage-outcome.js';
import type { StageHandler } from './stage-handler.js';

export interface TranslationStageDeps {
  manager: QueueManager;
  artifacts: ArtifactStore;
  translator: Translator;
  chunkSize: number;
  batchThreshold: number;
}

export class TranslationStage implements StageHandler {
  readonly stage = 'translation' as const;
  readonly claimStatus = 'TRANSLATING' as const;
  readonly claimProgress = PROGRESS.translationClaimed;

  constructor(private readonly deps: TranslationStageDeps) {}

  async run(job: JobRecord, log: Logger): Promise<StageOutcome<StageResult>> {
    const { manager, artifacts, chunkSize, batchThreshold } = this.deps;

    const ref = job.extractionOutput;
    if (!ref) return fail('Extraction output missing');

    const extracted = await attempt(async () => decodeExtractionArtifact(await artifacts.load(ref)));
    if (!extracted.ok) return extracted;

    const pages = extracted.value.pages;
    const chunks = planPageChunks(pages, chunkSize);
    await manager.updateProgress(job.jobId, PROGRESS.translationPlanned);
    log.info('Translation planned', {
      event: 'translation_planned',
      chunks: chunks.length,
      pages: pages.length,
    });

    let translated: TranslatedChunk[] | null = null;
    if (chunks.length > 0 && chunks.length <= batchThreshold) {
      translated = await this.translateAsBatch(job, chunks, log);
    }
    if (!translated) {
      const perChunk = await this.translateEach(job, chunks);
      if (!perChunk.ok) return perChunk;
      translated = perChunk.value;
    }

    const artifact = encodeTranslationArtifact({ chunks: translated });
    const saved = await attempt(() => artifacts.save(job.jobId, 'translation', artifact));
    if (!saved.ok) return saved;

    return succeed<StageResult>({
      kind: 'advance',
      status: 'RECONSTRUCTING',
      patch: {
        translationOutput: saved.value,
        progress: PROGRESS.translationEnd,
        processedPages: pages.length,
      },
    });
  }

  // Returns null when the batch call fails or returns the wrong number of translations, so the
  // caller can retry chunk by chunk.
  private async translateAsBatch(
    job: JobRecord,
    chunks: TextChunk[],
    log: Logger,
  ): Promise<TranslatedChunk[] | null> {
    const { manager, translator } = this.deps;

    const batch = await attempt(() =>
      translator.translateBatch(
        chunks.map((chunk) => chunk.text),
        job.sourceLang,
        job.targetLang,
        job.tier,
      ),
    );
    const texts = batch.ok ? batch.value : [];
    if (!batch.ok || texts.length !== chunks.length) {
      log.warn('Batch translation failed; falling back to per-chunk calls', {
        event: 'batch_fallback',
        error: batch.ok
          ? `Expected ${chunks.length} translations, got ${texts.length}`
          : batch.reason,
      });
      return null;
    }

    const translated: TranslatedChunk[] = [];
    for (const [i, chunk] of chunks.entries()) {
      const text = texts[i];
      if (text === undefined) return null;
      translated.push({ page: chunk.page, index: chunk.index, text });
    }

    let done = 0;
    for (const page of new Set(chunks.map((chunk) => chunk.page))) {
      done += chunks.filter((chunk) => chunk.page === page).length;
      await manager.updateProgress(job.jobId, translationProgress(done, chunks.length), page);
    }
    return translated;
  }

  private async translateEach(
    job: JobRecord,
    chunks: TextChunk[],
  ): Promise<StageOutcome<TranslatedChunk[]>> {
    const { manager, translator } = this.deps;
    const translated: TranslatedChunk[] = [];

    for (const [i, chunk] of chunks.entries()) {
      const text = await attempt(() =>
        translator.translate(chunk.text, job.sourceLang, job.targetLang, job.tier),
      );
      if (!text.ok) return text;

      translated.push({ page: chunk.page, index: chunk.index, text: text.value });

      const pageFinished = chunks[i + 1]?.page !== chunk.page;
      await manager.updateProgress(
        job.jobId,
        translationProgress(i + 1, chunks.length),
        pageFinished ? chunk.page : undefined,
      );
    }

    return succeed(translated);
  }
}
