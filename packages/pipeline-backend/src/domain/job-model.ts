// packages/pipeline-backend/src/domain/job-model.ts

// Job domain model for the translation pipeline.
// One record per job; every stage worker reads and writes the same record.

import {
  InvalidTransitionError,
  PIPELINE_STAGES,
  ProgressRegressionError,
  StageClaimError,
  WriteOnceFieldError,
  type JobStatus,
  type PipelineStage,
  type TranslationTier,
} from '@doc-relay/contracts';

export type { JobStatus, PipelineStage, TranslationTier };

export interface JobRecord {
  jobId: string;
  sourcePath: string;
  sourceLang: string;
  targetLang: string;
  tier: TranslationTier;
  status: JobStatus;
  progress: number;
  totalPages: number;
  processedPages: number;
  extractionOutput: string | null;
  translationOutput: string | null;
  finalOutput: string | null;
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
  /** Optimistic concurrency token; the store bumps it on every write. */
  revision: number;
  /** Stage currently running this job; null while it waits in a queue. */
  claimedStage: PipelineStage | null;
  fileType: string | null;
  fileSizeBytes: number | null;
  estimatedTime: string | null;
}

export interface NewJobInput {
  sourcePath: string;
  sourceLang: string;
  targetLang: string;
  tier: TranslationTier;
  totalPages?: number;
  fileType?: string;
  fileSizeBytes?: number;
  estimatedTime?: string;
}

/** Fields a stage may set while advancing a job. */
export type JobPatch = Partial<
  Pick<
    JobRecord,
    | 'progress'
    | 'totalPages'
    | 'processedPages'
    | 'extractionOutput'
    | 'translationOutput'
    | 'finalOutput'
  >
>;

const WRITE_ONCE_FIELDS = ['extractionOutput', 'translationOutput', 'finalOutput'] as const;

// Status a job must carry, unclaimed, when popped from each stage's queue.
export const STAGE_AWAITING_STATUS: Record<PipelineStage, JobStatus> = {
  extraction: 'PENDING',
  chunking: 'CHUNKING',
  translation: 'TRANSLATING',
  reconstruction: 'RECONSTRUCTING',
};

export function isTerminal(status: JobStatus): boolean {
  return status === 'COMPLETED' || status === 'FAILED';
}

export function nextStage(stage: PipelineStage): PipelineStage | null {
  const index = PIPELINE_STAGES.indexOf(stage);
  return PIPELINE_STAGES[index + 1] ?? null;
}

/** Stage whose queue a job in `status` is waiting on, if any. */
export function stageAwaiting(status: JobStatus): PipelineStage | null {
  return PIPELINE_STAGES.find((stage) => STAGE_AWAITING_STATUS[stage] === status) ?? null;
}

// createJobRecord.declaration()
export function createJobRecord(input: NewJobInput, jobId: string, now: Date): JobRecord {
  return {
    jobId,
    sourcePath: input.sourcePath,
    sourceLang: input.sourceLang,
    targetLang: input.targetLang,
    tier: input.tier,
    status: 'PENDING',
    progress: 0,
    totalPages: input.totalPages ?? 0,
    processedPages: 0,
    extractionOutput: null,
    translationOutput: null,
    finalOutput: null,
    error: null,
    createdAt: now,
    updatedAt: now,
    revision: 1,
    claimedStage: null,
    fileType: input.fileType ?? null,
    fileSizeBytes: input.fileSizeBytes ?? null,
    estimatedTime: input.estimatedTime ?? null,
  };
}

// canTransition.declaration()
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  if (isTerminal(from)) return false;
  // Non-terminal self transitions carry progress updates and stage claims.
  // Ownership of the visit is tracked by claimedStage, not by the status.
  if (from === to) return true;
  if (to === 'FAILED') return true;

  switch (from) {
    case 'PENDING':
      return to === 'EXTRACTING';
    case 'EXTRACTING':
      return to === 'CHUNKING';
    case 'CHUNKING':
      return to === 'TRANSLATING';
    case 'TRANSLATING':
      return to === 'RECONSTRUCTING';
    case 'RECONSTRUCTING':
      return to === 'COMPLETED';
    default:
      return false;
  }
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

// assertValidWrite.declaration()
// Record-level rules checked before any write replaces `prev` with `next`.
export function assertValidWrite(prev: JobRecord, next: JobRecord): void {
  assertTransition(prev.status, next.status);

  if (next.status !== 'FAILED' && next.progress < prev.progress) {
    throw new ProgressRegressionError(prev.jobId, prev.progress, next.progress);
  }
  if (next.progress < 0 || next.progress > 100) {
    throw new RangeError(`Progress must be within 0..100 (got ${next.progress})`);
  }
  if (next.processedPages > next.totalPages) {
    throw new RangeError(
      `processedPages (${next.processedPages}) exceeds totalPages (${next.totalPages})`,
    );
  }

  if (
    prev.claimedStage !== null &&
    next.claimedStage !== null &&
    next.claimedStage !== prev.claimedStage
  ) {
    throw new StageClaimError(prev.jobId, next.claimedStage, prev.claimedStage);
  }

  for (const field of WRITE_ONCE_FIELDS) {
    const before = prev[field];
    if (before !== null && next[field] !== before) {
      throw new WriteOnceFieldError(prev.jobId, field);
    }
  }

  if (next.finalOutput !== null && next.status !== 'COMPLETED') {
    throw new InvalidTransitionError(prev.status, next.status, {
      cause: new Error('finalOutput may only be set on completion'),
    });
  }
  if (next.error !== null && next.status !== 'FAILED') {
    throw new InvalidTransitionError(prev.status, next.status, {
      cause: new Error('error may only be set on failure'),
    });
  }
}
