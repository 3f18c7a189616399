// packages/pipeline-backend/src/application/queue-manager.ts
//
// Owns every read and write of job records and every push onto stage queues.
// - Writes go through a single read-modify-write path guarded by the record revision.
// - A record that turned COMPLETED/FAILED is never written again (JobTerminatedError).
// - A stage visit has one owner: claimJob sets claimedStage, and only that stage may
//   advance, complete or fail the job until the claim is released.
// - Stage hand-off updates the record first, then enqueues.
import { randomUUID } from 'node:crypto';

import {
  JobNotCancellableError,
  JobNotFoundError,
  JobTerminatedError,
  RevisionConflictError,
  StageClaimError,
  ValidationError,
} from '@doc-relay/contracts';

import { publishJobEvent } from '../domain/job-events.js';
import {
  assertValidWrite,
  createJobRecord,
  isTerminal,
  nextStage,
  stageAwaiting,
  type JobPatch,
  type JobRecord,
  type JobStatus,
  type NewJobInput,
  type PipelineStage,
} from '../domain/job-model.js';
import type { JobRecordStore } from '../domain/job-repository.js';
import type { StageQueues } from '../domain/stage-queue.js';
import { noopTaskNotifier, type TaskNotifier } from '../domain/task-notifier.js';
import { createJobLogger, toError } from '../infrastructure/logger.js';
import { metrics } from '../infrastructure/metrics.js';

export const CANCELLED_BY_USER = 'Cancelled by user';

const DEFAULT_MAX_WRITE_ATTEMPTS = 3;

export interface QueueManagerDeps {
  store: JobRecordStore;
  queues: StageQueues;
  notifier?: TaskNotifier;
  now?: () => Date;
  generateId?: () => string;
  maxWriteAttempts?: number;
}

export interface RequeueResult {
  stage: PipelineStage;
  requeued: boolean;
}

export class QueueManager {
  private readonly store: JobRecordStore;
  private readonly queues: StageQueues;
  private readonly notifier: TaskNotifier;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly maxWriteAttempts: number;

  constructor(deps: QueueManagerDeps) {
    this.store = deps.store;
    this.queues = deps.queues;
    this.notifier = deps.notifier ?? noopTaskNotifier;
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
    this.maxWriteAttempts = Math.max(1, deps.maxWriteAttempts ?? DEFAULT_MAX_WRITE_ATTEMPTS);
  }

  // createJob.declaration()
  async createJob(input: NewJobInput): Promise<JobRecord> {
    const job = await this.store.create(createJobRecord(input, this.generateId(), this.now()));
    publishJobEvent({ type: 'job_created', job });

    await this.queues.extraction.push(job.jobId);
    await this.notifyDispatched(job.jobId, 'extraction');

    metrics.increment('jobs.created', 1, { tier: job.tier });
    createJobLogger(job.jobId).info('Job created and enqueued', {
      event: 'job_created',
      tier: job.tier,
      sourceLang: job.sourceLang,
      targetLang: job.targetLang,
    });
    return job;
  }

  async getJob(jobId: string): Promise<JobRecord | null> {
    return this.store.get(jobId);
  }

  // updateJob.declaration()
  // Full overwrite by a caller that already holds `job.revision`; no retry on conflict.
  async updateJob(job: JobRecord): Promise<JobRecord> {
    const current = await this.store.get(job.jobId);
    if (!current) throw new JobNotFoundError(job.jobId);
    if (isTerminal(current.status)) throw new JobTerminatedError(job.jobId, current.status);
    if (current.revision !== job.revision) {
      throw new RevisionConflictError(job.jobId, job.revision);
    }
    return this.write(current, job);
  }

  /**
   * Stage claim: a single revision-guarded write based on the record the worker read.
   * Returns null when the job is already claimed or another writer got there first.
   */
  async claimJob(
    job: JobRecord,
    stage: PipelineStage,
    status: JobStatus,
    progress?: number,
  ): Promise<JobRecord | null> {
    if (job.claimedStage !== null) return null;
    try {
      return await this.write(job, {
        ...job,
        status,
        claimedStage: stage,
        progress: progress ?? job.progress,
      });
    } catch (error: unknown) {
      if (error instanceof RevisionConflictError) return null;
      throw error;
    }
  }

  async updateProgress(jobId: string, progress: number, processedPages?: number): Promise<JobRecord> {
    return this.mutateJob(jobId, (job) => ({
      ...job,
      progress,
      processedPages: processedPages ?? job.processedPages,
    }));
  }

  // advanceJob.declaration()
  // Releases the claim held by `stage` and hands the job to the next stage.
  // Record update first, then enqueue; a crash in between leaves the job recorded but not
  // queued, which requeueJob repairs.
  async advanceJob(
    jobId: string,
    stage: PipelineStage,
    status: JobStatus,
    patch: JobPatch,
  ): Promise<JobRecord> {
    const saved = await this.mutateJob(
      jobId,
      (job) => ({ ...job, ...patch, status, claimedStage: null }),
      stage,
    );

    const next = nextStage(stage);
    if (next) {
      await this.queues[next].push(jobId);
      await this.notifyDispatched(jobId, next);
    }
    return saved;
  }

  // A stage failure is only accepted from the stage holding the claim.
  async failJob(jobId: string, reason: string, stage: PipelineStage | null = null): Promise<JobRecord> {
    const error = reason.trim() || 'Unknown error';
    const failed = await this.mutateJob(
      jobId,
      (job) => ({ ...job, status: 'FAILED', error, claimedStage: null }),
      stage ?? undefined,
    );

    metrics.increment('jobs.failed', 1, { stage: stage ?? undefined });
    createJobLogger(jobId, stage ?? undefined).warn('Job failed', { event: 'job_failed', error });

    try {
      await this.notifier.notifyFailed(jobId, stage, error);
    } catch (notifyError: unknown) {
      this.logNotifyFailure(jobId, 'failed', notifyError);
    }
    return failed;
  }

  async completeJob(
    jobId: string,
    outputRef: string,
    stage: PipelineStage,
  ): Promise<JobRecord> {
    const completed = await this.mutateJob(
      jobId,
      (job) => ({
        ...job,
        status: 'COMPLETED',
        finalOutput: outputRef,
        progress: 100,
        processedPages: job.totalPages,
        claimedStage: null,
      }),
      stage,
    );

    metrics.increment('jobs.completed', 1, { tier: completed.tier });
    createJobLogger(jobId).info('Job completed', { event: 'job_completed', outputRef });
    return completed;
  }

  // cancelJob.declaration()
  async cancelJob(jobId: string): Promise<JobRecord> {
    try {
      const cancelled = await this.mutateJob(jobId, (job) => ({
        ...job,
        status: 'FAILED',
        error: CANCELLED_BY_USER,
      }));
      metrics.increment('jobs.cancelled');
      createJobLogger(jobId).info('Job cancelled', { event: 'job_cancelled' });
      return cancelled;
    } catch (error: unknown) {
      if (error instanceof JobTerminatedError) {
        const message =
          error.status === 'COMPLETED' ? 'Cannot cancel completed job' : 'Job already failed';
        throw new JobNotCancellableError(jobId, message, { cause: error });
      }
      throw error;
    }
  }

  async deleteJob(jobId: string): Promise<boolean> {
    const job = await this.store.get(jobId);
    if (!job) return false;

    const removed = await this.store.delete(jobId);
    if (removed) {
      publishJobEvent({ type: 'job_deleted', job });
      createJobLogger(jobId).info('Job deleted', { event: 'job_deleted', status: job.status });
    }
    return removed;
  }

  // requeueJob.declaration()
  // Re-pushes a job stuck between a record update and its enqueue. A claimed job is being
  // run by a worker and is never pushed again.
  async requeueJob(jobId: string): Promise<RequeueResult> {
    const job = await this.store.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    if (isTerminal(job.status)) throw new JobTerminatedError(jobId, job.status);
    if (job.claimedStage !== null) {
      throw new ValidationError(
        `Job ${jobId} is being processed by the ${job.claimedStage} stage`,
        'job_claimed',
      );
    }

    const stage = stageAwaiting(job.status);
    if (!stage) {
      throw new ValidationError(
        `Job ${jobId} is ${job.status}; only jobs waiting for a stage can be requeued`,
        'not_requeueable',
      );
    }

    const queue = this.queues[stage];
    if (await queue.contains(jobId)) {
      return { stage, requeued: false };
    }

    await queue.push(jobId);
    await this.notifyDispatched(jobId, stage);
    createJobLogger(jobId, stage).info('Job requeued', { event: 'job_requeued' });
    return { stage, requeued: true };
  }

  async queueStatus(): Promise<Record<PipelineStage, number>> {
    const [extraction, chunking, translation, reconstruction] = await Promise.all([
      this.queues.extraction.length(),
      this.queues.chunking.length(),
      this.queues.translation.length(),
      this.queues.reconstruction.length(),
    ]);
    return { extraction, chunking, translation, reconstruction };
  }

  async activeJobs(limit = 10): Promise<JobRecord[]> {
    return this.store.listActive(limit);
  }

  // mutateJob.declaration()
  // Re-read, refuse terminal records, check the claim, apply, validate, compare-and-set;
  // retry on conflict.
  private async mutateJob(
    jobId: string,
    change: (job: JobRecord) => JobRecord,
    claimedBy?: PipelineStage,
  ): Promise<JobRecord> {
    for (let attempt = 1; ; attempt++) {
      const current = await this.store.get(jobId);
      if (!current) throw new JobNotFoundError(jobId);
      if (isTerminal(current.status)) throw new JobTerminatedError(jobId, current.status);
      if (claimedBy !== undefined && current.claimedStage !== claimedBy) {
        throw new StageClaimError(jobId, claimedBy, current.claimedStage);
      }

      try {
        return await this.write(current, change(current));
      } catch (error: unknown) {
        if (!(error instanceof RevisionConflictError) || attempt >= this.maxWriteAttempts) {
          throw error;
        }
        createJobLogger(jobId).debug('Revision conflict; re-reading job', {
          event: 'revision_conflict',
          attempt,
        });
      }
    }
  }

  private async write(current: JobRecord, next: JobRecord): Promise<JobRecord> {
    const candidate: JobRecord = { ...next, revision: current.revision, updatedAt: this.now() };
    assertValidWrite(current, candidate);

    const saved = await this.store.put(candidate);
    publishJobEvent({ type: 'job_updated', job: saved });
    return saved;
  }

  private async notifyDispatched(jobId: string, stage: PipelineStage): Promise<void> {
    try {
      await this.notifier.notifyDispatched(jobId, stage);
    } catch (error: unknown) {
      this.logNotifyFailure(jobId, 'dispatched', error);
    }
  }

  private logNotifyFailure(jobId: string, action: string, error: unknown): void {
    createJobLogger(jobId).warn('Task notification failed', {
      event: 'notify_failed',
      action,
      error: toError(error).message,
    });
  }
}
