import {
  InvalidTransitionError,
  JobNotCancellableError,
  JobNotFoundError,
  JobTerminatedError,
  RevisionConflictError,
  StageClaimError,
  ValidationError,
} from '@doc-relay/contracts';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { CANCELLED_BY_USER, QueueManager } from '../src/application/queue-manager.js';
import * as jobEvents from '../src/domain/job-events.js';
import type { JobRecord } from '../src/domain/job-model.js';
import {
  createInMemoryQueues,
  FIXED_NOW,
  InMemoryJobStore,
  makeJob,
  RecordingNotifier,
} from './support/in-memory.js';

const LATER = new Date('2024-01-01T10:05:00.000Z');

describe('application/queue-manager', () => {
  /**
   * Intent:
   * - Single owner of record writes and queue pushes.
   * - Revision-guarded writes; terminal records are never rewritten.
   * - Cancellation, deletion and requeue semantics.
   */

  let store: InMemoryJobStore;
  let queues: ReturnType<typeof createInMemoryQueues>;
  let notifier: RecordingNotifier;
  let manager: QueueManager;
  const publishSpy = vi.spyOn(jobEvents, 'publishJobEvent');

  beforeEach(() => {
    publishSpy.mockClear();
    store = new InMemoryJobStore();
    queues = createInMemoryQueues();
    notifier = new RecordingNotifier();
    manager = new QueueManager({
      store,
      queues,
      notifier,
      now: () => LATER,
      generateId: () => 'job-1',
    });
  });

  async function seed(overrides: Partial<JobRecord> = {}): Promise<JobRecord> {
    return store.create(makeJob(overrides));
  }

  describe('createJob', () => {
    it('stores a PENDING record and enqueues it for extraction', async () => {
      const job = await manager.createJob({
        sourcePath: '/docs/a.txt',
        sourceLang: 'en',
        targetLang: 'vi',
        tier: 'premium',
        totalPages: 2,
      });

      expect(job).toMatchObject({ jobId: 'job-1', status: 'PENDING', progress: 0, revision: 1 });
      expect(job.createdAt).toEqual(LATER);
      expect(queues.extraction.items).toEqual(['job-1']);
      expect(notifier.dispatched).toEqual([{ jobId: 'job-1', stage: 'extraction' }]);
      expect(publishSpy).toHaveBeenCalledWith({ type: 'job_created', job });
    });

    it('gives concurrently created jobs distinct ids', async () => {
      const concurrent = new QueueManager({ store, queues });
      const input = { sourcePath: '/docs/a.txt', sourceLang: 'en', targetLang: 'vi', tier: 'basic' as const };

      const jobs = await Promise.all(Array.from({ length: 5 }, () => concurrent.createJob(input)));

      expect(new Set(jobs.map((job) => job.jobId)).size).toBe(5);
      await expect(concurrent.queueStatus()).resolves.toMatchObject({ extraction: 5 });
    });

    it('enqueues even when an event subscriber throws', async () => {
      const unsubscribe = jobEvents.subscribeJobEvents(() => {
        throw new Error('subscriber broke');
      });
      const input = { sourcePath: '/docs/a.txt', sourceLang: 'en', targetLang: 'vi', tier: 'basic' as const };

      try {
        await manager.createJob(input);
      } finally {
        unsubscribe();
      }

      expect(queues.extraction.items).toEqual(['job-1']);
    });

    it('keeps the job when the notifier is down', async () => {
      vi.spyOn(notifier, 'notifyDispatched').mockRejectedValueOnce(new Error('redis down'));

      await manager.createJob({ sourcePath: '/docs/a.txt', sourceLang: 'en', targetLang: 'vi', tier: 'basic' });

      expect(queues.extraction.items).toEqual(['job-1']);
      await expect(store.get('job-1')).resolves.not.toBeNull();
    });
  });

  describe('updateJob', () => {
    it('writes a full record at the held revision and bumps it', async () => {
      const job = await seed();
      const saved = await manager.updateJob({ ...job, status: 'EXTRACTING' });

      expect(saved.revision).toBe(2);
      expect(saved.updatedAt).toEqual(LATER);
      expect(saved.createdAt).toEqual(FIXED_NOW);
    });

    it('rejects stale revisions', async () => {
      const job = await seed();
      await manager.updateJob({ ...job, status: 'EXTRACTING' });

      await expect(manager.updateJob({ ...job, status: 'EXTRACTING' })).rejects.toBeInstanceOf(
        RevisionConflictError,
      );
    });

    it('rejects writes to terminal and missing records', async () => {
      const job = await seed({ status: 'COMPLETED', progress: 100, finalOutput: '/out/job-1.txt' });

      await expect(manager.updateJob(job)).rejects.toBeInstanceOf(JobTerminatedError);
      await expect(manager.updateJob({ ...job, jobId: 'job-9' })).rejects.toBeInstanceOf(
        JobNotFoundError,
      );
    });

    it('validates the transition before writing', async () => {
      const job = await seed();
      await expect(manager.updateJob({ ...job, status: 'COMPLETED' })).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
      expect(store.history).toHaveLength(1);
    });
  });

  describe('claimJob', () => {
    it('claims with the progress given by the stage and records the owner', async () => {
      const job = await seed({ status: 'TRANSLATING', progress: 25 });
      const claimed = await manager.claimJob(job, 'translation', 'TRANSLATING', 30);
      expect(claimed).toMatchObject({
        status: 'TRANSLATING',
        progress: 30,
        revision: 2,
        claimedStage: 'translation',
      });
    });

    it('returns null when another worker claimed first', async () => {
      const job = await seed();
      await manager.claimJob(job, 'extraction', 'EXTRACTING', 0);
      await expect(manager.claimJob(job, 'extraction', 'EXTRACTING', 0)).resolves.toBeNull();
    });

    it('refuses a record that is already claimed, even at its current revision', async () => {
      const job = await seed({ status: 'TRANSLATING', progress: 30, claimedStage: 'translation' });

      await expect(manager.claimJob(job, 'translation', 'TRANSLATING', 30)).resolves.toBeNull();
      expect(store.history).toHaveLength(1);
    });
  });

  describe('updateProgress', () => {
    it('re-reads and retries after a concurrent write', async () => {
      await seed({ status: 'TRANSLATING', progress: 40 });
      const put = store.put.bind(store);
      vi.spyOn(store, 'put')
        .mockRejectedValueOnce(new RevisionConflictError('job-1', 1))
        .mockImplementation(put);

      const saved = await manager.updateProgress('job-1', 53.33, 1);
      expect(saved).toMatchObject({ progress: 53.33, processedPages: 1, revision: 2 });
    });

    it('gives up after the configured number of conflicts', async () => {
      await seed({ status: 'TRANSLATING', progress: 40 });
      vi.spyOn(store, 'put').mockRejectedValue(new RevisionConflictError('job-1', 1));

      await expect(manager.updateProgress('job-1', 50)).rejects.toBeInstanceOf(RevisionConflictError);
      expect(store.put).toHaveBeenCalledTimes(3);
    });

    it('aborts when the job was cancelled underneath', async () => {
      await seed({ status: 'FAILED', error: CANCELLED_BY_USER });
      await expect(manager.updateProgress('job-1', 50)).rejects.toBeInstanceOf(JobTerminatedError);
    });
  });

  describe('advanceJob', () => {
    it('releases the claim and updates the record before pushing to the next stage', async () => {
      await seed({ status: 'EXTRACTING', claimedStage: 'extraction' });

      const saved = await manager.advanceJob('job-1', 'extraction', 'CHUNKING', {
        extractionOutput: 'ref',
        progress: 25,
      });

      expect(saved).toMatchObject({
        status: 'CHUNKING',
        progress: 25,
        extractionOutput: 'ref',
        claimedStage: null,
      });
      expect(queues.chunking.items).toEqual(['job-1']);
      expect(notifier.dispatched).toEqual([{ jobId: 'job-1', stage: 'chunking' }]);
    });

    it('does not enqueue when the record write fails', async () => {
      await seed({ status: 'EXTRACTING', claimedStage: 'extraction' });
      await expect(manager.advanceJob('job-1', 'extraction', 'TRANSLATING', {})).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
      expect(queues.translation.items).toEqual([]);
    });

    it('advances a stage visit only once', async () => {
      await seed({ status: 'TRANSLATING', progress: 30, claimedStage: 'translation' });

      await manager.advanceJob('job-1', 'translation', 'RECONSTRUCTING', { progress: 80 });
      await expect(
        manager.advanceJob('job-1', 'translation', 'RECONSTRUCTING', { progress: 80 }),
      ).rejects.toThrow(new StageClaimError('job-1', 'translation', null));

      expect(queues.reconstruction.items).toEqual(['job-1']);
    });

    it('refuses to advance for a stage that does not hold the claim', async () => {
      await seed({ status: 'CHUNKING', progress: 25 });

      await expect(manager.advanceJob('job-1', 'chunking', 'TRANSLATING', {})).rejects.toBeInstanceOf(
        StageClaimError,
      );
      expect(queues.translation.items).toEqual([]);
      expect(store.history).toHaveLength(1);
    });
  });

  describe('failJob and completeJob', () => {
    it('records the reason verbatim and notifies the dead-letter channel', async () => {
      await seed({ status: 'TRANSLATING', progress: 40, claimedStage: 'translation' });

      const failed = await manager.failJob('job-1', 'Translation provider unavailable', 'translation');

      expect(failed).toMatchObject({
        status: 'FAILED',
        error: 'Translation provider unavailable',
        progress: 40,
        claimedStage: null,
      });
      expect(notifier.failed).toEqual([
        { jobId: 'job-1', stage: 'translation', reason: 'Translation provider unavailable' },
      ]);
    });

    it('ignores a stage failure from a stage without the claim', async () => {
      await seed({ status: 'TRANSLATING', progress: 40, claimedStage: 'translation' });

      await expect(manager.failJob('job-1', 'late failure', 'chunking')).rejects.toBeInstanceOf(
        StageClaimError,
      );
      expect(notifier.failed).toEqual([]);
    });

    it('substitutes a reason for blank failures', async () => {
      await seed({ status: 'EXTRACTING' });
      await expect(manager.failJob('job-1', '  ')).resolves.toMatchObject({ error: 'Unknown error' });
    });

    it('completes with full progress and all pages processed', async () => {
      await seed({ status: 'RECONSTRUCTING', progress: 85, processedPages: 3, claimedStage: 'reconstruction' });

      const completed = await manager.completeJob('job-1', '/out/job-1_translated.txt', 'reconstruction');

      expect(completed).toMatchObject({
        status: 'COMPLETED',
        progress: 100,
        processedPages: 3,
        finalOutput: '/out/job-1_translated.txt',
      });
    });
  });

  describe('cancelJob', () => {
    it('fails the job with the cancellation reason', async () => {
      await seed({ status: 'TRANSLATING', progress: 53.33 });
      const cancelled = await manager.cancelJob('job-1');
      expect(cancelled).toMatchObject({ status: 'FAILED', error: 'Cancelled by user', progress: 53.33 });
    });

    it('refuses completed jobs', async () => {
      await seed({ status: 'COMPLETED', progress: 100, finalOutput: '/out/job-1.txt' });

      await expect(manager.cancelJob('job-1')).rejects.toThrow(
        new JobNotCancellableError('job-1', 'Cannot cancel completed job'),
      );
      await expect(store.get('job-1')).resolves.toMatchObject({ status: 'COMPLETED' });
    });

    it('refuses jobs that already failed', async () => {
      await seed({ status: 'FAILED', error: 'boom' });
      await expect(manager.cancelJob('job-1')).rejects.toThrow('Job already failed');
    });

    it('reports missing jobs', async () => {
      await expect(manager.cancelJob('job-9')).rejects.toBeInstanceOf(JobNotFoundError);
    });
  });

  describe('deleteJob', () => {
    it('removes the record and publishes a deletion event', async () => {
      const job = await seed();

      await expect(manager.deleteJob('job-1')).resolves.toBe(true);
      await expect(manager.getJob('job-1')).resolves.toBeNull();
      expect(publishSpy).toHaveBeenCalledWith({ type: 'job_deleted', job });
    });

    it('returns false for unknown ids', async () => {
      await expect(manager.deleteJob('job-9')).resolves.toBe(false);
    });
  });

  describe('requeueJob', () => {
    it('pushes a job waiting on a stage that lost its queue entry', async () => {
      await seed({ status: 'TRANSLATING', progress: 25 });

      await expect(manager.requeueJob('job-1')).resolves.toEqual({ stage: 'translation', requeued: true });
      expect(queues.translation.items).toEqual(['job-1']);
    });

    it('does not double-queue', async () => {
      await seed({ status: 'CHUNKING', progress: 25 });
      await queues.chunking.push('job-1');

      await expect(manager.requeueJob('job-1')).resolves.toEqual({ stage: 'chunking', requeued: false });
      expect(queues.chunking.items).toEqual(['job-1']);
    });

    it('refuses a job whose stage visit is claimed by a worker', async () => {
      await seed({ status: 'TRANSLATING', progress: 30, claimedStage: 'translation' });

      await expect(manager.requeueJob('job-1')).rejects.toThrow(
        new ValidationError('Job job-1 is being processed by the translation stage'),
      );
      expect(queues.translation.items).toEqual([]);
    });

    it('refuses jobs a worker is holding or that have finished', async () => {
      await seed({ status: 'EXTRACTING' });
      await expect(manager.requeueJob('job-1')).rejects.toThrow(
        new ValidationError('Job job-1 is EXTRACTING; only jobs waiting for a stage can be requeued'),
      );

      await store.put({ ...makeJob({ status: 'FAILED', error: 'boom' }), revision: 1 });
      await expect(manager.requeueJob('job-1')).rejects.toBeInstanceOf(JobTerminatedError);
    });
  });

  describe('queue and job listings', () => {
    it('reports pending depth per stage', async () => {
      await queues.extraction.push('a');
      await queues.extraction.push('b');
      await queues.reconstruction.push('c');

      await expect(manager.queueStatus()).resolves.toEqual({
        extraction: 2,
        chunking: 0,
        translation: 0,
        reconstruction: 1,
      });
    });

    it('lists non-terminal jobs only', async () => {
      await seed({ jobId: 'job-1', status: 'TRANSLATING', progress: 40 });
      await seed({ jobId: 'job-2', status: 'COMPLETED', progress: 100, finalOutput: 'x' });

      const active = await manager.activeJobs();
      expect(active.map((job) => job.jobId)).toEqual(['job-1']);
    });
  });
});
