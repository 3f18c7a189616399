// packages/pipeline-backend/src/infrastructure/queue-bullmq.ts
// BullMQ-backed TaskNotifier.
// - "dispatch" receives one entry per stage hand-off, for external dispatch/monitoring.
// - "dead-letter" receives one entry per failed job, for administrative inspection.
// - Both queues live under the configured Redis key prefix and keep limited history.
import { type ConnectionOptions, type JobsOptions, Queue } from 'bullmq';

import type { PipelineStage } from '../domain/job-model.js';
import type { TaskNotifier } from '../domain/task-notifier.js';
import { createJobLogger, logger } from './logger.js';

export interface TaskNotificationPayload {
  jobId: string;
  stage: PipelineStage | null;
  reason?: string;
}

export const DISPATCH_QUEUE_NAME = 'dispatch';
export const DEAD_LETTER_QUEUE_NAME = 'dead-letter';

const DEFAULT_JOB_OPTIONS: JobsOptions = {
  removeOnComplete: 1000,
  removeOnFail: 1000,
};

export class BullTaskNotifier implements TaskNotifier {
  private readonly dispatch: Queue<TaskNotificationPayload>;
  private readonly deadLetter: Queue<TaskNotificationPayload>;

  constructor(connection: ConnectionOptions, keyPrefix: string) {
    this.dispatch = new Queue<TaskNotificationPayload>(DISPATCH_QUEUE_NAME, {
      connection,
      prefix: keyPrefix,
      defaultJobOptions: DEFAULT_JOB_OPTIONS,
    });
    this.deadLetter = new Queue<TaskNotificationPayload>(DEAD_LETTER_QUEUE_NAME, {
      connection,
      prefix: keyPrefix,
      defaultJobOptions: DEFAULT_JOB_OPTIONS,
    });

    for (const queue of [this.dispatch, this.deadLetter]) {
      queue.on('error', (err: Error) => {
        logger.error(err, {
          component: 'bullmq-notifier',
          queue: queue.name,
          message: 'BullMQ queue error',
        });
      });
    }
  }

  async notifyDispatched(jobId: string, stage: PipelineStage): Promise<void> {
    // Deduplicated per job and stage.
    await this.dispatch.add(stage, { jobId, stage }, { jobId: `${jobId}-${stage}` });
    createJobLogger(jobId, stage).debug('Dispatch notification queued', {
      event: 'notify_dispatched',
    });
  }

  async notifyFailed(jobId: string, stage: PipelineStage | null, reason: string): Promise<void> {
    await this.deadLetter.add('failed', { jobId, stage, reason }, { jobId });
    createJobLogger(jobId, stage ?? undefined).info('Job moved to dead-letter queue', {
      event: 'notify_failed',
    });
  }

  async close(): Promise<void> {
    await Promise.all([this.dispatch.close(), this.deadLetter.close()]);
  }
}
