// packages/pipeline-backend/src/application/stage-worker.ts
// Long-lived polling loop for one stage worker.
// - Blocking pop with a bounded timeout, so an abort is noticed within one timeout.
// - Errors from the store or queue are logged; the loop backs off and keeps polling.
import { setTimeout as sleep } from 'node:timers/promises';

import type { StageQueue } from '../domain/stage-queue.js';
import { logger, toError, type Logger } from '../infrastructure/logger.js';
import { processStageJob, type StageJobResult } from './process-stage-job.js';
import type { QueueManager } from './queue-manager.js';
import type { StageHandler } from './stages/stage-handler.js';

export interface StageWorkerOptions {
  popTimeoutSeconds: number;
  errorBackoffMs: number;
  /** Called after each processed job; used for monitoring. */
  onJobProcessed?: (jobId: string, result: StageJobResult) => void;
}

export class StageWorker {
  private readonly log: Logger;

  constructor(
    private readonly handler: StageHandler,
    private readonly queue: StageQueue,
    private readonly manager: QueueManager,
    private readonly options: StageWorkerOptions,
    readonly workerId = `${handler.stage}-0`,
  ) {
    this.log = logger.child({ component: 'stage-worker', stage: handler.stage, workerId });
  }

  // run.declaration()
  // Resolves once `signal` aborts and the in-flight job (if any) has finished.
  async run(signal: AbortSignal): Promise<void> {
    const consumer = this.queue.openConsumer();
    this.log.info('Stage worker started');

    try {
      while (!signal.aborted) {
        try {
          const jobId = await consumer.pop(this.options.popTimeoutSeconds);
          if (!jobId) continue;

          const result = await processStageJob(this.handler, jobId, this.manager);
          this.options.onJobProcessed?.(jobId, result);
        } catch (error: unknown) {
          this.log.error(toError(error), { event: 'worker_iteration_failed' });
          await this.backoff(signal);
        }
      }
    } finally {
      await consumer.close().catch((error: unknown) => {
        this.log.warn('Failed to close queue consumer', { error: toError(error).message });
      });
      this.log.info('Stage worker stopped');
    }
  }

  private async backoff(signal: AbortSignal): Promise<void> {
    try {
      await sleep(this.options.errorBackoffMs, undefined, { signal });
    } catch (error: unknown) {
      // Abort during back-off just ends the wait.
      if (!signal.aborted) throw error;
    }
  }
}
