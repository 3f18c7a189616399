// packages/pipeline-backend/src/domain/task-notifier.ts
//
// Best-effort side channel for dispatch and dead-letter notifications.
// The stage queues stay the source of truth; notifier failures never affect a job.
import type { PipelineStage } from './job-model.js';

export interface TaskNotifier {
  notifyDispatched(jobId: string, stage: PipelineStage): Promise<void>;
  notifyFailed(jobId: string, stage: PipelineStage | null, reason: string): Promise<void>;
  close(): Promise<void>;
}

export const noopTaskNotifier: TaskNotifier = {
  async notifyDispatched() {},
  async notifyFailed() {},
  async close() {},
};
