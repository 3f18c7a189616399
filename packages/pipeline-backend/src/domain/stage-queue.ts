// packages/pipeline-backend/src/domain/stage-queue.ts
//
// Durable FIFO of job ids feeding one pipeline stage.
import type { PipelineStage } from './job-model.js';

export interface StageQueueConsumer {
  /** Blocks up to `timeoutSeconds`; null when nothing arrived. */
  pop(timeoutSeconds: number): Promise<string | null>;
  close(): Promise<void>;
}

export interface StageQueue {
  readonly stage: PipelineStage;
  push(jobId: string): Promise<void>;
  length(): Promise<number>;
  contains(jobId: string): Promise<boolean>;
  /** Each consumer owns its blocking connection. */
  openConsumer(): StageQueueConsumer;
}

export type StageQueues = Record<PipelineStage, StageQueue>;
