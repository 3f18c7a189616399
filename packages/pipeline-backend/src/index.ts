// packages/pipeline-backend/src/index.ts
// Public surface of the pipeline backend, used by the CLI and by embedding services.
export { loadConfig, type PipelineBackendConfig } from './config/env.js';

export * from './domain/job-model.js';
export * from './domain/job-actions.js';
export * from './domain/job-events.js';
export * from './domain/progress.js';
export type { ArtifactKind, ArtifactStore } from './domain/artifact-store.js';
export type { DocumentExtractor, ExtractionProgressListener } from './domain/document-extractor.js';
export type { JobRecordStore } from './domain/job-repository.js';
export type { StageQueue, StageQueueConsumer, StageQueues } from './domain/stage-queue.js';
export { noopTaskNotifier, type TaskNotifier } from './domain/task-notifier.js';
export type { TranslationProvider, Translator } from './domain/translator.js';

export { CANCELLED_BY_USER, QueueManager, type QueueManagerDeps, type RequeueResult } from './application/queue-manager.js';
export { processStageJob, type StageJobResult } from './application/process-stage-job.js';
export { StageWorker, type StageWorkerOptions } from './application/stage-worker.js';
export type { StageHandler } from './application/stages/stage-handler.js';
export { submitJob, estimateProcessingTime, type SubmitJobRequest } from './application/submit-job.js';
export { getJobStatus } from './application/get-job-status.js';
export { getQueueStatus, DEFAULT_ACTIVE_JOB_LIMIT } from './application/get-queue-status.js';
export { executeJobAction, toJobActionResponse } from './application/job-actions/action-handler.js';
export {
  createPipelineServices,
  createStageHandlers,
  type PipelineServices,
} from './application/pipeline-services.js';

export { startStageWorkers, startWorkers, type RunningWorkers } from './transport/worker-runner.js';
