// packages/pipeline-backend/src/application/stages/stage-handler.ts
import type { JobRecord, JobStatus, PipelineStage } from '../../domain/job-model.js';
import type { Logger } from '../../infrastructure/logger.js';
import type { StageOutcome, StageResult } from '../stage-outcome.js';

export interface StageHandler {
  readonly stage: PipelineStage;
  /** Status written by the claim; equal to the awaiting status for pass-through claims. */
  readonly claimStatus: JobStatus;
  readonly claimProgress?: number;
  run(job: JobRecord, log: Logger): Promise<StageOutcome<StageResult>>;
}
