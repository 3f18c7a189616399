// packages/pipeline-backend/src/application/process-stage-job.ts
// Runs one popped job id through one stage.
// Flow:
// 1. Load the record; skip if missing, terminal, or not awaiting this stage.
// 2. Claim it with a revision-guarded write. An existing claim or a lost race means another
//    worker owns this visit (duplicate queue entries end here).
// 3. Run the stage. Failure -> FAILED with the reason; success -> advance or complete.
//    Those writes only land while this stage still holds the claim.
// 4. A job cancelled underneath the worker is abandoned without further writes.
import { JobTerminatedError, StageClaimError } from '@doc-relay/contracts';

import { isTerminal, STAGE_AWAITING_STATUS } from '../domain/job-model.js';
import { createJobLogger, toError } from '../infrastructure/logger.js';
import { metrics } from '../infrastructure/metrics.js';
import type { QueueManager } from './queue-manager.js';
import { fail, type StageOutcome, type StageResult } from './stage-outcome.js';
import type { StageHandler } from './stages/stage-handler.js';

export type StageJobResult = 'skipped' | 'claim_lost' | 'advanced' | 'completed' | 'failed' | 'aborted';

// processStageJob.declaration()
export async function processStageJob(
  handler: StageHandler,
  jobId: string,
  manager: QueueManager,
): Promise<StageJobResult> {
  const stage = handler.stage;
  const log = createJobLogger(jobId, stage);

  const job = await manager.getJob(jobId);
  if (!job) {
    log.warn('Job not found; skipping', { event: 'job_missing' });
    return 'skipped';
  }
  if (isTerminal(job.status)) {
    log.info('Job already terminal; skipping', { status: job.status });
    return 'skipped';
  }
  const awaiting = STAGE_AWAITING_STATUS[stage];
  if (job.status !== awaiting) {
    log.warn('Job is not awaiting this stage; skipping', {
      event: 'unexpected_status',
      status: job.status,
      awaiting,
    });
    return 'skipped';
  }

  if (job.claimedStage !== null) {
    log.info('Job already claimed; skipping duplicate entry', {
      event: 'already_claimed',
      claimedStage: job.claimedStage,
    });
    return 'claim_lost';
  }

  const claimed = await manager.claimJob(job, stage, handler.claimStatus, handler.claimProgress);
  if (!claimed) {
    log.warn('Failed to claim job; likely race; skipping', { event: 'state_conflict' });
    return 'claim_lost';
  }

  const started = Date.now();
  let result: StageJobResult;
  try {
    let outcome: StageOutcome<StageResult>;
    try {
      outcome = await handler.run(claimed, log);
    } catch (error: unknown) {
      if (error instanceof JobTerminatedError || error instanceof StageClaimError) throw error;
      log.error(toError(error), { event: 'stage_error' });
      outcome = fail(toError(error).message);
    }

    if (!outcome.ok) {
      await manager.failJob(jobId, outcome.reason, stage);
      result = 'failed';
    } else if (outcome.value.kind === 'complete') {
      await manager.completeJob(jobId, outcome.value.outputRef, stage);
      result = 'completed';
    } else {
      await manager.advanceJob(jobId, stage, outcome.value.status, outcome.value.patch);
      result = 'advanced';
    }
  } catch (error: unknown) {
    if (error instanceof JobTerminatedError) {
      log.info('Job terminated while in progress; abandoning', {
        event: 'job_aborted',
        status: error.status,
      });
      result = 'aborted';
    } else if (error instanceof StageClaimError) {
      log.warn('Stage claim no longer held; abandoning', {
        event: 'claim_lost',
        claimedStage: error.claimedStage,
      });
      result = 'claim_lost';
    } else {
      throw error;
    }
  }

  metrics.timing('stage.duration_ms', Date.now() - started, { stage });
  metrics.increment('stage.processed', 1, { stage, result });
  return result;
}
