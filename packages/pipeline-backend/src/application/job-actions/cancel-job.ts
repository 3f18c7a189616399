// packages/pipeline-backend/src/application/job-actions/cancel-job.ts
//
// Cancel a job that has not finished. The job becomes FAILED with "Cancelled by user";
// a worker still holding it notices on its next write and abandons it.
import { JobNotCancellableError, JobNotFoundError } from '@doc-relay/contracts';

import { JobActionType, type CancelJobAction, type JobActionResult } from '../../domain/job-actions.js';
import type { QueueManager } from '../queue-manager.js';

export async function cancelJob(
  manager: QueueManager,
  jobId: string,
  action: CancelJobAction,
): Promise<JobActionResult> {
  const base = { jobId, actionType: JobActionType.CANCEL, timestamp: action.requestedAt };

  try {
    await manager.cancelJob(jobId);
    return { ...base, success: true, message: 'Job cancelled' };
  } catch (error: unknown) {
    if (error instanceof JobNotFoundError) {
      return { ...base, success: false, message: 'Job not found', error: 'not_found' };
    }
    if (error instanceof JobNotCancellableError) {
      return { ...base, success: false, message: error.message, error: 'not_cancellable' };
    }
    throw error;
  }
}
