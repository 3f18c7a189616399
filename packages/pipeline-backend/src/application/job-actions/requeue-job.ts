// packages/pipeline-backend/src/application/job-actions/requeue-job.ts
//
// Recovery for a job whose record advanced but whose queue push never happened.
import {
  JobNotFoundError,
  JobTerminatedError,
  ValidationError,
} from '@doc-relay/contracts';

import { JobActionType, type JobActionResult, type RequeueJobAction } from '../../domain/job-actions.js';
import type { QueueManager } from '../queue-manager.js';

export async function requeueJob(
  manager: QueueManager,
  jobId: string,
  action: RequeueJobAction,
): Promise<JobActionResult> {
  const base = { jobId, actionType: JobActionType.REQUEUE, timestamp: action.requestedAt };

  try {
    const { stage, requeued } = await manager.requeueJob(jobId);
    return requeued
      ? { ...base, success: true, message: `Job requeued for ${stage}` }
      : { ...base, success: true, message: `Job already queued for ${stage}` };
  } catch (error: unknown) {
    if (error instanceof JobNotFoundError) {
      return { ...base, success: false, message: 'Job not found', error: 'not_found' };
    }
    if (error instanceof JobTerminatedError) {
      return { ...base, success: false, message: error.message, error: 'terminal' };
    }
    if (error instanceof ValidationError) {
      return { ...base, success: false, message: error.message, error: error.code };
    }
    throw error;
  }
}
