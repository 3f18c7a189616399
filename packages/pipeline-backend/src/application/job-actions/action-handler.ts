// packages/pipeline-backend/src/application/job-actions/action-handler.ts
//
// Central dispatcher for job actions
import type { JobActionResponse } from '@doc-relay/contracts';

import { JobActionType, type AnyJobAction, type JobActionResult } from '../../domain/job-actions.js';
import type { QueueManager } from '../queue-manager.js';
import { cancelJob } from './cancel-job.js';
import { deleteJob } from './delete-job.js';
import { requeueJob } from './requeue-job.js';

export async function executeJobAction(
  manager: QueueManager,
  jobId: string,
  action: AnyJobAction,
): Promise<JobActionResult> {
  switch (action.type) {
    case JobActionType.CANCEL:
      return cancelJob(manager, jobId, action);
    case JobActionType.DELETE:
      return deleteJob(manager, jobId, action);
    case JobActionType.REQUEUE:
      return requeueJob(manager, jobId, action);
  }
}

export function toJobActionResponse(result: JobActionResult): JobActionResponse {
  return {
    success: result.success,
    message: result.message,
    jobId: result.jobId,
    actionType: result.actionType,
    timestamp: result.timestamp.toISOString(),
    ...(result.error ? { error: result.error } : {}),
  };
}
