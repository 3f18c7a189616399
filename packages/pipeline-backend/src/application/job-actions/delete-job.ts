// packages/pipeline-backend/src/application/job-actions/delete-job.ts
import { JobActionType, type DeleteJobAction, type JobActionResult } from '../../domain/job-actions.js';
import type { QueueManager } from '../queue-manager.js';

export async function deleteJob(
  manager: QueueManager,
  jobId: string,
  action: DeleteJobAction,
): Promise<JobActionResult> {
  const base = { jobId, actionType: JobActionType.DELETE, timestamp: action.requestedAt };

  const removed = await manager.deleteJob(jobId);
  return removed
    ? { ...base, success: true, message: 'Job deleted' }
    : { ...base, success: false, message: 'Job not found', error: 'not_found' };
}
