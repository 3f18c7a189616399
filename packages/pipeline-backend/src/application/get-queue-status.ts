// packages/pipeline-backend/src/application/get-queue-status.ts
// Queue depths per stage plus the most recent in-flight jobs.
import type { QueueStatusDto } from '@doc-relay/contracts';

import { jobRecordToSummary } from './job-dto.js';
import type { QueueManager } from './queue-manager.js';

export const DEFAULT_ACTIVE_JOB_LIMIT = 10;

export async function getQueueStatus(
  manager: QueueManager,
  limit = DEFAULT_ACTIVE_JOB_LIMIT,
): Promise<QueueStatusDto> {
  const [pending, active] = await Promise.all([manager.queueStatus(), manager.activeJobs(limit)]);
  return {
    pending,
    activeJobs: active.map(jobRecordToSummary),
  };
}
