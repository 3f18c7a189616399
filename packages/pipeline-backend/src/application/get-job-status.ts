// packages/pipeline-backend/src/application/get-job-status.ts
// Application service for fetching job status by ID.
import { type JobStatusDto, jobRecordToDto } from './job-dto.js';
import type { QueueManager } from './queue-manager.js';

export type GetJobStatusResponse = JobStatusDto;

// getJobStatus.declaration()
export async function getJobStatus(
  manager: QueueManager,
  jobId: string,
): Promise<GetJobStatusResponse | null> {
  if (!jobId) return null;

  const job = await manager.getJob(jobId);
  if (!job) return null;

  return jobRecordToDto(job);
}
