// packages/pipeline-backend/src/application/job-dto.ts
//
// Serializes JobRecord into the public status DTO (ISO timestamps, camelCase).
import type { ActiveJobSummaryDto, JobStatusDto } from '@doc-relay/contracts';

import type { JobRecord } from '../domain/job-model.js';

export function jobRecordToDto(job: JobRecord): JobStatusDto {
  return {
    jobId: job.jobId,
    status: job.status,
    progress: job.progress,
    totalPages: job.totalPages,
    processedPages: job.processedPages,
    sourceLang: job.sourceLang,
    targetLang: job.targetLang,
    tier: job.tier,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
    ...(job.error !== null ? { error: job.error } : {}),
    finalOutput: job.finalOutput,
    estimatedTime: job.estimatedTime,
  };
}

export function jobRecordToSummary(job: JobRecord): ActiveJobSummaryDto {
  return {
    jobId: job.jobId,
    status: job.status,
    progress: job.progress,
    totalPages: job.totalPages,
  };
}

export type { ActiveJobSummaryDto, JobStatusDto };
