// packages/pipeline-backend/src/domain/job-record-codec.ts
//
// Flat string-map wire format for job records (one Redis hash per job).
// - Field names are snake_case.
// - Absent optional values are written as ABSENT so they stay distinct from "".
// - Unknown status/tier names fail decoding instead of falling back to a default.
import {
  JOB_STATUSES,
  PIPELINE_STAGES,
  RecordDecodeError,
  TRANSLATION_TIERS,
} from '@doc-relay/contracts';
import { z } from 'zod';

import type { JobRecord } from './job-model.js';

export const ABSENT = '\u0000';

export type JobRecordHash = Record<string, string>;

const numericText = z
  .string()
  .regex(/^-?\d+(\.\d+)?$/, 'expected decimal text')
  .transform(Number);

const integerText = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform(Number);

const isoDate = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

const optionalText = z.string().transform((value) => (value === ABSENT ? null : value));

const optionalInteger = z.union([z.literal(ABSENT).transform(() => null), integerText]);

const optionalStage = z.union([z.literal(ABSENT).transform(() => null), z.enum(PIPELINE_STAGES)]);

const jobRecordHashSchema = z.object({
  job_id: z.string().min(1),
  source_path: z.string(),
  source_lang: z.string(),
  target_lang: z.string(),
  tier: z.enum(TRANSLATION_TIERS),
  status: z.enum(JOB_STATUSES),
  progress: numericText,
  total_pages: integerText,
  processed_pages: integerText,
  extraction_output: optionalText,
  translation_output: optionalText,
  final_output: optionalText,
  error: optionalText,
  created_at: isoDate,
  updated_at: isoDate,
  revision: integerText,
  claimed_stage: optionalStage,
  file_type: optionalText,
  file_size_bytes: optionalInteger,
  estimated_time: optionalText,
});

function optional(value: string | number | null): string {
  return value === null ? ABSENT : String(value);
}

// encodeJobRecord.declaration()
export function encodeJobRecord(job: JobRecord): JobRecordHash {
  return {
    job_id: job.jobId,
    source_path: job.sourcePath,
    source_lang: job.sourceLang,
    target_lang: job.targetLang,
    tier: job.tier,
    status: job.status,
    progress: String(job.progress),
    total_pages: String(job.totalPages),
    processed_pages: String(job.processedPages),
    extraction_output: optional(job.extractionOutput),
    translation_output: optional(job.translationOutput),
    final_output: optional(job.finalOutput),
    error: optional(job.error),
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
    revision: String(job.revision),
    claimed_stage: optional(job.claimedStage),
    file_type: optional(job.fileType),
    file_size_bytes: optional(job.fileSizeBytes),
    estimated_time: optional(job.estimatedTime),
  };
}

// decodeJobRecord.declaration()
export function decodeJobRecord(hash: JobRecordHash): JobRecord {
  const parsed = jobRecordHashSchema.safeParse(hash);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new RecordDecodeError(`Invalid job record ${hash.job_id ?? '<unknown>'}: ${issues}`, {
      cause: parsed.error,
    });
  }

  const row = parsed.data;
  return {
    jobId: row.job_id,
    sourcePath: row.source_path,
    sourceLang: row.source_lang,
    targetLang: row.target_lang,
    tier: row.tier,
    status: row.status,
    progress: row.progress,
    totalPages: row.total_pages,
    processedPages: row.processed_pages,
    extractionOutput: row.extraction_output,
    translationOutput: row.translation_output,
    finalOutput: row.final_output,
    error: row.error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    revision: row.revision,
    claimedStage: row.claimed_stage,
    fileType: row.file_type,
    fileSizeBytes: row.file_size_bytes,
    estimatedTime: row.estimated_time,
  };
}
