// packages/contracts/src/index.ts
//
// Wire-level types shared by the pipeline backend and its clients.

export const JOB_STATUSES = [
  'PENDING',
  'EXTRACTING',
  'CHUNKING',
  'TRANSLATING',
  'RECONSTRUCTING',
  'COMPLETED',
  'FAILED',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TRANSLATION_TIERS = ['basic', 'standard', 'premium'] as const;

export type TranslationTier = (typeof TRANSLATION_TIERS)[number];

// Fixed, linear stage order.
export const PIPELINE_STAGES = ['extraction', 'chunking', 'translation', 'reconstruction'] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export interface JobStatusDto {
  jobId: string;
  status: JobStatus;
  progress: number;
  totalPages: number;
  processedPages: number;
  sourceLang: string;
  targetLang: string;
  tier: TranslationTier;
  createdAt: string;
  updatedAt: string;
  error?: string;
  finalOutput: string | null;
  estimatedTime: string | null;
}

export interface SubmitJobResponseDto {
  jobId: string;
  status: JobStatus;
  totalPages: number;
  estimatedTime: string;
}

export interface ActiveJobSummaryDto {
  jobId: string;
  status: JobStatus;
  progress: number;
  totalPages: number;
}

export interface QueueStatusDto {
  pending: Record<PipelineStage, number>;
  activeJobs: ActiveJobSummaryDto[];
}

export type JobEventType = 'job_created' | 'job_updated' | 'job_deleted';

export interface JobEventMessage {
  type: JobEventType;
  jobId: string;
  status: JobStatus;
  progress: number;
}

export * from './job-actions.js';
export * from './errors.js';
