// packages/pipeline-backend/src/application/submit-job.ts
//
// Application service for submitting a document for translation.
// - Validates the request and the file before any write.
// - Creates the job record and enqueues it for extraction via QueueManager.
import type { Stats } from 'node:fs';
import { stat } from 'node:fs/promises';
import path from 'node:path';

import {
  TRANSLATION_TIERS,
  ValidationError,
  type SubmitJobResponseDto,
  type TranslationTier,
} from '@doc-relay/contracts';
import { z } from 'zod';

import { AUTO_DETECT, normalizeLanguage } from '../domain/languages.js';
import type { ExtractorRegistry } from '../infrastructure/extractors/extractor-registry.js';
import { logger } from '../infrastructure/logger.js';
import type { QueueManager } from './queue-manager.js';

export interface SubmitJobRequest {
  filePath: string;
  sourceLang?: string;
  targetLang?: string;
  tier?: string;
}

export interface SubmitJobDeps {
  manager: QueueManager;
  extractors: ExtractorRegistry;
  maxFileSize: number;
}

const DEFAULT_TARGET_LANG = 'vi';
const DEFAULT_TIER: TranslationTier = 'standard';
const MB = 1024 * 1024;

const submitJobSchema = z.object({
  filePath: z.string({ required_error: 'filePath is required' }).trim().min(1, 'filePath is required'),
  sourceLang: z.string().optional(),
  targetLang: z.string().optional(),
  tier: z.string().optional(),
});

function parseTier(raw: string | undefined): TranslationTier {
  const value = raw?.trim().toLowerCase();
  if (!value) return DEFAULT_TIER;
  const tier = TRANSLATION_TIERS.find((candidate) => candidate === value);
  if (!tier) {
    throw new ValidationError(
      `tier must be one of ${TRANSLATION_TIERS.join(', ')} when provided`,
      'invalid_tier',
    );
  }
  return tier;
}

// Plain-text documents: roughly half a minute per MB, at least one minute.
export function estimateProcessingTime(fileSizeBytes: number): string {
  const minutes = Math.max(1, Math.floor((fileSizeBytes / MB) * 0.5));
  return `${minutes} minute${minutes === 1 ? '' : 's'}`;
}

async function statFile(filePath: string): Promise<number> {
  let info: Stats;
  try {
    info = await stat(filePath);
  } catch (error: unknown) {
    throw new ValidationError(`File not found: ${filePath}`, 'file_not_found', { cause: error });
  }
  if (!info.isFile()) {
    throw new ValidationError(`Not a regular file: ${filePath}`, 'file_not_found');
  }
  return info.size;
}

// submitJob.declaration()
// Throws ValidationError for invalid input; other errors are operational.
export async function submitJob(
  deps: SubmitJobDeps,
  req: SubmitJobRequest,
): Promise<SubmitJobResponseDto> {
  const parsed = submitJobSchema.safeParse(req);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid request', 'invalid_body');
  }
  const { filePath } = parsed.data;

  const tier = parseTier(parsed.data.tier);
  const sourceLang = normalizeLanguage(parsed.data.sourceLang, AUTO_DETECT);
  const targetLang = normalizeLanguage(parsed.data.targetLang, DEFAULT_TARGET_LANG);
  if (targetLang === AUTO_DETECT) {
    throw new ValidationError('targetLang must name a language', 'invalid_target_lang');
  }

  const extractor = deps.extractors.resolve(filePath);

  const size = await statFile(filePath);
  if (size === 0) {
    throw new ValidationError('File is empty', 'empty_file');
  }
  if (size > deps.maxFileSize) {
    throw new ValidationError(
      `File too large (${(size / MB).toFixed(1)} MB). Maximum size is ${(deps.maxFileSize / MB).toFixed(1)} MB`,
      'file_too_large',
    );
  }

  const totalPages = await extractor.countPages(filePath);
  const estimatedTime = estimateProcessingTime(size);

  const job = await deps.manager.createJob({
    sourcePath: filePath,
    sourceLang,
    targetLang,
    tier,
    totalPages,
    fileType: path.extname(filePath).slice(1).toLowerCase(),
    fileSizeBytes: size,
    estimatedTime,
  });

  logger.info('Job submitted and enqueued', {
    event: 'job_submitted',
    jobId: job.jobId,
    totalPages,
  });

  return {
    jobId: job.jobId,
    status: job.status,
    totalPages,
    estimatedTime,
  };
}
