// packages/pipeline-backend/src/config/env.ts
// Centralized environment-based configuration for the pipeline backend.
// - Safe Docker/Docker Compose defaults.
// - Throws ConfigurationError when a value would leave the pipeline unable to run.
import { ConfigurationError, type PipelineStage } from '@doc-relay/contracts';
import { readBool, readEnum, readInt, readString } from '@doc-relay/shared-infrastructure';

export const NODE_ENVS = ['development', 'test', 'production'] as const;

export type NodeEnv = (typeof NODE_ENVS)[number];

export interface PipelineBackendConfig {
  nodeEnv: NodeEnv;
  redis: {
    host: string;
    port: number;
    password?: string;
    keyPrefix: string;
  };
  workers: {
    pools: Record<PipelineStage, number>;
    popTimeoutSeconds: number;
    idleBackoffMs: number;
  };
  translation: {
    chunkSize: number;
    batchThreshold: number;
    timeoutMs: number;
    maxAttempts: number;
  };
  uploads: {
    maxFileSize: number;
  };
  artifacts: {
    outputDir: string;
    ttlSeconds: number;
  };
  notifier: {
    enabled: boolean;
  };
}

const MIN_CHUNK_SIZE = 100;

// loadConfig.declaration()
export function loadConfig(): PipelineBackendConfig {
  const nodeEnv = readEnum('NODE_ENV', NODE_ENVS, 'development');

  // Redis (job records, stage queues, intermediate artifacts)
  const redisHost = readString('REDIS_HOST', 'redis');
  const redisPort = readInt('REDIS_PORT', 6379);
  const redisPassword = readString('REDIS_PASSWORD');
  const keyPrefix = readString('REDIS_KEY_PREFIX', 'docrelay');
  if (keyPrefix.includes(':')) {
    throw new ConfigurationError('REDIS_KEY_PREFIX must not contain ":"');
  }

  // Worker pools
  const pools: Record<PipelineStage, number> = {
    extraction: readInt('EXTRACTION_WORKERS', 4),
    chunking: readInt('CHUNKING_WORKERS', 2),
    translation: readInt('TRANSLATION_WORKERS', 4),
    reconstruction: readInt('RECONSTRUCTION_WORKERS', 1),
  };
  for (const [stage, size] of Object.entries(pools)) {
    if (size < 1) {
      throw new ConfigurationError(`Worker pool for ${stage} must have at least 1 worker (got ${size})`);
    }
  }
  const popTimeoutSeconds = readInt('WORKER_POP_TIMEOUT_SECONDS', 5);
  if (popTimeoutSeconds < 1) {
    throw new ConfigurationError('WORKER_POP_TIMEOUT_SECONDS must be at least 1');
  }
  const idleBackoffMs = readInt('WORKER_ERROR_BACKOFF_MS', 1000);

  // Translation
  const chunkSize = readInt('TRANSLATION_CHUNK_SIZE', 3000);
  if (chunkSize < MIN_CHUNK_SIZE) {
    throw new ConfigurationError(
      `TRANSLATION_CHUNK_SIZE (${chunkSize}) must be at least ${MIN_CHUNK_SIZE}`,
    );
  }
  const batchThreshold = readInt('TRANSLATION_BATCH_THRESHOLD', 10);
  const timeoutMs = readInt('TRANSLATION_TIMEOUT_MS', 60_000);
  const maxAttempts = readInt('TRANSLATION_MAX_ATTEMPTS', 3);

  // Uploads and artifacts
  const maxFileSize = readInt('MAX_FILE_SIZE', 100 * 1024 * 1024); // 100MB default
  const outputDir = readString('OUTPUT_DIR', './outputs');
  const ttlSeconds = readInt('ARTIFACT_TTL_SECONDS', 86_400);
  if (ttlSeconds < 1) {
    throw new ConfigurationError(`ARTIFACT_TTL_SECONDS must be at least 1 (got ${ttlSeconds})`);
  }

  const notifierEnabled = readBool('TASK_NOTIFY_ENABLED', true);

  return {
    nodeEnv,
    redis: {
      host: redisHost,
      port: redisPort,
      password: redisPassword,
      keyPrefix,
    },
    workers: {
      pools,
      popTimeoutSeconds,
      idleBackoffMs,
    },
    translation: {
      chunkSize,
      batchThreshold,
      timeoutMs,
      maxAttempts,
    },
    uploads: {
      maxFileSize,
    },
    artifacts: {
      outputDir,
      ttlSeconds,
    },
    notifier: {
      enabled: notifierEnabled,
    },
  };
}
