// packages/pipeline-backend/src/application/pipeline-services.ts
//
// Wires config, Redis-backed adapters, collaborators and stage handlers into one object
// shared by the worker runner and the CLI.
import type { PipelineStage } from '@doc-relay/contracts';

import { loadConfig, type PipelineBackendConfig } from '../config/env.js';
import type { ArtifactStore } from '../domain/artifact-store.js';
import type { StageQueues } from '../domain/stage-queue.js';
import { noopTaskNotifier, type TaskNotifier } from '../domain/task-notifier.js';
import type { Translator } from '../domain/translator.js';
import { ExtractorRegistry } from '../infrastructure/extractors/extractor-registry.js';
import { PlainTextExtractor } from '../infrastructure/extractors/plain-text-extractor.js';
import { FileArtifactStore } from '../infrastructure/file-artifact-store.js';
import { logger } from '../infrastructure/logger.js';
import { BullTaskNotifier } from '../infrastructure/queue-bullmq.js';
import { closeRedisClient, createRedisClient } from '../infrastructure/redis.js';
import { RedisArtifactStore } from '../infrastructure/redis-artifact-store.js';
import { RedisJobStore } from '../infrastructure/redis-job-store.js';
import { createStageQueues } from '../infrastructure/redis-stage-queue.js';
import { EchoTranslationProvider } from '../infrastructure/translation/echo-provider.js';
import { TieredTranslator } from '../infrastructure/translation/tiered-translator.js';
import { QueueManager } from './queue-manager.js';
import { ChunkingStage } from './stages/chunking-stage.js';
import { ExtractionStage } from './stages/extraction-stage.js';
import { ReconstructionStage } from './stages/reconstruction-stage.js';
import type { StageHandler } from './stages/stage-handler.js';
import { TranslationStage } from './stages/translation-stage.js';

export interface PipelineServices {
  config: PipelineBackendConfig;
  manager: QueueManager;
  queues: StageQueues;
  extractors: ExtractorRegistry;
  handlers: Record<PipelineStage, StageHandler>;
  close(): Promise<void>;
}

export interface StageHandlerDeps {
  config: PipelineBackendConfig;
  manager: QueueManager;
  extractors: ExtractorRegistry;
  translator: Translator;
  artifacts: ArtifactStore;
  outputs: ArtifactStore;
}

// createStageHandlers.declaration()
export function createStageHandlers(deps: StageHandlerDeps): Record<PipelineStage, StageHandler> {
  const { config, manager, extractors, translator, artifacts, outputs } = deps;
  return {
    extraction: new ExtractionStage({ manager, extractors, artifacts }),
    chunking: new ChunkingStage(artifacts),
    translation: new TranslationStage({
      manager,
      artifacts,
      translator,
      chunkSize: config.translation.chunkSize,
      batchThreshold: config.translation.batchThreshold,
    }),
    reconstruction: new ReconstructionStage({ artifacts, outputs }),
  };
}

export function createExtractorRegistry(): ExtractorRegistry {
  return new ExtractorRegistry([new PlainTextExtractor()]);
}

export function createTranslator(config: PipelineBackendConfig): Translator {
  // Every tier uses the echo provider until real providers are configured.
  if (config.nodeEnv === 'production') {
    logger.warn('Echo translation provider serves every tier', { component: 'translator' });
  }
  const echo = new EchoTranslationProvider();
  return new TieredTranslator(
    { basic: echo, standard: echo, premium: echo },
    { timeoutMs: config.translation.timeoutMs, maxAttempts: config.translation.maxAttempts },
  );
}

// createPipelineServices.declaration()
export function createPipelineServices(config: PipelineBackendConfig = loadConfig()): PipelineServices {
  const redis = createRedisClient(config);
  const prefix = config.redis.keyPrefix;

  const notifier: TaskNotifier = config.notifier.enabled
    ? new BullTaskNotifier(redis, prefix)
    : noopTaskNotifier;
  const queues = createStageQueues(redis, prefix);
  const manager = new QueueManager({
    store: new RedisJobStore(redis, prefix),
    queues,
    notifier,
  });
  const extractors = createExtractorRegistry();

  const handlers = createStageHandlers({
    config,
    manager,
    extractors,
    translator: createTranslator(config),
    artifacts: new RedisArtifactStore(redis, prefix, config.artifacts.ttlSeconds),
    outputs: new FileArtifactStore(config.artifacts.outputDir),
  });

  return {
    config,
    manager,
    queues,
    extractors,
    handlers,
    async close() {
      await notifier.close();
      await closeRedisClient();
    },
  };
}
