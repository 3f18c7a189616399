// packages/pipeline-backend/src/infrastructure/redis.ts
// Shared ioredis connection for the job store, stage queues, artifacts and BullMQ.
// Blocking pops use duplicates of this client so they never stall other commands.
import { Redis } from 'ioredis';

import { loadConfig, type PipelineBackendConfig } from '../config/env.js';
import { logger } from './logger.js';

let client: Redis | null = null;

// createRedisClient.declaration()
export function createRedisClient(config: PipelineBackendConfig = loadConfig()): Redis {
  if (client) return client;

  client = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
    // Required by BullMQ for blocking connections.
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: false,
  });

  client.on('error', (err: Error) => {
    logger.error(err, {
      component: 'redis',
      message: 'Redis client error',
    });
  });

  client.on('connect', () => {
    logger.info('Redis connected', { component: 'redis' });
  });

  return client;
}

export async function closeRedisClient(): Promise<void> {
  if (!client) return;
  const current = client;
  client = null;
  await current.quit();
}

export const redisKeys = {
  job: (prefix: string, jobId: string) => `${prefix}:job:${jobId}`,
  activeJobs: (prefix: string) => `${prefix}:jobs:active`,
  stageQueue: (prefix: string, stage: string) => `${prefix}:queue:${stage}`,
  artifact: (prefix: string, jobId: string, kind: string) => `${prefix}:artifact:${jobId}:${kind}`,
};
