// packages/pipeline-backend/src/infrastructure/redis-stage-queue.ts
// Stage queues as Redis lists: RPUSH to enqueue, BLPOP to claim, LLEN for depth.
// Each consumer pops on its own duplicated connection.
import type { Redis } from 'ioredis';

import type { PipelineStage } from '../domain/job-model.js';
import type { StageQueue, StageQueueConsumer, StageQueues } from '../domain/stage-queue.js';
import { redisKeys } from './redis.js';

export type RedisStageQueueClient = Pick<Redis, 'rpush' | 'llen' | 'lpos' | 'duplicate'>;
export type RedisConsumerConnection = Pick<Redis, 'blpop' | 'quit'>;

export class RedisStageQueue implements StageQueue {
  private readonly key: string;

  constructor(
    private readonly client: RedisStageQueueClient,
    keyPrefix: string,
    readonly stage: PipelineStage,
  ) {
    this.key = redisKeys.stageQueue(keyPrefix, stage);
  }

  async push(jobId: string): Promise<void> {
    await this.client.rpush(this.key, jobId);
  }

  async length(): Promise<number> {
    return this.client.llen(this.key);
  }

  async contains(jobId: string): Promise<boolean> {
    const position = await this.client.lpos(this.key, jobId);
    return position !== null;
  }

  openConsumer(): StageQueueConsumer {
    return new RedisStageQueueConsumer(this.client.duplicate(), this.key);
  }
}

export class RedisStageQueueConsumer implements StageQueueConsumer {
  constructor(
    private readonly connection: RedisConsumerConnection,
    private readonly key: string,
  ) {}

  async pop(timeoutSeconds: number): Promise<string | null> {
    const result = await this.connection.blpop(this.key, timeoutSeconds);
    return result ? result[1] : null;
  }

  async close(): Promise<void> {
    await this.connection.quit();
  }
}

// createStageQueues.declaration()
export function createStageQueues(client: RedisStageQueueClient, keyPrefix: string): StageQueues {
  return {
    extraction: new RedisStageQueue(client, keyPrefix, 'extraction'),
    chunking: new RedisStageQueue(client, keyPrefix, 'chunking'),
    translation: new RedisStageQueue(client, keyPrefix, 'translation'),
    reconstruction: new RedisStageQueue(client, keyPrefix, 'reconstruction'),
  };
}
