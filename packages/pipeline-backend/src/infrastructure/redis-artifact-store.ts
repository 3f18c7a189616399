// packages/pipeline-backend/src/infrastructure/redis-artifact-store.ts
// Intermediate stage outputs kept in Redis with a TTL (default one day).
// The reference handed back is the Redis key itself.
import { InfrastructureError } from '@doc-relay/contracts';
import type { Redis } from 'ioredis';

import type { ArtifactKind, ArtifactStore } from '../domain/artifact-store.js';
import { redisKeys } from './redis.js';

export type RedisArtifactClient = Pick<Redis, 'setex' | 'get'>;

export class RedisArtifactStore implements ArtifactStore {
  constructor(
    private readonly client: RedisArtifactClient,
    private readonly keyPrefix: string,
    private readonly ttlSeconds: number,
  ) {}

  async save(jobId: string, kind: ArtifactKind, content: string): Promise<string> {
    const key = redisKeys.artifact(this.keyPrefix, jobId, kind);
    await this.client.setex(key, this.ttlSeconds, content);
    return key;
  }

  async load(ref: string): Promise<string> {
    const content = await this.client.get(ref);
    if (content === null) {
      throw new InfrastructureError(`Artifact ${ref} is missing or expired`);
    }
    return content;
  }
}
