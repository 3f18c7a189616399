// packages/pipeline-backend/src/infrastructure/redis-job-store.ts
// Redis-backed JobRecordStore.
// - One hash per job at <prefix>:job:<jobId>, encoded by job-record-codec.
// - <prefix>:jobs:active is a sorted set (score = createdAt ms) of non-terminal jobs.
// - create/put run as Lua scripts so the revision check, hash write and index update are atomic.
import {
  JobAlreadyExistsError,
  JobNotFoundError,
  RevisionConflictError,
} from '@doc-relay/contracts';
import type { Redis } from 'ioredis';

import { isTerminal, type JobRecord } from '../domain/job-model.js';
import { decodeJobRecord, encodeJobRecord } from '../domain/job-record-codec.js';
import type { JobRecordStore } from '../domain/job-repository.js';
import { logger } from './logger.js';
import { redisKeys } from './redis.js';

export type RedisJobStoreClient = Pick<Redis, 'eval' | 'hgetall' | 'zrevrange' | 'zrem' | 'del'>;

// KEYS: job hash, active index. ARGV: jobId, score, field/value pairs...
const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('HSET', KEYS[1], unpack(ARGV, 3))
redis.call('ZADD', KEYS[2], ARGV[2], ARGV[1])
return 1
`;

// KEYS: job hash, active index. ARGV: jobId, expected revision, terminal flag, score, pairs...
const PUT_SCRIPT = `
local current = redis.call('HGET', KEYS[1], 'revision')
if not current then return -1 end
if current ~= ARGV[2] then return 0 end
redis.call('HSET', KEYS[1], unpack(ARGV, 5))
if ARGV[3] == '1' then
  redis.call('ZREM', KEYS[2], ARGV[1])
else
  redis.call('ZADD', KEYS[2], ARGV[4], ARGV[1])
end
return 1
`;

function toPairs(hash: Record<string, string>): string[] {
  return Object.entries(hash).flat();
}

export class RedisJobStore implements JobRecordStore {
  constructor(
    private readonly client: RedisJobStoreClient,
    private readonly keyPrefix: string,
  ) {}

  async create(job: JobRecord): Promise<JobRecord> {
    const result = await this.client.eval(
      CREATE_SCRIPT,
      2,
      redisKeys.job(this.keyPrefix, job.jobId),
      redisKeys.activeJobs(this.keyPrefix),
      job.jobId,
      String(job.createdAt.getTime()),
      ...toPairs(encodeJobRecord(job)),
    );

    if (result === 0) {
      throw new JobAlreadyExistsError(job.jobId);
    }
    return job;
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const hash = await this.client.hgetall(redisKeys.job(this.keyPrefix, jobId));
    if (Object.keys(hash).length === 0) return null;
    return decodeJobRecord(hash);
  }

  async put(job: JobRecord): Promise<JobRecord> {
    const stored: JobRecord = { ...job, revision: job.revision + 1 };

    const result = await this.client.eval(
      PUT_SCRIPT,
      2,
      redisKeys.job(this.keyPrefix, job.jobId),
      redisKeys.activeJobs(this.keyPrefix),
      job.jobId,
      String(job.revision),
      isTerminal(job.status) ? '1' : '0',
      String(job.createdAt.getTime()),
      ...toPairs(encodeJobRecord(stored)),
    );

    if (result === -1) throw new JobNotFoundError(job.jobId);
    if (result === 0) throw new RevisionConflictError(job.jobId, job.revision);
    return stored;
  }

  async listActive(limit: number): Promise<JobRecord[]> {
    if (limit <= 0) return [];

    const activeKey = redisKeys.activeJobs(this.keyPrefix);
    const jobIds = await this.client.zrevrange(activeKey, 0, limit - 1);

    const jobs = await Promise.all(jobIds.map((jobId) => this.get(jobId)));
    const active: JobRecord[] = [];

    for (const [i, job] of jobs.entries()) {
      if (job && !isTerminal(job.status)) {
        active.push(job);
        continue;
      }
      // Hash is gone but the index entry survived (interrupted delete).
      const jobId = jobIds[i];
      if (!job && jobId !== undefined) {
        logger.warn('Dropping stale active-index entry', { component: 'job-store', jobId });
        await this.client.zrem(activeKey, jobId);
      }
    }

    return active;
  }

  async delete(jobId: string): Promise<boolean> {
    const removed = await this.client.del(redisKeys.job(this.keyPrefix, jobId));
    await this.client.zrem(redisKeys.activeJobs(this.keyPrefix), jobId);
    return removed > 0;
  }
}
