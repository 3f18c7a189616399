// packages/pipeline-backend/src/domain/job-events.ts
//
// In-process event bus broadcasting job record writes.
// Implemented with a singleton EventEmitter so all publishers/subscribers share the same bus.
// Publishing is synchronous; a throwing subscriber is logged and never reaches the publisher.

import { EventEmitter } from 'node:events';

import type { JobEventMessage, JobEventType } from '@doc-relay/contracts';

import { logger, toError } from '../infrastructure/logger.js';
import type { JobRecord } from './job-model.js';

export type { JobEventType };

export interface JobEvent {
  type: JobEventType;
  job: JobRecord;
}

const JOB_EVENT = 'job_event';

const jobEventEmitter = new EventEmitter();
jobEventEmitter.setMaxListeners(0);

export type JobSubscriptionOptions = {
  /**
   * One or more job IDs to listen for. If omitted or empty, all jobs are delivered.
   */
  jobIds?: string[];
};

export function publishJobEvent(event: JobEvent): void {
  jobEventEmitter.emit(JOB_EVENT, event);
}

export function subscribeJobEvents(
  listener: (event: JobEvent) => void,
  options?: JobSubscriptionOptions,
): () => void {
  const jobIds = options?.jobIds && options.jobIds.length > 0 ? new Set(options.jobIds) : null;

  const handler = (event: JobEvent) => {
    if (jobIds && !jobIds.has(event.job.jobId)) return;
    try {
      listener(event);
    } catch (error: unknown) {
      logger.error(toError(error), {
        component: 'job-events',
        jobId: event.job.jobId,
        eventType: event.type,
      });
    }
  };

  jobEventEmitter.on(JOB_EVENT, handler);
  return () => {
    jobEventEmitter.off(JOB_EVENT, handler);
  };
}

export function toJobEventMessage(event: JobEvent): JobEventMessage {
  return {
    type: event.type,
    jobId: event.job.jobId,
    status: event.job.status,
    progress: event.job.progress,
  };
}
