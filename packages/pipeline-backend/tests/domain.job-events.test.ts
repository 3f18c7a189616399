import { describe, expect, it, vi } from 'vitest';

import {
  publishJobEvent,
  subscribeJobEvents,
  toJobEventMessage,
  type JobEvent,
} from '../src/domain/job-events.js';
import { makeJob } from './support/in-memory.js';

describe('domain/job-events', () => {
  /**
   * Intent:
   * - In-process bus for record writes; filtered subscriptions and clean unsubscribe.
   */

  it('delivers events to every subscriber until it unsubscribes', () => {
    const listener = vi.fn();
    const unsubscribe = subscribeJobEvents(listener);
    const event: JobEvent = { type: 'job_created', job: makeJob() };

    publishJobEvent(event);
    unsubscribe();
    publishJobEvent(event);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(event);
  });

  it('filters by job id when asked', () => {
    const listener = vi.fn();
    const unsubscribe = subscribeJobEvents(listener, { jobIds: ['job-2'] });

    publishJobEvent({ type: 'job_updated', job: makeJob({ jobId: 'job-1' }) });
    publishJobEvent({ type: 'job_updated', job: makeJob({ jobId: 'job-2' }) });
    unsubscribe();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0]).toMatchObject({ job: { jobId: 'job-2' } });
  });

  it('keeps a throwing subscriber away from the publisher and other subscribers', () => {
    const failing = subscribeJobEvents(() => {
      throw new Error('listener broke');
    });
    const listener = vi.fn();
    const unsubscribe = subscribeJobEvents(listener);
    const event: JobEvent = { type: 'job_updated', job: makeJob() };

    expect(() => publishJobEvent(event)).not.toThrow();
    failing();
    unsubscribe();

    expect(listener).toHaveBeenCalledWith(event);
  });

  it('projects events onto the public message shape', () => {
    const message = toJobEventMessage({
      type: 'job_updated',
      job: makeJob({ status: 'TRANSLATING', progress: 40 }),
    });
    expect(message).toEqual({ type: 'job_updated', jobId: 'job-1', status: 'TRANSLATING', progress: 40 });
  });
});
