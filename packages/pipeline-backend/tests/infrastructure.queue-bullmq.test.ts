import { beforeEach, describe, expect, it, vi } from 'vitest';

const bull = vi.hoisted(() => ({
  constructed: vi.fn(),
  add: vi.fn(),
  on: vi.fn(),
  close: vi.fn(),
}));

vi.mock('bullmq', () => ({
  Queue: vi.fn(function (name: string, opts: unknown) {
    bull.constructed(name, opts);
    return { name, add: bull.add, on: bull.on, close: bull.close };
  }),
}));

// Import SUT after mocks so it binds to the mocked module.
import {
  BullTaskNotifier,
  DEAD_LETTER_QUEUE_NAME,
  DISPATCH_QUEUE_NAME,
} from '../src/infrastructure/queue-bullmq.js';

describe('infrastructure/queue-bullmq', () => {
  /**
   * Intent:
   * - Dispatch and dead-letter notifications land on their BullMQ queues under the key prefix.
   * - Dispatch entries are deduplicated per job and stage.
   */

  const connection = { host: 'localhost', port: 6379 };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('creates both queues under the key prefix and listens for errors', () => {
    new BullTaskNotifier(connection, 'docrelay');

    expect(bull.constructed).toHaveBeenCalledTimes(2);
    expect(bull.constructed).toHaveBeenCalledWith(
      DISPATCH_QUEUE_NAME,
      expect.objectContaining({ connection, prefix: 'docrelay' }),
    );
    expect(bull.constructed).toHaveBeenCalledWith(
      DEAD_LETTER_QUEUE_NAME,
      expect.objectContaining({
        prefix: 'docrelay',
        defaultJobOptions: { removeOnComplete: 1000, removeOnFail: 1000 },
      }),
    );
    expect(bull.on).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('adds a dispatch entry keyed by job and stage', async () => {
    const notifier = new BullTaskNotifier(connection, 'docrelay');
    await notifier.notifyDispatched('job-1', 'translation');

    expect(bull.add).toHaveBeenCalledWith(
      'translation',
      { jobId: 'job-1', stage: 'translation' },
      { jobId: 'job-1-translation' },
    );
  });

  it('moves failed jobs to the dead-letter queue with the reason', async () => {
    const notifier = new BullTaskNotifier(connection, 'docrelay');
    await notifier.notifyFailed('job-1', null, 'Cancelled by user');

    expect(bull.add).toHaveBeenCalledWith(
      'failed',
      { jobId: 'job-1', stage: null, reason: 'Cancelled by user' },
      { jobId: 'job-1' },
    );
  });

  it('closes both queues', async () => {
    const notifier = new BullTaskNotifier(connection, 'docrelay');
    await notifier.close();
    expect(bull.close).toHaveBeenCalledTimes(2);
  });
});
