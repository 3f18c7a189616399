// packages/pipeline-backend/src/transport/worker-runner.ts
// Worker entrypoint: starts a pool of polling loops per stage.
// Usage:
//   tsx src/transport/worker-runner.ts
//
// The runner:
// - Starts N StageWorker loops per stage (EXTRACTION_WORKERS, CHUNKING_WORKERS, ...).
// - On SIGINT/SIGTERM aborts the loops, waits for in-flight jobs, then closes connections.
import { fileURLToPath } from 'node:url';

import { PIPELINE_STAGES } from '@doc-relay/contracts';
import { loadEnvFiles } from '@doc-relay/shared-infrastructure';

import { createPipelineServices, type PipelineServices } from '../application/pipeline-services.js';
import { StageWorker } from '../application/stage-worker.js';
import { subscribeJobEvents, toJobEventMessage } from '../domain/job-events.js';
import { logger, toError } from '../infrastructure/logger.js';

export interface RunningWorkers {
  workers: StageWorker[];
  /** Aborts every loop and resolves once all of them have returned. */
  stop(): Promise<void>;
  done: Promise<void>;
}

// startStageWorkers.declaration()
export function startStageWorkers(services: PipelineServices): RunningWorkers {
  const controller = new AbortController();
  const { config, handlers, queues, manager } = services;

  const workers = PIPELINE_STAGES.flatMap((stage) =>
    Array.from(
      { length: config.workers.pools[stage] },
      (_, i) =>
        new StageWorker(
          handlers[stage],
          queues[stage],
          manager,
          {
            popTimeoutSeconds: config.workers.popTimeoutSeconds,
            errorBackoffMs: config.workers.idleBackoffMs,
          },
          `${stage}-${i + 1}`,
        ),
    ),
  );

  const done = Promise.all(workers.map((worker) => worker.run(controller.signal))).then(
    () => undefined,
  );

  return {
    workers,
    done,
    async stop() {
      controller.abort();
      await done;
    },
  };
}

// startWorkers.declaration()
export async function startWorkers(): Promise<void> {
  loadEnvFiles();
  const services = createPipelineServices();
  const running = startStageWorkers(services);

  const unsubscribe = subscribeJobEvents((event) => {
    logger.debug('Job event', { component: 'worker', ...toJobEventMessage(event) });
  });

  const shutdown = async (signal: string) => {
    logger.info(`Shutting down workers (${signal})`, { component: 'worker' });
    try {
      await running.stop();
      unsubscribe();
      await services.close();
      logger.info('Workers closed cleanly', { component: 'worker' });
      process.exit(0);
    } catch (error: unknown) {
      logger.error(toError(error), {
        component: 'worker',
        message: 'Error during worker shutdown',
      });
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  logger.info('Workers started', {
    component: 'worker',
    pools: services.config.workers.pools,
  });
}

// Allow running directly: tsx src/transport/worker-runner.ts
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startWorkers().catch((error: unknown) => {
    logger.error(toError(error), {
      component: 'worker',
      message: 'Failed to start workers',
    });
    process.exit(1);
  });
}
