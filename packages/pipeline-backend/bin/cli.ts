#!/usr/bin/env tsx
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { PipelineError, ValidationError } from '@doc-relay/contracts';
import { loadEnvFiles } from '@doc-relay/shared-infrastructure';
import { Command, InvalidOptionArgumentError } from 'commander';
import pc from 'picocolors';

import {
  createPipelineServices,
  executeJobAction,
  getJobStatus,
  getQueueStatus,
  JobActionType,
  startWorkers,
  submitJob,
  toJobActionResponse,
  type PipelineServices,
} from '../src/index.js';

const moduleDir = dirname(fileURLToPath(import.meta.url));
const repoEnvPath = resolve(moduleDir, '../../../.env');
const envFiles = ['.env'];
if (existsSync(repoEnvPath)) {
  envFiles.push(repoEnvPath);
}
loadEnvFiles({ files: envFiles, cwd: process.cwd(), assignToProcess: true, override: false });

interface JsonFlag {
  json?: boolean;
}

interface SubmitFlags extends JsonFlag {
  source?: string;
  target?: string;
  tier?: string;
}

interface QueuesFlags extends JsonFlag {
  limit: number;
}

interface ActionFlags extends JsonFlag {
  by?: string;
}

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new InvalidOptionArgumentError('Expected a positive integer.');
  }
  return parsed;
};

const print = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

const STATUS_COLORS: Record<string, (text: string) => string> = {
  COMPLETED: pc.green,
  FAILED: pc.red,
  PENDING: pc.dim,
};

const colorStatus = (status: string): string => (STATUS_COLORS[status] ?? pc.cyan)(status);

// Opens services for one command and always closes the Redis connections afterwards.
async function withServices(fn: (services: PipelineServices) => Promise<void>): Promise<void> {
  const services = createPipelineServices();
  try {
    await fn(services);
  } finally {
    await services.close();
  }
}

function fail(error: unknown): never {
  if (error instanceof ValidationError) {
    console.error(pc.red(`${error.message} (${error.code})`));
  } else if (error instanceof PipelineError) {
    console.error(pc.red(error.message));
  } else {
    console.error(pc.red(error instanceof Error ? (error.stack ?? error.message) : String(error)));
  }
  process.exit(1);
}

async function runAction(type: JobActionType, jobId: string, flags: ActionFlags): Promise<void> {
  await withServices(async ({ manager }) => {
    const result = await executeJobAction(manager, jobId, {
      type,
      requestedAt: new Date(),
      requestedBy: flags.by,
    });
    const response = toJobActionResponse(result);

    if (flags.json) {
      print(response);
    } else if (response.success) {
      console.log(pc.green(`✔ ${response.message}`), pc.dim(jobId));
    } else {
      console.error(pc.red(`✖ ${response.message}`), pc.dim(jobId));
    }
    if (!response.success) process.exitCode = 1;
  });
}

const program = new Command()
  .name('doc-relay')
  .description('Submit documents for translation and manage pipeline jobs');

program
  .command('submit')
  .description('Validate a document and enqueue it for translation')
  .argument('<file>', 'Path to the source document')
  .option('--source <lang>', 'Source language (default: auto)')
  .option('--target <lang>', 'Target language (default: vi)')
  .option('--tier <tier>', 'Translation tier: basic, standard or premium')
  .option('--json', 'Print the response as JSON')
  .action(async (file: string, flags: SubmitFlags) => {
    await withServices(async ({ config, manager, extractors }) => {
      const response = await submitJob(
        { manager, extractors, maxFileSize: config.uploads.maxFileSize },
        { filePath: resolve(file), sourceLang: flags.source, targetLang: flags.target, tier: flags.tier },
      );
      if (flags.json) {
        print(response);
        return;
      }
      console.log(pc.green('✔ Job submitted'));
      console.log(`  id:        ${response.jobId}`);
      console.log(`  pages:     ${response.totalPages}`);
      console.log(`  estimated: ${response.estimatedTime}`);
    });
  });

program
  .command('status')
  .description('Show the status of a job')
  .argument('<jobId>', 'Job identifier')
  .option('--json', 'Print the job as JSON')
  .action(async (jobId: string, flags: JsonFlag) => {
    await withServices(async ({ manager }) => {
      const status = await getJobStatus(manager, jobId);
      if (!status) {
        throw new ValidationError(`Job not found: ${jobId}`, 'not_found');
      }
      if (flags.json) {
        print(status);
        return;
      }
      console.log(`${pc.bold(status.jobId)} ${colorStatus(status.status)} ${status.progress}%`);
      console.log(`  pages:  ${status.processedPages}/${status.totalPages}`);
      console.log(`  langs:  ${status.sourceLang} -> ${status.targetLang} (${status.tier})`);
      if (status.error) console.log(`  error:  ${pc.red(status.error)}`);
      if (status.finalOutput) console.log(`  output: ${status.finalOutput}`);
    });
  });

program
  .command('queues')
  .description('Show pending queue depths and active jobs')
  .option('--limit <n>', 'Number of active jobs to list', parsePositiveInt, 10)
  .option('--json', 'Print the queue status as JSON')
  .action(async (flags: QueuesFlags) => {
    await withServices(async ({ manager }) => {
      const status = await getQueueStatus(manager, flags.limit);
      if (flags.json) {
        print(status);
        return;
      }
      for (const [stage, depth] of Object.entries(status.pending)) {
        console.log(`${stage.padEnd(15)} ${depth}`);
      }
      if (status.activeJobs.length === 0) {
        console.log(pc.dim('No active jobs'));
        return;
      }
      console.log('');
      for (const job of status.activeJobs) {
        console.log(`${job.jobId} ${colorStatus(job.status)} ${job.progress}% (${job.totalPages} pages)`);
      }
    });
  });

for (const [name, type, description] of [
  ['cancel', JobActionType.CANCEL, 'Cancel a job that has not finished'],
  ['delete', JobActionType.DELETE, 'Delete a job record'],
  ['requeue', JobActionType.REQUEUE, 'Push a stuck job back onto the queue it is waiting for'],
] as const) {
  program
    .command(name)
    .description(description)
    .argument('<jobId>', 'Job identifier')
    .option('--by <name>', 'Who requested the action')
    .option('--json', 'Print the action response as JSON')
    .action((jobId: string, flags: ActionFlags) => runAction(type, jobId, flags));
}

program
  .command('workers')
  .description('Start the stage worker pools (runs until SIGINT/SIGTERM)')
  .action(() => startWorkers());

try {
  await program.parseAsync();
} catch (error: unknown) {
  fail(error);
}
