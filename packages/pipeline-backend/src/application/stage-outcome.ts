// packages/pipeline-backend/src/application/stage-outcome.ts
//
// Result type for stage operations: collaborators' exceptions become failures at the call
// site, so the stage runner has one explicit failure branch.
import { JobTerminatedError } from '@doc-relay/contracts';

import type { JobPatch, JobStatus } from '../domain/job-model.js';
import { toError } from '../infrastructure/logger.js';

export type StageOutcome<T> = { ok: true; value: T } | { ok: false; reason: string };

export type StageResult =
  | { kind: 'advance'; status: JobStatus; patch: JobPatch }
  | { kind: 'complete'; outputRef: string };

export function succeed<T>(value: T): StageOutcome<T> {
  return { ok: true, value };
}

export function fail(reason: string): { ok: false; reason: string } {
  return { ok: false, reason };
}

// attempt.declaration()
// Cancellation (JobTerminatedError) is not a stage failure and keeps propagating.
export async function attempt<T>(fn: () => Promise<T>): Promise<StageOutcome<T>> {
  try {
    return succeed(await fn());
  } catch (error: unknown) {
    if (error instanceof JobTerminatedError) throw error;
    return fail(toError(error).message);
  }
}
