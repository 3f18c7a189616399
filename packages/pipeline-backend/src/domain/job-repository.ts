// packages/pipeline-backend/src/domain/job-repository.ts
//
// Persistence port for job records.
// Implementations must make `put` an atomic compare-and-set on `revision`.
import type { JobRecord } from './job-model.js';

export interface JobRecordStore {
  /** Throws JobAlreadyExistsError when the id is taken. */
  create(job: JobRecord): Promise<JobRecord>;
  get(jobId: string): Promise<JobRecord | null>;
  /**
   * Full overwrite, accepted only while the stored revision equals `job.revision`.
   * Returns the stored record with the bumped revision.
   * Throws RevisionConflictError on a stale revision and JobNotFoundError when missing.
   */
  put(job: JobRecord): Promise<JobRecord>;
  /** Non-terminal jobs, newest first. */
  listActive(limit: number): Promise<JobRecord[]>;
  delete(jobId: string): Promise<boolean>;
}
