// packages/pipeline-backend/src/domain/job-actions.ts
//
// Domain model for administrative job actions (cancel, delete, requeue).
import { JobActionType } from '@doc-relay/contracts';

export { JobActionType };

export interface JobAction {
  type: JobActionType;
  requestedAt: Date;
  requestedBy?: string;
}

export interface CancelJobAction extends JobAction {
  type: JobActionType.CANCEL;
}

export interface DeleteJobAction extends JobAction {
  type: JobActionType.DELETE;
}

export interface RequeueJobAction extends JobAction {
  type: JobActionType.REQUEUE;
}

export type AnyJobAction = CancelJobAction | DeleteJobAction | RequeueJobAction;

export interface JobActionResult {
  success: boolean;
  message: string;
  jobId: string;
  actionType: JobActionType;
  timestamp: Date;
  error?: string;
}
