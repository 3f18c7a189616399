// packages/contracts/src/job-actions.ts
//
// Administrative actions a client can request on an existing job.

export enum JobActionType {
  CANCEL = 'cancel',
  DELETE = 'delete',
  REQUEUE = 'requeue',
}

export interface JobActionRequest {
  type: JobActionType;
  payload?: Record<string, unknown>;
}

export interface JobActionResponse {
  success: boolean;
  message: string;
  jobId: string;
  actionType: JobActionType;
  timestamp: string;
  error?: string;
}
