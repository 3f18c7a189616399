export class PipelineError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class InfrastructureError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class ValidationError extends PipelineError {
    readonly code: string;

    constructor(message: string, code = 'validation_failed', options?: ErrorOptions) {
        super(message, options);
        this.code = code;
    }
}

export class JobNotFoundError extends PipelineError {
    readonly jobId: string;

    constructor(jobId: string, options?: ErrorOptions) {
        super(`Job not found: ${jobId}`, options);
        this.jobId = jobId;
    }
}

export class JobAlreadyExistsError extends PipelineError {
    readonly jobId: string;

    constructor(jobId: string, options?: ErrorOptions) {
        super(`Job already exists: ${jobId}`, options);
        this.jobId = jobId;
    }
}

/** The stored record moved on since it was read. */
export class RevisionConflictError extends PipelineError {
    readonly jobId: string;
    readonly expectedRevision: number;

    constructor(jobId: string, expectedRevision: number, options?: ErrorOptions) {
        super(`Revision conflict on job ${jobId} (expected revision ${expectedRevision})`, options);
        this.jobId = jobId;
        this.expectedRevision = expectedRevision;
    }
}

/** The job reached COMPLETED or FAILED while its owner still held it. */
export class JobTerminatedError extends PipelineError {
    readonly jobId: string;
    readonly status: string;

    constructor(jobId: string, status: string, options?: ErrorOptions) {
        super(`Job ${jobId} is already ${status}`, options);
        this.jobId = jobId;
        this.status = status;
    }
}

/** A stage tried to finish a visit it does not hold the claim for. */
export class StageClaimError extends PipelineError {
    readonly jobId: string;
    readonly stage: string;
    readonly claimedStage: string | null;

    constructor(jobId: string, stage: string, claimedStage: string | null, options?: ErrorOptions) {
        super(
            `Job ${jobId} is not claimed by the ${stage} stage (claimed by ${claimedStage ?? 'none'})`,
            options,
        );
        this.jobId = jobId;
        this.stage = stage;
        this.claimedStage = claimedStage;
    }
}

export class JobNotCancellableError extends PipelineError {
    readonly jobId: string;

    constructor(jobId: string, message: string, options?: ErrorOptions) {
        super(message, options);
        this.jobId = jobId;
    }
}

export class InvalidTransitionError extends PipelineError {
    readonly from: string;
    readonly to: string;

    constructor(from: string, to: string, options?: ErrorOptions) {
        super(`Invalid job state transition: ${from} -> ${to}`, options);
        this.from = from;
        this.to = to;
    }
}

export class ProgressRegressionError extends PipelineError {
    constructor(jobId: string, current: number, next: number, options?: ErrorOptions) {
        super(`Progress of job ${jobId} cannot move backwards (${current} -> ${next})`, options);
    }
}

export class WriteOnceFieldError extends PipelineError {
    readonly field: string;

    constructor(jobId: string, field: string, options?: ErrorOptions) {
        super(`Field ${field} of job ${jobId} is already set`, options);
        this.field = field;
    }
}

export class RecordDecodeError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}
