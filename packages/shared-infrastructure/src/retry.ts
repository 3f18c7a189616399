import { InfrastructureError } from '@doc-relay/contracts';

export interface RetryOptions {
  label: string;
  tries?: number;
  initialDelayMs?: number;
  jitterMs?: number;
  isRetryable?: (error: unknown) => boolean;
}

export class OperationTimeoutError extends InfrastructureError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

const RETRYABLE_STATUSES = new Set<number | string>([429, 503, 'ECONNRESET', 'ETIMEDOUT']);

export function errorStatus(error: unknown): number | string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && (typeof error.status === 'number' || typeof error.status === 'string')) {
    return error.status;
  }
  if ('code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  const status = errorStatus(error);
  return status !== undefined && RETRYABLE_STATUSES.has(status);
}

// withRetry.declaration()
// Exponential backoff for transient provider failures; anything else is rethrown at once.
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const tries = Math.max(1, options.tries ?? 3);
  const jitter = options.jitterMs ?? 120;
  const isRetryable = options.isRetryable ?? isTransientError;
  let delay = options.initialDelayMs ?? 350;

  for (let attempt = 0; attempt < tries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (!isRetryable(error) || attempt === tries - 1) {
        throw error;
      }

      await new Promise((resolve) =>
        setTimeout(resolve, delay + (jitter > 0 ? Math.floor(Math.random() * jitter) : 0)),
      );
      delay *= 2;
    }
  }

  throw new InfrastructureError(`withRetry(${options.label}) exhausted`);
}

// withTimeout.declaration()
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  if (timeoutMs <= 0) return fn();

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
