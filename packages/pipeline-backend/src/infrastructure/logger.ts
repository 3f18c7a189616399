// packages/pipeline-backend/src/infrastructure/logger.ts

// Pino-based JSON logger behind a small typed wrapper.
// Pretty output in development; silent under test unless LOG_LEVEL says otherwise.
// Child loggers carry jobId/stage or component bindings.

import pino from 'pino';

import type { PipelineStage } from '../domain/job-model.js';

export interface LogFields {
  jobId?: string;
  stage?: PipelineStage;
  component?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

// logger.declaration()
export const logger: Logger = createRootLogger();

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function createRootLogger(): Logger {
  const base = pino({
    level: resolveLevel(),
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
            },
          }
        : undefined,
  });

  const wrap = (instance: pino.Logger): Logger => ({
    info(msg, fields) {
      instance.info(fields ?? {}, msg);
    },
    warn(msg, fields) {
      instance.warn(fields ?? {}, msg);
    },
    error(msg, fields) {
      if (msg instanceof Error) {
        instance.error(
          {
            ...(fields ?? {}),
            err: {
              message: msg.message,
              stack: msg.stack,
              name: msg.name,
            },
          },
          msg.message,
        );
      } else {
        instance.error(fields ?? {}, msg);
      }
    },
    debug(msg, fields) {
      instance.debug(fields ?? {}, msg);
    },
    child(bindings) {
      return wrap(instance.child(bindings));
    },
  });

  return wrap(base);
}

export function createJobLogger(jobId: string, stage?: PipelineStage): Logger {
  return logger.child(stage ? { jobId, stage } : { jobId });
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
