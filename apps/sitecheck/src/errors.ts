import { ZodError } from 'zod';

import type { Job } from './monitor/types';

export type ErrorCode = 'INVALID_ARGUMENT' | 'NOT_FOUND' | 'WORKER_FAULT' | 'INTERNAL';

export type ErrorResponse = {
  exitCode: number;
  error: { code: ErrorCode; message: string };
};

export class AppError extends Error {
  constructor(
    public readonly exitCode: number,
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

// A worker threw instead of returning a result. The run is aborted rather than continuing
// with fewer workers.
export class WorkerFaultError extends AppError {
  constructor(
    public readonly workerIndex: number,
    public readonly job: Job,
    cause: unknown,
  ) {
    super(
      70,
      'WORKER_FAULT',
      `worker ${workerIndex} failed while probing ${job.target.url} (round ${job.roundId})`,
      { cause },
    );
    this.name = 'WorkerFaultError';
  }
}

export function handleError(err: unknown): ErrorResponse {
  if (err instanceof WorkerFaultError) {
    console.error(err, err.cause);
    return { exitCode: err.exitCode, error: { code: err.code, message: err.message } };
  }

  if (err instanceof AppError) {
    return { exitCode: err.exitCode, error: { code: err.code, message: err.message } };
  }

  if (err instanceof ZodError) {
    return { exitCode: 1, error: { code: 'INVALID_ARGUMENT', message: err.message } };
  }

  console.error(err);
  return { exitCode: 70, error: { code: 'INTERNAL', message: 'Internal error' } };
}
