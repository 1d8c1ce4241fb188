import { WorkerFaultError } from '../errors';
import type { Job, ProbeResult } from '../monitor/types';
import type { AsyncQueue } from './queue';

export type WorkerPoolOptions = {
  jobs: AsyncQueue<Job>;
  results: AsyncQueue<ProbeResult>;
  workerCount: number;
  probe: (job: Job) => Promise<ProbeResult>;
  signal?: AbortSignal;
};

export const CANCELLED_MESSAGE = 'cancelled before dispatch';

export function cancelledResult(job: Job): ProbeResult {
  return {
    target: job.target,
    roundId: job.roundId,
    outcome: { kind: 'transport_error', message: CANCELLED_MESSAGE, cancelled: true },
    attempts: 1,
    responseTimeMillis: 0,
    timestampUtc: new Date(),
  };
}

async function runWorker(index: number, opts: WorkerPoolOptions): Promise<void> {
  const { jobs, results, probe, signal } = opts;

  while (true) {
    const job = await jobs.take(signal);
    if (job === null) return;

    let result: ProbeResult;
    try {
      result = await probe(job);
    } catch (err) {
      // Stop feeding the other workers; they finish what they hold and exit.
      jobs.drain();
      jobs.close();
      throw new WorkerFaultError(index, job, err);
    }
    results.push(result);
  }
}

function isRejected(r: PromiseSettledResult<void>): r is PromiseRejectedResult {
  return r.status === 'rejected';
}

/**
 * Runs `workerCount` workers over the shared job queue until it is closed and empty, or until
 * `signal` aborts. Every job a worker takes produces exactly one result; an in-flight probe is
 * never interrupted. Jobs still queued when cancellation stops the workers are published as
 * cancelled results. The results queue is closed once every worker has exited.
 *
 * Rejects with the first {@link WorkerFaultError} once all workers have exited.
 */
export async function runWorkerPool(opts: WorkerPoolOptions): Promise<void> {
  const count = Math.max(1, Math.trunc(opts.workerCount));
  const settled = await Promise.allSettled(
    Array.from({ length: count }, (_unused, index) => runWorker(index, opts)),
  );

  const fault = settled.find(isRejected);
  if (!fault && opts.signal?.aborted) {
    for (const job of opts.jobs.drain()) {
      opts.results.push(cancelledResult(job));
    }
  }

  // The pool is the only producer of results: nothing more will arrive.
  opts.results.close();
  if (fault) throw fault.reason;
}
