import { sleep } from '../scheduler/timers';
import { classifyResponse } from './validate';
import {
  isRetryable,
  type Job,
  type ProbeClient,
  type ProbeOutcome,
  type ProbeResult,
  type ProbeTarget,
  type RawProbeResponse,
  type RetryPolicy,
} from './types';

type AttemptResult = { outcome: ProbeOutcome; elapsedMs: number };

type Raced = 'timeout' | { res: RawProbeResponse } | { err: unknown };

function toErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    // fetch wraps DNS/TLS/connect failures as `TypeError: fetch failed` with the real reason in `cause`.
    if (err.cause instanceof Error && err.cause.message) {
      return `${err.message}: ${err.cause.message}`;
    }
    return err.message;
  }
  return String(err);
}

function isAbortError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'name' in err) {
    return err.name === 'AbortError' || err.name === 'TimeoutError';
  }
  return false;
}

async function attemptProbe(
  client: ProbeClient,
  target: ProbeTarget,
  timeoutMs: number,
): Promise<AttemptResult> {
  const started = Date.now();
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  // The client gets an abort signal, but the race below bounds the attempt even if it ignores it.
  const timedOut = new Promise<'timeout'>((resolve) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      resolve('timeout');
    }, timeoutMs);
  });

  try {
    const call = new Promise<RawProbeResponse>((resolve) => {
      resolve(
        client({
          url: target.url,
          readBody: target.requiredBodySubstring !== undefined,
          signal: controller.signal,
        }),
      );
    }).then(
      (res): Raced => ({ res }),
      (err: unknown): Raced => ({ err }),
    );

    const raced = await Promise.race([call, timedOut]);
    const elapsedMs = Math.max(0, Date.now() - started);

    if (raced === 'timeout') {
      return { outcome: { kind: 'timeout', timeoutMs }, elapsedMs };
    }
    if ('err' in raced) {
      if (controller.signal.aborted || isAbortError(raced.err)) {
        return { outcome: { kind: 'timeout', timeoutMs }, elapsedMs };
      }
      return { outcome: { kind: 'transport_error', message: toErrorMessage(raced.err) }, elapsedMs };
    }
    return { outcome: classifyResponse(target, raced.res), elapsedMs };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Probes one job's target until a terminal outcome is reached.
 *
 * Timeouts and transport errors are retried up to `policy.maxRetries` times; successes and
 * validation failures end the job on the attempt that produced them. Once `signal` has aborted
 * no further attempt is started, and the outcome already in hand is reported. Probe failures
 * never throw.
 */
export async function probeWithRetries(
  client: ProbeClient,
  job: Job,
  policy: RetryPolicy,
  signal?: AbortSignal,
): Promise<ProbeResult> {
  const maxAttempts = policy.maxRetries + 1;

  let attempt = 1;
  let last = await attemptProbe(client, job.target, policy.timeoutMs);

  while (isRetryable(last.outcome) && attempt < maxAttempts && !signal?.aborted) {
    const delay = policy.retryBackoffMs * attempt;
    if (delay > 0 && !(await sleep(delay, signal))) break;

    attempt++;
    last = await attemptProbe(client, job.target, policy.timeoutMs);
  }

  return {
    target: job.target,
    roundId: job.roundId,
    outcome: last.outcome,
    attempts: attempt,
    responseTimeMillis: last.elapsedMs,
    timestampUtc: new Date(),
  };
}
