import type { EngineConfig } from '@sitecheck/schema';

import { StatsAggregator, type StatsRecord } from '../analytics/stats';
import { probeWithRetries } from '../monitor/retry';
import type { Job, ProbeClient, ProbeResult, ProbeTarget, RetryPolicy } from '../monitor/types';
import { runWorkerPool } from './pool';
import { AsyncQueue } from './queue';
import { sleep } from './timers';

export type SchedulerState =
  | 'idle'
  | 'running_round'
  | 'draining'
  | 'awaiting_next_period'
  | 'terminated';

export type RoundSummary = {
  roundId: number;
  startedAt: number;
  completedAt: number;
  results: number;
  cancelled: boolean;
};

export type RoundSink = {
  onResult?: (result: ProbeResult) => void;
  onRoundComplete?: (round: RoundSummary, stats: StatsRecord[]) => void;
};

export type RoundSchedulerOptions = {
  targets: readonly ProbeTarget[];
  config: EngineConfig;
  client: ProbeClient;
  sink?: RoundSink;
  stats?: StatsAggregator;
  signal?: AbortSignal;
  onStateChange?: (state: SchedulerState, roundId: number) => void;
};

export type RunReport = {
  rounds: number;
  results: number;
  cancelled: boolean;
  stats: StatsRecord[];
};

/**
 * Drives probing rounds over the full target set.
 *
 * One worker pool serves every round. Each round enqueues one job per target and waits for the
 * same number of results before anything of the next round is enqueued. With `periodMs` set,
 * rounds start `periodMs` apart (measured from round start; an overrunning round is followed
 * by the next one immediately). Cancellation lets the current round drain, then terminates.
 */
export class RoundScheduler {
  private state: SchedulerState = 'idle';
  private roundId = 0;
  private totalResults = 0;
  readonly stats: StatsAggregator;

  constructor(private readonly opts: RoundSchedulerOptions) {
    this.stats = opts.stats ?? new StatsAggregator();
  }

  get currentState(): SchedulerState {
    return this.state;
  }

  async run(): Promise<RunReport> {
    if (this.state !== 'idle') {
      throw new Error(`RoundScheduler.run() called in state ${this.state}`);
    }

    const { config, client, signal } = this.opts;
    const policy: RetryPolicy = {
      timeoutMs: config.timeoutMs,
      maxRetries: config.maxRetries,
      retryBackoffMs: config.retryBackoffMs,
    };

    const jobs = new AsyncQueue<Job>();
    const results = new AsyncQueue<ProbeResult>();
    const pool = runWorkerPool({
      jobs,
      results,
      workerCount: config.workerCount,
      probe: (job) => probeWithRetries(client, job, policy, signal),
      signal,
    });

    try {
      while (!signal?.aborted) {
        const round = await this.runRound(jobs, results, pool);

        if (config.periodMs === undefined || round.cancelled || signal?.aborted) break;
        if (config.maxRounds !== undefined && round.roundId >= config.maxRounds) break;

        this.transition('awaiting_next_period');
        const wait = round.startedAt + config.periodMs - Date.now();
        if (!(await sleep(wait, signal))) break;
      }
    } finally {
      this.transition('terminated');
      jobs.drain();
      jobs.close();
      // Workers exit once the queue is closed; never return while one is still probing.
      await pool;
    }

    return {
      rounds: this.roundId,
      results: this.totalResults,
      cancelled: signal?.aborted ?? false,
      stats: this.stats.snapshot(),
    };
  }

  private async runRound(
    jobs: AsyncQueue<Job>,
    results: AsyncQueue<ProbeResult>,
    pool: Promise<void>,
  ): Promise<RoundSummary> {
    const { targets, sink, signal } = this.opts;

    this.roundId += 1;
    const roundId = this.roundId;
    const startedAt = Date.now();
    this.transition('running_round');

    let enqueued = 0;
    for (const target of targets) {
      if (signal?.aborted) break;
      jobs.push({ target, roundId });
      enqueued += 1;
    }

    let received = 0;
    let cancelled = enqueued < targets.length;
    while (received < enqueued) {
      const result = await results.take();
      if (result === null) {
        // The pool closes the channel when it stops; surface its fault if it had one.
        await pool;
        throw new Error(`results channel closed with ${enqueued - received} results outstanding`);
      }
      received += 1;
      if (result.outcome.kind === 'transport_error' && result.outcome.cancelled) {
        cancelled = true;
      }
      this.stats.update(result);
      sink?.onResult?.(result);
    }
    this.totalResults += received;

    this.transition('draining');
    const summary: RoundSummary = {
      roundId,
      startedAt,
      completedAt: Date.now(),
      results: received,
      cancelled,
    };
    sink?.onRoundComplete?.(summary, this.stats.snapshot());
    return summary;
  }

  private transition(next: SchedulerState): void {
    if (this.state === next || this.state === 'terminated') return;
    this.state = next;
    this.opts.onStateChange?.(next, this.roundId);
  }
}
