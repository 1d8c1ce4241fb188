import type { ProbeResult } from '../monitor/types';
import {
  createLatencyHistogram,
  percentileFromHistogram,
  recordLatency,
  type LatencyHistogram,
} from './latency';

type UrlStats = {
  checks: number;
  successes: number;
  totalResponseTimeMillis: number;
  latency: LatencyHistogram;
};

export type StatsRecord = {
  url: string;
  checks: number;
  successes: number;
  totalResponseTimeMillis: number;
  /** `null` while `checks` is 0. */
  uptimePercent: number | null;
  avgResponseTimeMillis: number | null;
  p95ResponseTimeMillis: number | null;
};

/**
 * Cumulative per-URL check statistics. Counters are never reset, so each snapshot covers every
 * round since the aggregator was created.
 */
export class StatsAggregator {
  // Map iteration follows insertion order, which gives first-seen URL order for snapshots.
  private readonly byUrl = new Map<string, UrlStats>();

  update(result: ProbeResult): void {
    const url = result.target.url;
    let entry = this.byUrl.get(url);
    if (!entry) {
      entry = {
        checks: 0,
        successes: 0,
        totalResponseTimeMillis: 0,
        latency: createLatencyHistogram(),
      };
      this.byUrl.set(url, entry);
    }

    entry.checks += 1;
    if (result.outcome.kind === 'success') {
      entry.successes += 1;
    }
    entry.totalResponseTimeMillis += result.responseTimeMillis;
    recordLatency(entry.latency, result.responseTimeMillis);
  }

  snapshot(): StatsRecord[] {
    return Array.from(this.byUrl, ([url, s]) => ({
      url,
      checks: s.checks,
      successes: s.successes,
      totalResponseTimeMillis: s.totalResponseTimeMillis,
      uptimePercent: s.checks === 0 ? null : (100 * s.successes) / s.checks,
      avgResponseTimeMillis: s.checks === 0 ? null : s.totalResponseTimeMillis / s.checks,
      p95ResponseTimeMillis: percentileFromHistogram(s.latency, 0.95),
    }));
  }
}
