import { describe, expect, it } from 'vitest';

import type { StatsRecord } from '../src/analytics/stats';
import { formatStatsLine, formatSummary } from '../src/output/summary';

const record: StatsRecord = {
  url: 'https://a.test/',
  checks: 3,
  successes: 2,
  totalResponseTimeMillis: 100,
  uptimePercent: 200 / 3,
  avgResponseTimeMillis: 100 / 3,
  p95ResponseTimeMillis: 50,
};

describe('output/summary', () => {
  it('formats one line per URL', () => {
    expect(formatStatsLine(record)).toBe(
      'https://a.test/ -> checks: 3, uptime: 66.7%, avg_rt_ms: 33.3, p95_rt_ms: 50',
    );
  });

  it('prints N/A when nothing has been checked', () => {
    expect(
      formatStatsLine({
        url: 'https://b.test/',
        checks: 0,
        successes: 0,
        totalResponseTimeMillis: 0,
        uptimePercent: null,
        avgResponseTimeMillis: null,
        p95ResponseTimeMillis: null,
      }),
    ).toBe('https://b.test/ -> checks: 0, uptime: N/A, avg_rt_ms: N/A, p95_rt_ms: N/A');
  });

  it('wraps the records between header and footer lines', () => {
    expect(formatSummary([record]).split('\n')).toEqual([
      '--- stats summary ---',
      'https://a.test/ -> checks: 3, uptime: 66.7%, avg_rt_ms: 33.3, p95_rt_ms: 50',
      '---------------------',
    ]);
    expect(formatSummary([])).toBe('--- stats summary ---\n---------------------');
  });
});
