import type { StatsRecord } from '../analytics/stats';

const HEADER = '--- stats summary ---';
const FOOTER = '---------------------';

function fixed1(n: number | null): string {
  return n === null ? 'N/A' : n.toFixed(1);
}

export function formatStatsLine(record: StatsRecord): string {
  const uptime = record.uptimePercent === null ? 'N/A' : `${fixed1(record.uptimePercent)}%`;
  const p95 = record.p95ResponseTimeMillis === null ? 'N/A' : String(record.p95ResponseTimeMillis);
  return (
    `${record.url} -> checks: ${record.checks}, uptime: ${uptime}, ` +
    `avg_rt_ms: ${fixed1(record.avgResponseTimeMillis)}, p95_rt_ms: ${p95}`
  );
}

export function formatSummary(records: readonly StatsRecord[]): string {
  return [HEADER, ...records.map(formatStatsLine), FOOTER].join('\n');
}
