import { probeResultLineSchema, serializeJson, type ProbeResultLine } from '@sitecheck/schema';

import { describeOutcome, type ProbeResult } from '../monitor/types';

export function toResultLine(result: ProbeResult): ProbeResultLine {
  const { outcome } = result;
  return {
    url: result.target.url,
    round: result.roundId,
    status:
      outcome.kind === 'success' ? { ok: outcome.statusCode } : { err: describeOutcome(outcome) },
    attempts: result.attempts,
    response_time: Math.max(0, Math.round(result.responseTimeMillis)),
    timestamp: result.timestampUtc.toISOString(),
  };
}

export function formatResultLine(result: ProbeResult): string {
  return serializeJson(probeResultLineSchema, toResultLine(result), { field: 'probe result' });
}
