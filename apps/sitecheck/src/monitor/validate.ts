import type { ProbeOutcome, ProbeTarget, RawProbeResponse, RequiredHeader } from './types';

function headerMatches(required: RequiredHeader, actual: string): boolean {
  if (required.match === 'contains') return actual.includes(required.expectedValue);
  return actual === required.expectedValue;
}

// Headers are checked in order before the body; the first failing check is reported.
export function classifyResponse(target: ProbeTarget, res: RawProbeResponse): ProbeOutcome {
  for (const required of target.requiredHeaders) {
    const actual = res.header(required.name);
    if (actual === null) {
      return {
        kind: 'validation_failure',
        reason: 'header_mismatch',
        detail: `missing required header: ${required.name}`,
      };
    }
    if (!headerMatches(required, actual)) {
      return {
        kind: 'validation_failure',
        reason: 'header_mismatch',
        detail: `header mismatch: ${required.name} expected '${required.expectedValue}' got '${actual}'`,
      };
    }
  }

  const needle = target.requiredBodySubstring;
  if (needle !== undefined && !(res.body ?? '').includes(needle)) {
    return {
      kind: 'validation_failure',
      reason: 'body_mismatch',
      detail: res.bodyTruncated
        ? `body validation failed: missing substring '${needle}' in the first ${(res.body ?? '').length} characters`
        : `body validation failed: missing substring '${needle}'`,
    };
  }

  return { kind: 'success', statusCode: res.statusCode };
}
