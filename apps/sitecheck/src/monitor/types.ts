import type { HeaderMatch } from '@sitecheck/schema';

export type RequiredHeader = {
  readonly name: string;
  readonly expectedValue: string;
  readonly match: HeaderMatch;
};

export type ProbeTarget = {
  readonly url: string;
  readonly requiredHeaders: readonly RequiredHeader[];
  readonly requiredBodySubstring?: string;
};

export type ValidationFailureReason = 'header_mismatch' | 'body_mismatch';

export type ProbeOutcome =
  | { kind: 'success'; statusCode: number }
  | { kind: 'validation_failure'; reason: ValidationFailureReason; detail: string }
  | { kind: 'transport_error'; message: string; cancelled?: boolean }
  | { kind: 'timeout'; timeoutMs: number };

export type ProbeResult = {
  readonly target: ProbeTarget;
  readonly roundId: number;
  readonly outcome: ProbeOutcome;
  readonly attempts: number;
  readonly responseTimeMillis: number;
  readonly timestampUtc: Date;
};

export type Job = {
  readonly target: ProbeTarget;
  readonly roundId: number;
};

// What the transport hands back for a single request. Header lookup follows HTTP semantics
// (case-insensitive names); `body` is only read when the target asks for a body check.
export type RawProbeResponse = {
  statusCode: number;
  header: (name: string) => string | null;
  body: string | null;
  bodyTruncated: boolean;
};

export type ProbeClientRequest = {
  url: string;
  readBody: boolean;
  signal: AbortSignal;
};

// Resolves with the response or rejects with the transport error. Aborting `signal` must
// reject with an AbortError.
export type ProbeClient = (request: ProbeClientRequest) => Promise<RawProbeResponse>;

export type RetryPolicy = {
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
};

export function isRetryable(outcome: ProbeOutcome): boolean {
  return outcome.kind === 'timeout' || outcome.kind === 'transport_error';
}

export function describeOutcome(outcome: ProbeOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return `HTTP ${outcome.statusCode}`;
    case 'validation_failure':
      return outcome.detail;
    case 'transport_error':
      return outcome.message;
    case 'timeout':
      return `timeout after ${outcome.timeoutMs}ms`;
  }
}
