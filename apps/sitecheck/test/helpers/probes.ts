import type {
  ProbeClient,
  ProbeClientRequest,
  ProbeResult,
  ProbeTarget,
  RawProbeResponse,
} from '../../src/monitor/types';

export function makeTarget(url: string, overrides: Partial<ProbeTarget> = {}): ProbeTarget {
  return { url, requiredHeaders: [], ...overrides };
}

export function makeTargets(count: number, base = 'https://site.test'): ProbeTarget[] {
  return Array.from({ length: count }, (_unused, index) => makeTarget(`${base}/${index}`));
}

export function rawResponse(
  statusCode = 200,
  opts: { headers?: Record<string, string>; body?: string } = {},
): RawProbeResponse {
  const headers = new Headers(opts.headers);
  return {
    statusCode,
    header: (name) => headers.get(name),
    body: opts.body ?? null,
    bodyTruncated: false,
  };
}

export function makeResult(
  target: ProbeTarget,
  overrides: Partial<Omit<ProbeResult, 'target'>> = {},
): ProbeResult {
  return {
    target,
    roundId: 1,
    outcome: { kind: 'success', statusCode: 200 },
    attempts: 1,
    responseTimeMillis: 10,
    timestampUtc: new Date('2026-10-18T00:00:00.000Z'),
    ...overrides,
  };
}

function abortError(): Error {
  const err = new Error('This operation was aborted');
  err.name = 'AbortError';
  return err;
}

/** Never answers; rejects with an AbortError once the request signal aborts. */
export const hangingClient: ProbeClient = (request) =>
  new Promise<RawProbeResponse>((_resolve, reject) => {
    request.signal.addEventListener('abort', () => reject(abortError()));
  });

type PendingCall = {
  request: ProbeClientRequest;
  resolve: (res: RawProbeResponse) => void;
  reject: (err: unknown) => void;
};

/** A client whose calls stay pending until the test settles them. */
export function controlledClient(): { client: ProbeClient; calls: PendingCall[] } {
  const calls: PendingCall[] = [];
  const client: ProbeClient = (request) =>
    new Promise<RawProbeResponse>((resolve, reject) => {
      calls.push({ request, resolve, reject });
    });
  return { client, calls };
}
