import type { ProbeClient, ProbeClientRequest, RawProbeResponse } from './types';

const USER_AGENT = 'sitecheck/0.1';
export const MAX_BODY_BYTES = 1024 * 1024; // 1 MiB

async function readTextUpTo(
  stream: ReadableStream<Uint8Array>,
  maxBytes: number,
): Promise<{ text: string; truncated: boolean }> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let bytes = 0;
  let text = '';
  let truncated = false;

  try {
    while (true) {
      const r = await reader.read();
      if (r.done) break;

      const chunk = r.value;
      if (!chunk || chunk.length === 0) continue;

      const remaining = maxBytes - bytes;
      if (remaining <= 0) {
        truncated = true;
        break;
      }

      if (chunk.length <= remaining) {
        bytes += chunk.length;
        text += decoder.decode(chunk, { stream: true });
      } else {
        bytes += remaining;
        text += decoder.decode(chunk.slice(0, remaining), { stream: true });
        truncated = true;
        break;
      }
    }
  } finally {
    if (truncated) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }

  text += decoder.decode();
  return { text, truncated };
}

/**
 * Default transport: a single GET through the global `fetch`, following redirects.
 *
 * The body is read (up to {@link MAX_BODY_BYTES}) only when the caller asks for it; otherwise
 * the stream is cancelled as soon as the status line and headers are in.
 */
export const fetchProbeClient: ProbeClient = async (
  request: ProbeClientRequest,
): Promise<RawProbeResponse> => {
  const res = await fetch(request.url, {
    method: 'GET',
    headers: { 'User-Agent': USER_AGENT, 'Cache-Control': 'no-cache' },
    redirect: 'follow',
    signal: request.signal,
  });

  const header = (name: string) => res.headers.get(name);

  if (!request.readBody || !res.body) {
    await res.body?.cancel().catch(() => undefined);
    return { statusCode: res.status, header, body: request.readBody ? '' : null, bodyTruncated: false };
  }

  const { text, truncated } = await readTextUpTo(res.body, MAX_BODY_BYTES);
  return { statusCode: res.status, header, body: text, bodyTruncated: truncated };
};
