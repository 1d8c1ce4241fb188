import type { HeaderMatch } from '@sitecheck/schema';

import type { ProbeTarget, RequiredHeader } from './types';

function isValidPort(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= 65535;
}

export function validateHttpTarget(target: string): string | null {
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    return 'target must be a valid URL';
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return 'target protocol must be http or https';
  }

  if (!url.hostname) return 'target must include a hostname';

  const port = url.port ? Number(url.port) : url.protocol === 'http:' ? 80 : 443;
  if (!isValidPort(port)) return 'target port is invalid';

  return null;
}

// `Name: Value`, split at the first colon. Anything without a colon or a name is not a header.
export function parseHeaderOption(raw: string): { name: string; value: string } | null {
  const idx = raw.indexOf(':');
  if (idx === -1) return null;
  const name = raw.slice(0, idx).trim();
  if (name.length === 0) return null;
  return { name, value: raw.slice(idx + 1).trim() };
}

export type TargetChecks = {
  headers: readonly string[];
  headerMatch: HeaderMatch;
  contains?: string;
};

export function buildProbeTargets(urls: readonly string[], checks: TargetChecks): ProbeTarget[] {
  const requiredHeaders: RequiredHeader[] = [];
  for (const raw of checks.headers) {
    const parsed = parseHeaderOption(raw);
    if (!parsed) continue;
    requiredHeaders.push({
      name: parsed.name,
      expectedValue: parsed.value,
      match: checks.headerMatch,
    });
  }

  return urls.map((url) => {
    const target: ProbeTarget = {
      url,
      requiredHeaders,
      ...(checks.contains !== undefined ? { requiredBodySubstring: checks.contains } : {}),
    };
    return Object.freeze(target);
  });
}
