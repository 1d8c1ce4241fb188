import { parseArgs } from 'node:util';

import { engineConfigSchema, type EngineConfig } from '@sitecheck/schema';

import { AppError } from '../errors';
import { cliOptionsSchema, type CliOptions } from '../schemas/cli';
import type { Settings } from '../settings';

export const USAGE = `Usage: sitecheck [options] [URL...]

Concurrent website status checker.

Options:
  -n, --threads NUM          worker count (default: 50)
  -t, --timeout SECS         per-attempt request timeout in seconds (default: 5)
  -r, --retries NUM          max retries per URL (default: 1)
  -p, --period SECS          repeat every SECS (default: run once)
  -f, --file PATH            file with one URL per line ('#' starts a comment line)
  -H, --header 'Name: Value' require a response header (repeatable)
      --header-match MODE    compare header values with exact|contains (default: exact)
      --contains TEXT        require the response body to contain TEXT
      --backoff MS           linear backoff between retries in ms (default: 0)
  -h, --help                 show this help

Examples:
  sitecheck https://example.com https://example.org
  sitecheck -f urls.txt -n 80 -t 3 -r 2
  sitecheck -p 60 -H 'Server: nginx' --contains 'Welcome' https://example.com`;

export type ParsedArgs = {
  options: CliOptions;
  urls: string[];
};

function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (err) {
    throw new AppError(1, 'INVALID_ARGUMENT', toErrorMessage(err), { cause: err });
  }

  const r = cliOptionsSchema.safeParse(parsed.values);
  if (!r.success) {
    throw new AppError(1, 'INVALID_ARGUMENT', r.error.message);
  }
  return { options: r.data, urls: parsed.positionals };
}

function parseRaw(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      threads: { type: 'string', short: 'n' },
      timeout: { type: 'string', short: 't' },
      retries: { type: 'string', short: 'r' },
      period: { type: 'string', short: 'p' },
      file: { type: 'string', short: 'f' },
      header: { type: 'string', short: 'H', multiple: true },
      'header-match': { type: 'string' },
      contains: { type: 'string' },
      backoff: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

// Flags win over environment settings.
export function buildEngineConfig(options: CliOptions, settings: Settings): EngineConfig {
  const timeoutSecs = options.timeout ?? settings.timeoutSecs;
  const periodSecs = options.period ?? settings.periodSecs;

  return engineConfigSchema.parse({
    timeoutMs: Math.max(1, Math.round(timeoutSecs * 1000)),
    maxRetries: options.retries ?? settings.retries,
    workerCount: options.threads ?? settings.threads,
    retryBackoffMs: options.backoff ?? settings.backoffMs,
    ...(periodSecs !== null ? { periodMs: Math.max(1, Math.round(periodSecs * 1000)) } : {}),
  });
}
