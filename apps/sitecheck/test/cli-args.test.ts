import { describe, expect, it } from 'vitest';

import { buildEngineConfig, parseCliArgs } from '../src/cli/args';
import { AppError } from '../src/errors';
import { DEFAULT_SETTINGS } from '../src/settings';

describe('cli/args', () => {
  it('parses short and long options and keeps positional URLs', () => {
    const { options, urls } = parseCliArgs([
      '-n',
      '8',
      '--timeout',
      '2.5',
      '-r',
      '3',
      '-H',
      'Server: nginx',
      '--header',
      'X-Cache: HIT',
      '--header-match',
      'contains',
      '--contains',
      'Welcome',
      'https://a.test/',
      'https://b.test/',
    ]);

    expect(options).toEqual({
      threads: 8,
      timeout: 2.5,
      retries: 3,
      header: ['Server: nginx', 'X-Cache: HIT'],
      'header-match': 'contains',
      contains: 'Welcome',
      help: false,
    });
    expect(urls).toEqual(['https://a.test/', 'https://b.test/']);
  });

  it('applies defaults for flags that were not given', () => {
    expect(parseCliArgs([]).options).toEqual({
      header: [],
      'header-match': 'exact',
      help: false,
    });
    expect(parseCliArgs(['-h']).options.help).toBe(true);
  });

  it('rejects unknown flags and invalid values as INVALID_ARGUMENT', () => {
    for (const argv of [
      ['--bogus'],
      ['-n', '0'],
      ['-n', 'many'],
      ['-t', '0'],
      ['-r', '-1'],
      ['--header-match', 'regex'],
      ['-n'],
    ]) {
      let caught: unknown;
      try {
        parseCliArgs(argv);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(AppError);
      expect(caught).toMatchObject({ exitCode: 1, code: 'INVALID_ARGUMENT' });
    }
  });

  it('builds an engine config from settings when no flags are given', () => {
    const { options } = parseCliArgs([]);
    expect(buildEngineConfig(options, DEFAULT_SETTINGS)).toEqual({
      timeoutMs: 5_000,
      maxRetries: 1,
      workerCount: 50,
      retryBackoffMs: 0,
    });
  });

  it('lets flags win over settings', () => {
    const { options } = parseCliArgs(['-n', '4', '-t', '0.5', '-p', '30', '--backoff', '100']);
    const config = buildEngineConfig(options, {
      ...DEFAULT_SETTINGS,
      threads: 20,
      retries: 2,
      periodSecs: 10,
    });

    expect(config).toEqual({
      timeoutMs: 500,
      maxRetries: 2,
      workerCount: 4,
      retryBackoffMs: 100,
      periodMs: 30_000,
    });
  });
});
