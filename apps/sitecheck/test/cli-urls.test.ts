import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadUrls, parseUrlList, readUrlFile } from '../src/cli/urls';

describe('cli/urls', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sitecheck-urls-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('skips blank lines and comment lines', () => {
    expect(
      parseUrlList('# prod\nhttps://a.test/\r\n\n   \n  https://b.test/  \n#https://c.test/\n'),
    ).toEqual(['https://a.test/', 'https://b.test/']);
  });

  it('reads URLs from a file', async () => {
    const path = join(dir, 'urls.txt');
    await writeFile(path, 'https://a.test/\n# skip\nhttps://b.test/\n', 'utf8');

    await expect(readUrlFile(path)).resolves.toEqual(['https://a.test/', 'https://b.test/']);
  });

  it('reports a missing file as NOT_FOUND', async () => {
    const path = join(dir, 'missing.txt');
    await expect(readUrlFile(path)).rejects.toMatchObject({
      code: 'NOT_FOUND',
      exitCode: 1,
      message: `URL file not found: ${path}`,
    });
  });

  it('puts file URLs before positional ones', async () => {
    const path = join(dir, 'urls.txt');
    await writeFile(path, 'https://a.test/\n', 'utf8');

    await expect(loadUrls(path, ['https://b.test/', '  '])).resolves.toEqual([
      'https://a.test/',
      'https://b.test/',
    ]);
  });

  it('fails when no URLs are given', async () => {
    const path = join(dir, 'empty.txt');
    await writeFile(path, '# nothing here\n', 'utf8');

    await expect(loadUrls(undefined, [])).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
      message: 'No URLs provided. Provide positional URLs or -f <file>.',
    });
    await expect(loadUrls(path, [])).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
  });

  it('rejects URLs that are not absolute http(s) URLs', async () => {
    await expect(loadUrls(undefined, ['https://a.test/', 'ftp://b.test/'])).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
      message: 'ftp://b.test/: target protocol must be http or https',
    });
    await expect(loadUrls(undefined, ['example.com'])).rejects.toMatchObject({
      message: 'example.com: target must be a valid URL',
    });
  });
});
