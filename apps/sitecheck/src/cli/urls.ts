import { readFile } from 'node:fs/promises';

import { AppError } from '../errors';
import { validateHttpTarget } from '../monitor/targets';

export function parseUrlList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function readUrlFile(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isNotFound(err)) {
      throw new AppError(1, 'NOT_FOUND', `URL file not found: ${path}`, { cause: err });
    }
    throw err;
  }
  return parseUrlList(text);
}

/** File URLs first, then positional ones. Every URL must be an absolute http(s) URL. */
export async function loadUrls(
  file: string | undefined,
  positional: readonly string[],
): Promise<string[]> {
  const urls: string[] = file !== undefined ? await readUrlFile(file) : [];
  urls.push(...positional.map((u) => u.trim()).filter((u) => u.length > 0));

  if (urls.length === 0) {
    throw new AppError(
      1,
      'INVALID_ARGUMENT',
      'No URLs provided. Provide positional URLs or -f <file>.',
    );
  }

  for (const url of urls) {
    const err = validateHttpTarget(url);
    if (err) {
      throw new AppError(1, 'INVALID_ARGUMENT', `${url}: ${err}`);
    }
  }

  return urls;
}
