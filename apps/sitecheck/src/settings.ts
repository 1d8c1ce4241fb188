// Environment-backed defaults for the CLI.
//
// - Variables: SITECHECK_THREADS, SITECHECK_TIMEOUT (seconds), SITECHECK_RETRIES,
//   SITECHECK_PERIOD (seconds, empty or unset = run once), SITECHECK_BACKOFF_MS.
// - Values are strings; anything unparsable or out of range falls back to the built-in default.
// - Command-line flags always win over these.

export type Settings = {
  threads: number;
  timeoutSecs: number;
  retries: number;
  periodSecs: number | null;
  backoffMs: number;
};

export const DEFAULT_SETTINGS: Settings = {
  threads: 50,
  timeoutSecs: 5,
  retries: 1,
  periodSecs: null,
  backoffMs: 0,
};

type EnvLike = Record<string, string | undefined>;

function parseIntSetting(
  raw: string | undefined,
  opts: { min: number; max: number },
): number | null {
  if (raw === undefined || raw.trim().length === 0) return null;
  const n = Number(raw.trim());
  if (!Number.isInteger(n)) return null;
  if (n < opts.min || n > opts.max) return null;
  return n;
}

function parseSecondsSetting(raw: string | undefined, opts: { max: number }): number | null {
  if (raw === undefined || raw.trim().length === 0) return null;
  const n = Number(raw.trim());
  if (!Number.isFinite(n) || n <= 0 || n > opts.max) return null;
  return n;
}

export function readSettings(env: EnvLike): Settings {
  const threads =
    parseIntSetting(env.SITECHECK_THREADS, { min: 1, max: 1_000 }) ?? DEFAULT_SETTINGS.threads;
  const timeoutSecs =
    parseSecondsSetting(env.SITECHECK_TIMEOUT, { max: 600 }) ?? DEFAULT_SETTINGS.timeoutSecs;
  const retries =
    parseIntSetting(env.SITECHECK_RETRIES, { min: 0, max: 100 }) ?? DEFAULT_SETTINGS.retries;
  const periodSecs =
    parseSecondsSetting(env.SITECHECK_PERIOD, { max: 7 * 86_400 }) ?? DEFAULT_SETTINGS.periodSecs;
  const backoffMs =
    parseIntSetting(env.SITECHECK_BACKOFF_MS, { min: 0, max: 60_000 }) ??
    DEFAULT_SETTINGS.backoffMs;

  return { threads, timeoutSecs, retries, periodSecs, backoffMs };
}
