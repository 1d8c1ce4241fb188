import { StatsAggregator } from './analytics/stats';
import { buildEngineConfig, parseCliArgs, USAGE } from './cli/args';
import { loadUrls } from './cli/urls';
import { handleError } from './errors';
import { fetchProbeClient } from './monitor/http';
import { buildProbeTargets } from './monitor/targets';
import type { ProbeClient } from './monitor/types';
import { formatResultLine } from './output/jsonl';
import { formatSummary } from './output/summary';
import { RoundScheduler } from './scheduler/rounds';
import { readSettings } from './settings';

export type MainDeps = {
  client?: ProbeClient;
  signal?: AbortSignal;
};

/**
 * Runs the checker for `argv` and resolves with the process exit code. Probe results go to
 * stdout as JSON lines followed by a stats summary per round; diagnostics go to stderr.
 */
export async function main(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  deps: MainDeps = {},
): Promise<number> {
  try {
    const { options, urls: positional } = parseCliArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const config = buildEngineConfig(options, readSettings(env));
    const urls = await loadUrls(options.file, positional);
    const targets = buildProbeTargets(urls, {
      headers: options.header,
      headerMatch: options['header-match'],
      contains: options.contains,
    });

    console.error(
      `sitecheck: targets=${targets.length} workers=${config.workerCount} ` +
        `timeout_ms=${config.timeoutMs} retries=${config.maxRetries} ` +
        `period_ms=${config.periodMs ?? 'none'}`,
    );

    const scheduler = new RoundScheduler({
      targets,
      config,
      client: deps.client ?? fetchProbeClient,
      stats: new StatsAggregator(),
      signal: deps.signal,
      sink: {
        onResult: (result) => console.log(formatResultLine(result)),
        onRoundComplete: (round, stats) => {
          console.log(formatSummary(stats));
          console.error(
            `sitecheck: round=${round.roundId} results=${round.results} ` +
              `elapsed_ms=${round.completedAt - round.startedAt}` +
              (round.cancelled ? ' cancelled=true' : ''),
          );
        },
      },
    });

    const report = await scheduler.run();
    console.error(`sitecheck: rounds=${report.rounds} results=${report.results}`);
    console.error('Shutdown complete.');
    return 0;
  } catch (err) {
    const { exitCode, error } = handleError(err);
    console.error(`error: ${error.code}: ${error.message}`);
    return exitCode;
  }
}
