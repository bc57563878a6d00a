import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { Logger } from 'pino';
import type { EventCatalog, StatisticsMap } from './domain/index.js';
import { eventWeights } from './domain/index.js';
import {
  accumulateEvents,
  assertCatalogMatchesStatistics,
  computeStatistics,
  generateEvents,
  runAlertLoop,
  toLogRecords,
} from './application/index.js';
import type { AlertLoopContext, LineInput, RandomSource } from './application/index.js';
import { artifactPath, loadAppConfig } from './infrastructure/config.js';
import type { AppConfig } from './infrastructure/config.js';
import { createLogger } from './infrastructure/logger.js';
import {
  loadCatalog,
  loadStatistics,
  writeBaseline,
  writeComputedStatistics,
  writeLogBatch,
} from './infrastructure/files/index.js';
import { createReadlineInput } from './interfaces/console/readline-input.js';
import {
  banner,
  createConsoleOutput,
  formatCatalog,
  formatStatistics,
  stdoutWriter,
} from './interfaces/console/report.js';
import type { LineWriter } from './interfaces/console/report.js';

export interface BaselinePhaseOptions {
  readonly eventsPath: string;
  readonly statsPath: string;
  readonly days: number;
  readonly config: AppConfig;
  readonly log: Logger;
  readonly write: LineWriter;
  readonly random?: RandomSource;
}

/** Everything the alert loop keeps for the rest of the process. */
export interface BaselineState {
  readonly catalog: EventCatalog;
  readonly baseline: StatisticsMap;
  readonly weights: ReadonlyMap<string, number>;
}

/**
 * Startup: load catalog and statistics, synthesize the history, write the
 * history log and baseline artifacts, and estimate the baseline.
 *
 * Every failure here is fatal to the run.
 */
export function runBaselinePhase(opts: BaselinePhaseOptions): BaselineState {
  const { config, log, write } = opts;

  for (const line of banner('Initializing Events and Statistics...')) write(line);
  const catalog = loadCatalog(opts.eventsPath);
  const { statistics } = loadStatistics(opts.statsPath);
  assertCatalogMatchesStatistics(catalog, statistics);
  write('Initialization success!');

  for (const line of [
    ...banner('EVENTS DATA'),
    ...formatCatalog(catalog),
    ...banner('STATISTICS DATA'),
    ...formatStatistics(statistics),
  ]) {
    write(line);
  }

  const history = generateEvents(catalog, statistics, opts.days, opts.random);
  const historyLog = artifactPath(config, 'history_log');
  writeLogBatch(historyLog, history);
  log.info({ days: opts.days, path: historyLog }, 'History generated');

  const accumulated = accumulateEvents(toLogRecords(history));
  const baselinePath = artifactPath(config, 'baseline');
  writeBaseline(baselinePath, accumulated);

  const estimate = computeStatistics(accumulated);
  for (const name of estimate.missing) {
    log.warn({ event: name, path: baselinePath }, 'Missing data for event');
  }
  const statisticsPath = artifactPath(config, 'baseline_statistics');
  writeComputedStatistics(statisticsPath, estimate);
  log.info({ path: statisticsPath, events: estimate.statistics.size }, 'Baseline statistics computed');

  return { catalog, baseline: estimate.statistics, weights: eventWeights(catalog) };
}

/** Wires the alert loop to the live statistics reader and the live log writer. */
export function createAlertLoopContext(
  state: BaselineState,
  config: AppConfig,
  log: Logger,
  random?: RandomSource,
): AlertLoopContext {
  const liveLog = artifactPath(config, 'live_log');
  return {
    ...state,
    random,
    log,
    loadStatistics(source: string): StatisticsMap {
      const { statistics, missing } = loadStatistics(source);
      for (const name of missing) log.warn({ event: name, source }, 'Statistics record marked as missing');
      return statistics;
    },
    persistLiveBatch(batch): void {
      writeLogBatch(liveLog, batch);
      log.info({ path: liveLog, days: batch.length }, 'Live log written');
    },
  };
}

function parseDaysArgument(value: string): number {
  const days = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(days)) {
    throw new InvalidArgumentError('Expected a non-negative integer number of days.');
  }
  return days;
}

export interface RunDeps {
  readonly config?: AppConfig;
  readonly log?: Logger;
  readonly input?: LineInput & { close?(): void };
  readonly write?: LineWriter;
  readonly random?: RandomSource;
}

/**
 * Builds the commander program: three positional arguments, and an action
 * that runs the baseline phase and then the alert loop until it
 * terminates.
 */
export function buildProgram(config: AppConfig, log: Logger, deps: RunDeps = {}): Command {
  const write = deps.write ?? stdoutWriter;

  return new Command()
    .name('baseline-sentry')
    .description('Synthesize event history, estimate a baseline and flag anomalous days')
    .argument('<events-file>', 'event catalog')
    .argument('<stats-file>', 'statistics used to generate the history')
    .argument('<days>', 'days of history to generate', parseDaysArgument)
    .exitOverride()
    .action(async (eventsPath: string, statsPath: string, days: number) => {
      const state = runBaselinePhase({ eventsPath, statsPath, days, config, log, write, random: deps.random });

      for (const line of banner('Alert Engine')) write(line);
      const input = deps.input ?? createReadlineInput();
      try {
        await runAlertLoop(createAlertLoopContext(state, config, log, deps.random), input, createConsoleOutput(write));
      } finally {
        input.close?.();
      }
    });
}

/**
 * Runs the launcher against `argv` and resolves the process exit code:
 * 0 once the alert loop terminates, 1 on a fatal error.
 */
export async function run(argv: readonly string[], deps: RunDeps = {}): Promise<number> {
  const write = deps.write ?? stdoutWriter;
  let log = deps.log;

  try {
    const config = deps.config ?? loadAppConfig();
    log ??= createLogger(config.logging.level);

    await buildProgram(config, log, deps).parseAsync([...argv]);
    return 0;
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err.exitCode;
    log?.fatal({ err }, 'Run aborted');
    write(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
