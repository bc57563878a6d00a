import type { CycleReport, EventCatalog, LogBatch, StatisticsMap } from '../domain/index.js';
import { MalformedInputError, SentryError } from '../domain/index.js';
import { accumulateEvents, toLogRecords } from './aggregator.js';
import { alertThreshold, calculateDailyAnomalyScore, classifyDays } from './anomaly-scorer.js';
import { generateEvents } from './synthesizer.js';
import type { RandomSource } from './truncated-normal.js';

/**
 * Alert loop states.
 *
 * await-stats-file → await-day-count → generate-and-score → report-cycle
 * → await-stats-file, until the operator quits or interrupts.
 */
export type LoopState =
  | { readonly phase: 'await-stats-file' }
  | { readonly phase: 'await-day-count'; readonly liveStats: StatisticsMap }
  | { readonly phase: 'generate-and-score'; readonly liveStats: StatisticsMap; readonly days: number }
  | { readonly phase: 'report-cycle'; readonly scores: readonly number[] }
  | { readonly phase: 'terminated' };

export const INITIAL_STATE: LoopState = { phase: 'await-stats-file' };

/** One answer from the operator, or an interrupt / end of input. */
export type LoopInput = { readonly kind: 'line'; readonly text: string } | { readonly kind: 'interrupt' };

export interface StepResult {
  readonly state: LoopState;
  /** Diagnostic for the operator after a recovered failure or an interrupt. */
  readonly notice?: string;
  readonly report?: CycleReport;
}

/** Minimal logger interface accepted by the alert loop. */
export type AlertLoopLog = {
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
};

export interface AlertLoopContext {
  readonly catalog: EventCatalog;
  /** Fixed for the whole process. */
  readonly baseline: StatisticsMap;
  readonly weights: ReadonlyMap<string, number>;
  /** Loads live statistics named by the operator. */
  readonly loadStatistics: (source: string) => StatisticsMap;
  /** Hands each live batch to the log writer before it is scored. */
  readonly persistLiveBatch?: (batch: LogBatch) => void;
  readonly random?: RandomSource;
  readonly log?: AlertLoopLog;
}

/** Source of operator answers. Resolves `null` on interrupt or end of input. */
export interface LineInput {
  read(prompt: string): Promise<string | null>;
}

export interface LoopOutput {
  notice(message: string): void;
  report(report: CycleReport): void;
}

export const PROMPTS = {
  statsFile: "Enter the new stats file for live data analysis (or 'q' to quit): ",
  dayCount: 'Enter the number of days for live data generation: ',
} as const;

const INTERRUPTED = 'Interrupted, closing program.';

export type StatsFileCommand =
  | { readonly kind: 'quit' }
  | { readonly kind: 'retry' }
  | { readonly kind: 'load'; readonly source: string };

export function interpretStatsFileInput(text: string): StatsFileCommand {
  const answer = text.trim();
  if (answer.toLowerCase() === 'q') return { kind: 'quit' };
  if (answer === '') return { kind: 'retry' };
  return { kind: 'load', source: answer };
}

/** Parses a positive integer day count. */
export function parseDayCount(text: string): number {
  const answer = text.trim();
  if (!/^\+?\d+$/.test(answer)) {
    throw new MalformedInputError('Expected integer for number of days');
  }
  const days = Number(answer);
  if (!Number.isSafeInteger(days) || days < 1) {
    throw new MalformedInputError('Number of days must be a positive integer');
  }
  return days;
}

/**
 * Generates a live batch from `liveStats`, replays it and scores each day
 * against the fixed baseline.
 */
export function runAlertCycle(ctx: AlertLoopContext, liveStats: StatisticsMap, days: number): number[] {
  ctx.log?.info({ days }, 'Generating live data');
  const batch = generateEvents(ctx.catalog, liveStats, days, ctx.random);
  ctx.persistLiveBatch?.(batch);

  const accumulated = accumulateEvents(toLogRecords(batch));
  ctx.log?.info({ dayCount: accumulated.dayCount }, 'Calculating anomaly scores for live data');
  return calculateDailyAnomalyScore(accumulated, ctx.baseline, ctx.weights);
}

function recover(err: unknown, state: LoopState, ctx: AlertLoopContext): StepResult {
  if (!(err instanceof SentryError)) throw err;
  ctx.log?.warn({ code: err.code, phase: state.phase }, err.message);
  return { state, notice: `Error: ${err.message}` };
}

/**
 * Advances the loop by one transition.
 *
 * The waiting phases consume `input`; the others ignore it. Pipeline
 * failures raised as SentryError are turned into notices: load failures
 * keep the loop in place, cycle failures abort only that cycle. Anything
 * else propagates.
 */
export function step(state: LoopState, ctx: AlertLoopContext, input?: LoopInput): StepResult {
  switch (state.phase) {
    case 'await-stats-file': {
      if (input === undefined) throw new Error('await-stats-file requires operator input');
      if (input.kind === 'interrupt') return { state: { phase: 'terminated' }, notice: INTERRUPTED };

      const command = interpretStatsFileInput(input.text);
      if (command.kind === 'quit') return { state: { phase: 'terminated' } };
      if (command.kind === 'retry') return { state };

      try {
        ctx.log?.info({ source: command.source }, 'Loading new statistics');
        const liveStats = ctx.loadStatistics(command.source);
        return { state: { phase: 'await-day-count', liveStats } };
      } catch (err: unknown) {
        return recover(err, state, ctx);
      }
    }

    case 'await-day-count': {
      if (input === undefined) throw new Error('await-day-count requires operator input');
      if (input.kind === 'interrupt') return { state: { phase: 'terminated' }, notice: INTERRUPTED };

      try {
        const days = parseDayCount(input.text);
        return { state: { phase: 'generate-and-score', liveStats: state.liveStats, days } };
      } catch (err: unknown) {
        return recover(err, state, ctx);
      }
    }

    case 'generate-and-score': {
      try {
        const scores = runAlertCycle(ctx, state.liveStats, state.days);
        return { state: { phase: 'report-cycle', scores } };
      } catch (err: unknown) {
        const result = recover(err, state, ctx);
        return { ...result, state: INITIAL_STATE };
      }
    }

    case 'report-cycle': {
      const threshold = alertThreshold(ctx.weights);
      return {
        state: INITIAL_STATE,
        report: { threshold, days: classifyDays(state.scores, threshold) },
      };
    }

    case 'terminated':
      return { state };
  }
}

function promptFor(state: LoopState): string | undefined {
  if (state.phase === 'await-stats-file') return PROMPTS.statsFile;
  if (state.phase === 'await-day-count') return PROMPTS.dayCount;
  return undefined;
}

/**
 * Drives the state machine until it terminates, reading operator answers
 * from `input` only in the waiting phases.
 */
export async function runAlertLoop(ctx: AlertLoopContext, input: LineInput, output: LoopOutput): Promise<void> {
  let state: LoopState = INITIAL_STATE;

  while (state.phase !== 'terminated') {
    const prompt = promptFor(state);
    let answer: LoopInput | undefined;
    if (prompt !== undefined) {
      const text = await input.read(prompt);
      answer = text === null ? { kind: 'interrupt' } : { kind: 'line', text };
    }

    const result = step(state, ctx, answer);
    if (result.notice !== undefined) output.notice(result.notice);
    if (result.report !== undefined) output.report(result.report);
    state = result.state;
  }
}
