/**
 * Core domain types for the baseline-sentry event model.
 *
 * These types describe the catalog, the statistics that drive synthesis and
 * scoring, and the per-day values flowing between the pipeline stages.
 * They carry no framework dependencies.
 */

/** How a generated value is shaped after sampling. */
export type EventKind = 'continuous' | 'discrete';

/** Single-letter codes used by catalog sources. */
export const EVENT_KIND_CODES: Readonly<Record<string, EventKind>> = {
  C: 'continuous',
  D: 'discrete',
};

/** Name reserved for day markers in the log and baseline artifacts. */
export const DAY_KEY = 'Day';

/**
 * A tracked event. Immutable once the catalog is loaded.
 *
 * `min < max` and `weight >= 1` are enforced by the record reader.
 */
export interface EventDefinition {
  readonly name: string;
  readonly kind: EventKind;
  readonly min: number;
  readonly max: number;
  readonly weight: number;
}

/** Catalog keyed by event name, in source order. */
export type EventCatalog = ReadonlyMap<string, EventDefinition>;

/** Mean / standard deviation pair for one event. */
export interface EventStatistic {
  readonly name: string;
  readonly mean: number;
  readonly stddev: number;
}

/** Baseline or live statistics keyed by event name. */
export type StatisticsMap = ReadonlyMap<string, EventStatistic>;

/** One simulated day: event name → generated value. */
export type DailyLog = ReadonlyMap<string, number>;

/** Ordered days; day number = index + 1. */
export type LogBatch = readonly DailyLog[];

/**
 * External log representation consumed by the aggregator: a day marker
 * followed by the values recorded on that day.
 */
export type LogRecord =
  | { readonly kind: 'day'; readonly day: number }
  | { readonly kind: 'value'; readonly event: string; readonly value: number };

/**
 * Per-event series replayed from a log.
 *
 * Every series holds exactly `dayCount` entries; `null` marks a day on which
 * the event had no value.
 */
export interface AccumulatedSeries {
  readonly dayCount: number;
  readonly series: ReadonlyMap<string, readonly (number | null)[]>;
}

export type AlertStatus = 'OK' | 'ALERT';

export interface DayVerdict {
  readonly day: number;
  readonly score: number;
  readonly status: AlertStatus;
}

/** Outcome of one alert cycle. */
export interface CycleReport {
  readonly threshold: number;
  readonly days: readonly DayVerdict[];
}

/** Weight per event name, derived from the catalog. */
export function eventWeights(catalog: EventCatalog): Map<string, number> {
  const weights = new Map<string, number>();
  for (const [name, def] of catalog) weights.set(name, def.weight);
  return weights;
}
