import type { DailyLog, EventCatalog, EventKind, LogBatch, StatisticsMap } from '../domain/index.js';
import {
  InvalidEventKindError,
  MissingStatisticError,
  OutOfBoundsBaselineError,
  ValidationError,
} from '../domain/index.js';
import { ceilTo, clamp, floorTo, round } from './numeric.js';
import { sampleTruncatedNormal } from './truncated-normal.js';
import type { RandomSource } from './truncated-normal.js';

/**
 * Shapes a raw draw from [min, max] for its kind.
 *
 * Discrete values are truncated toward zero, then pulled back onto the
 * integers inside [min, max]. Continuous values are rounded to 2 decimals,
 * then pulled back onto the 2-decimal grid inside [min, max]. A range
 * holding no such value is rejected.
 */
function shapeValue(kind: EventKind, raw: number, min: number, max: number): number {
  switch (kind) {
    case 'discrete': {
      const lo = Math.ceil(min);
      const hi = Math.floor(max);
      if (lo > hi) {
        throw new ValidationError(`No integer lies within [${min}, ${max}] for a discrete event`);
      }
      return clamp(Math.trunc(raw), lo, hi) + 0;
    }
    case 'continuous': {
      const value = round(raw, 2);
      const lo = ceilTo(min, 2);
      const hi = floorTo(max, 2);
      if (lo > hi) {
        throw new ValidationError(`No 2-decimal value lies within [${min}, ${max}] for a continuous event`);
      }
      return clamp(value, lo, hi);
    }
    default: {
      const unknownKind: never = kind;
      throw new InvalidEventKindError(String(unknownKind));
    }
  }
}

/**
 * Draws one value for one event on one day from a normal(mean, stddev)
 * truncated to [min, max].
 *
 * `stddev = 0` collapses the distribution to `mean`, which must then lie
 * within the bounds.
 */
export function generateEvent(
  kind: EventKind,
  min: number,
  max: number,
  mean: number,
  stddev: number,
  random: RandomSource = Math.random,
): number {
  for (const [label, n] of [['min', min], ['max', max], ['mean', mean], ['stddev', stddev]] as const) {
    if (!Number.isFinite(n)) throw new ValidationError(`${label} must be a finite number, got ${n}`);
  }
  if (min >= max) throw new ValidationError(`min (${min}) must be lower than max (${max})`);
  if (stddev < 0) throw new ValidationError(`stddev must be >= 0, got ${stddev}`);

  if (stddev === 0) {
    if (mean < min || mean > max) throw new OutOfBoundsBaselineError(mean, min, max);
    return shapeValue(kind, mean, min, max);
  }

  const z = sampleTruncatedNormal((min - mean) / stddev, (max - mean) / stddev, random());
  return shapeValue(kind, clamp(mean + stddev * z, min, max), min, max);
}

/**
 * Synthesizes `days` days of values for every catalog event.
 *
 * Each day lists events in catalog order; the parameters come from the
 * catalog (kind, bounds) and `stats` (mean, stddev).
 */
export function generateEvents(
  catalog: EventCatalog,
  stats: StatisticsMap,
  days: number,
  random: RandomSource = Math.random,
): LogBatch {
  if (!Number.isInteger(days) || days < 0) {
    throw new ValidationError(`Number of days must be a non-negative integer, got ${days}`);
  }

  const batch: DailyLog[] = [];
  for (let day = 1; day <= days; day++) {
    const log = new Map<string, number>();
    for (const def of catalog.values()) {
      const stat = stats.get(def.name);
      if (stat === undefined) throw new MissingStatisticError(def.name);
      log.set(def.name, generateEvent(def.kind, def.min, def.max, stat.mean, stat.stddev, random));
    }
    batch.push(log);
  }
  return batch;
}
