import type { AccumulatedSeries, EventStatistic, StatisticsMap } from '../domain/index.js';
import { round, sum } from './numeric.js';

export interface BaselineEstimate {
  readonly statistics: StatisticsMap;
  /** Events whose series held no values; left out of `statistics`. */
  readonly missing: readonly string[];
}

function mean(values: readonly number[]): number {
  return sum(values) / values.length;
}

// Sample stddev (Bessel-corrected, divisor n - 1)
function sampleStddev(values: readonly number[], m: number): number {
  let acc = 0;
  for (const v of values) {
    const d = v - m;
    acc += d * d;
  }
  return Math.sqrt(acc / (values.length - 1));
}

/**
 * Reduces each event's series to a rounded (mean, stddev) pair.
 *
 * Gaps are skipped. A single observation yields stddev 0.
 */
export function computeStatistics(accumulated: AccumulatedSeries): BaselineEstimate {
  const statistics = new Map<string, EventStatistic>();
  const missing: string[] = [];

  for (const [name, series] of accumulated.series) {
    const values = series.filter((v): v is number => v !== null);
    if (values.length === 0) {
      missing.push(name);
      continue;
    }

    const m = mean(values);
    const stddev = values.length > 1 ? sampleStddev(values, m) : 0;
    statistics.set(name, { name, mean: round(m, 2), stddev: round(stddev, 2) });
  }

  return { statistics, missing };
}
