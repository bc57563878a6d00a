import type { AccumulatedSeries, DayVerdict, StatisticsMap } from '../domain/index.js';
import { MissingBaselineError } from '../domain/index.js';
import { round, sum } from './numeric.js';

/** Alerting threshold: twice the total event weight. */
export function alertThreshold(weights: ReadonlyMap<string, number>): number {
  return 2 * sum(weights.values());
}

/**
 * Scores every day of `accumulated` against the baseline.
 *
 * A day's score is the weighted sum of each event's distance from its
 * baseline mean in baseline stddevs, rounded to 2 decimals. Events with a
 * zero baseline stddev and gaps contribute nothing; events without a weight
 * count once.
 */
export function calculateDailyAnomalyScore(
  accumulated: AccumulatedSeries,
  baseline: StatisticsMap,
  weights: ReadonlyMap<string, number>,
): number[] {
  for (const event of accumulated.series.keys()) {
    if (!baseline.has(event)) throw new MissingBaselineError(event);
  }

  const scores: number[] = [];
  for (let day = 0; day < accumulated.dayCount; day++) {
    let score = 0;

    for (const [event, values] of accumulated.series) {
      const value = values[day];
      const stat = baseline.get(event);
      if (value === null || value === undefined || stat === undefined) continue;

      const deviation = stat.stddev > 0 ? Math.abs(value - stat.mean) / stat.stddev : 0;
      score += deviation * (weights.get(event) ?? 1);
    }

    scores.push(round(score, 2));
  }
  return scores;
}

/** Pairs each score with its 1-based day and an OK / ALERT status. */
export function classifyDays(scores: readonly number[], threshold: number): DayVerdict[] {
  return scores.map((score, i): DayVerdict => ({
    day: i + 1,
    score,
    status: score >= threshold ? 'ALERT' : 'OK',
  }));
}
