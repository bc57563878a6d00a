import type { AccumulatedSeries } from '../../domain/index.js';
import { DAY_KEY, MalformedInputError } from '../../domain/index.js';
import type { BaselineEstimate } from '../../application/baseline-estimator.js';
import { DATA_MISSING } from './record-reader.js';
import { writeTextFile } from './text-file.js';

const TITLE = 'Total Statistics';
const RULE = '===========';

/**
 * Baseline artifact: the accumulated history, one line per event.
 * Gaps are written as empty entries so columns stay aligned by day.
 */
export function formatBaseline(accumulated: AccumulatedSeries): string {
  const lines = [TITLE, RULE];
  for (const [event, values] of accumulated.series) {
    lines.push(`${event}: ${values.map((v) => (v === null ? '' : String(v))).join(', ')}`);
  }
  lines.push(`${DAY_KEY}:${accumulated.dayCount}`);
  return `${lines.join('\n')}\n`;
}

/** Reads a written baseline artifact back, for inspecting or re-scoring a run. */
export function parseBaseline(text: string, source = 'baseline'): AccumulatedSeries {
  const series = new Map<string, (number | null)[]>();
  let dayCount: number | undefined;

  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (line === '' || line === TITLE || line === RULE) return;

    const at = `${source}:${i + 1}`;
    const sep = line.indexOf(':');
    if (sep <= 0) throw new MalformedInputError(`${at}: expected "<event>: <values>"`);
    const key = line.slice(0, sep).trim();
    const rest = line.slice(sep + 1).trim();

    if (key === DAY_KEY) {
      if (!/^\d+$/.test(rest)) throw new MalformedInputError(`${at}: day count "${rest}" is not an integer`);
      dayCount = Number(rest);
      return;
    }

    const values = rest === '' ? [] : rest.split(',').map((entry) => {
      const v = entry.trim();
      if (v === '') return null;
      const n = Number(v);
      if (!Number.isFinite(n)) throw new MalformedInputError(`${at}: "${v}" is not a number`);
      return n;
    });
    series.set(key, values);
  });

  if (dayCount === undefined) throw new MalformedInputError(`${source}: missing "${DAY_KEY}:<count>" line`);

  for (const [event, values] of series) {
    if (values.length > dayCount) {
      throw new MalformedInputError(`${source}: event "${event}" has ${values.length} values for ${dayCount} days`);
    }
    while (values.length < dayCount) values.push(null);
  }

  return { dayCount, series };
}

export function writeBaseline(path: string, accumulated: AccumulatedSeries): void {
  writeTextFile(path, formatBaseline(accumulated));
}

/**
 * Computed statistics artifact, loadable again as a statistics source:
 *
 *   <count>
 *   event:mean:stddev:
 *   event:Data missing:Data missing:
 */
export function formatComputedStatistics(estimate: BaselineEstimate): string {
  const lines = [String(estimate.statistics.size + estimate.missing.length)];
  for (const stat of estimate.statistics.values()) {
    lines.push(`${stat.name}:${stat.mean}:${stat.stddev}:`);
  }
  for (const name of estimate.missing) {
    lines.push(`${name}:${DATA_MISSING}:${DATA_MISSING}:`);
  }
  return `${lines.join('\n')}\n`;
}

export function writeComputedStatistics(path: string, estimate: BaselineEstimate): void {
  writeTextFile(path, formatComputedStatistics(estimate));
}
