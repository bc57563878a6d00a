import type { AccumulatedSeries, LogBatch, LogRecord } from '../domain/index.js';
import { MalformedInputError } from '../domain/index.js';

/** Expands an in-memory batch into the record stream a log file would yield. */
export function* toLogRecords(batch: LogBatch): Generator<LogRecord> {
  let day = 0;
  for (const log of batch) {
    day++;
    yield { kind: 'day', day };
    for (const [event, value] of log) yield { kind: 'value', event, value };
  }
}

/**
 * Replays log records into per-event series.
 *
 * Each day marker opens a new day; a value lands at index `dayCount - 1` of
 * its event's series. An event absent from a day leaves a `null` gap there,
 * so every series ends with exactly `dayCount` entries aligned by day.
 */
export function accumulateEvents(records: Iterable<LogRecord>): AccumulatedSeries {
  const series = new Map<string, (number | null)[]>();
  let dayCount = 0;

  for (const record of records) {
    if (record.kind === 'day') {
      dayCount++;
      continue;
    }

    if (dayCount === 0) {
      throw new MalformedInputError(`Value for "${record.event}" appears before any day marker`);
    }

    let values = series.get(record.event);
    if (values === undefined) {
      values = [];
      series.set(record.event, values);
    }
    if (values.length >= dayCount) {
      throw new MalformedInputError(`Event "${record.event}" recorded twice on day ${dayCount}`);
    }
    while (values.length < dayCount - 1) values.push(null);
    values.push(record.value);
  }

  for (const values of series.values()) {
    while (values.length < dayCount) values.push(null);
  }

  return { dayCount, series };
}
