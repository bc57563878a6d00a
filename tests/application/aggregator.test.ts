import { describe, it, expect } from 'vitest';
import { accumulateEvents, toLogRecords } from '../../src/application/aggregator.js';
import { generateEvents } from '../../src/application/synthesizer.js';
import { MalformedInputError } from '../../src/domain/index.js';
import type { LogRecord } from '../../src/domain/index.js';
import { makeCatalog, makeStats, seqRandom } from '../helpers.js';

const day = (n: number): LogRecord => ({ kind: 'day', day: n });
const value = (event: string, v: number): LogRecord => ({ kind: 'value', event, value: v });

describe('toLogRecords', () => {
  it('emits a day marker before each day values', () => {
    const batch = [new Map([['A', 1]]), new Map([['A', 2], ['B', 3]])];
    expect([...toLogRecords(batch)]).toEqual([day(1), value('A', 1), day(2), value('A', 2), value('B', 3)]);
  });
});

describe('accumulateEvents', () => {
  it('counts every synthesized day and aligns every series with it', () => {
    const catalog = makeCatalog([
      ['A', 'continuous', 0, 10, 1],
      ['B', 'discrete', 0, 100, 2],
    ]);
    const stats = makeStats({ A: [5, 1], B: [20, 4] });
    const batch = generateEvents(catalog, stats, 7, seqRandom([0.1, 0.4, 0.6, 0.9]));

    const accumulated = accumulateEvents(toLogRecords(batch));

    expect(accumulated.dayCount).toBe(7);
    expect(accumulated.series.get('A')).toHaveLength(7);
    expect(accumulated.series.get('B')).toEqual(batch.map((log) => log.get('B')));
  });

  it('records a missing per-day entry as a gap, not a zero', () => {
    const accumulated = accumulateEvents([
      day(1), value('A', 1), value('B', 2),
      day(2), value('A', 3),
      day(3), value('B', 4),
    ]);

    expect(accumulated.dayCount).toBe(3);
    expect(accumulated.series.get('A')).toEqual([1, 3, null]);
    expect(accumulated.series.get('B')).toEqual([2, null, 4]);
  });

  it('pads an event first seen on a later day', () => {
    const accumulated = accumulateEvents([day(1), day(2), day(3), value('C', 9)]);
    expect(accumulated.series.get('C')).toEqual([null, null, 9]);
  });

  it('returns no series for an empty log', () => {
    const accumulated = accumulateEvents([]);
    expect(accumulated.dayCount).toBe(0);
    expect(accumulated.series.size).toBe(0);
  });

  it('keeps trailing empty days in the count', () => {
    const accumulated = accumulateEvents([day(1), value('A', 1), day(2)]);
    expect(accumulated.dayCount).toBe(2);
    expect(accumulated.series.get('A')).toEqual([1, null]);
  });

  it('rejects a value before any day marker', () => {
    expect(() => accumulateEvents([value('A', 1)])).toThrow(MalformedInputError);
  });

  it('rejects the same event twice within one day', () => {
    expect(() => accumulateEvents([day(1), value('A', 1), value('A', 2)])).toThrow(
      'Event "A" recorded twice on day 1',
    );
  });
});
