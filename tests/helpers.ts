import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { EventCatalog, EventDefinition, EventKind, EventStatistic, StatisticsMap } from '../src/domain/index.js';
import type { RandomSource } from '../src/application/index.js';

/** Deterministic random source cycling through `values`. */
export function seqRandom(values: readonly number[]): RandomSource {
  let i = 0;
  return () => {
    const v = values[i % values.length] ?? 0;
    i++;
    return v;
  };
}

export function makeCatalog(
  defs: ReadonlyArray<[name: string, kind: EventKind, min: number, max: number, weight: number]>,
): EventCatalog {
  const catalog = new Map<string, EventDefinition>();
  for (const [name, kind, min, max, weight] of defs) catalog.set(name, { name, kind, min, max, weight });
  return catalog;
}

export function makeStats(entries: Record<string, [mean: number, stddev: number]>): StatisticsMap {
  const stats = new Map<string, EventStatistic>();
  for (const [name, [mean, stddev]] of Object.entries(entries)) stats.set(name, { name, mean, stddev });
  return stats;
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}
