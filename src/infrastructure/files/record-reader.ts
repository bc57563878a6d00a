import type { z } from 'zod';
import type { EventCatalog, EventDefinition, EventKind, EventStatistic, StatisticsMap } from '../../domain/index.js';
import {
  EVENT_KIND_CODES,
  InvalidEventKindError,
  MalformedInputError,
  ValidationError,
} from '../../domain/index.js';
import { eventDefinitionSchema, eventStatisticSchema } from '../../application/record-schema.js';
import { readTextFile } from './text-file.js';

/** Marker written by the statistics artifact for events without observations. */
export const DATA_MISSING = 'Data missing';

export interface StatisticsSource {
  readonly statistics: StatisticsMap;
  /** Records written as `Data missing`, counted but not loaded. */
  readonly missing: readonly string[];
}

interface SourceLine {
  readonly lineNo: number;
  readonly text: string;
}

export function parseEventKind(code: string): EventKind {
  const kind = EVENT_KIND_CODES[code.trim()];
  if (kind === undefined) throw new InvalidEventKindError(code.trim());
  return kind;
}

/**
 * Splits a `<N>` header followed by N non-empty records.
 * The header must match the number of records actually present.
 */
function splitRecords(text: string, source: string): SourceLine[] {
  const lines = text.split(/\r?\n/);
  const header = (lines[0] ?? '').trim();
  if (!/^\d+$/.test(header)) {
    throw new MalformedInputError(`${source}: the first line should specify an integer number of events`);
  }
  const expected = Number(header);

  const records: SourceLine[] = [];
  lines.slice(1).forEach((raw, i) => {
    const line = raw.trim();
    if (line !== '') records.push({ lineNo: i + 2, text: line });
  });

  if (records.length !== expected) {
    throw new MalformedInputError(`${source}: expected ${expected} events, but found ${records.length}`);
  }
  return records;
}

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_LITERAL = /^[+-]?\d+$/;

/**
 * Empty fields take `fallback`; anything else must be a decimal literal,
 * or an integer literal when `integer` is set.
 */
function parseNumberField(
  raw: string | undefined,
  fallback: number,
  field: string,
  at: string,
  integer = false,
): number {
  const value = (raw ?? '').trim();
  if (value === '') return fallback;
  if (integer && !INTEGER_LITERAL.test(value)) {
    throw new MalformedInputError(`${at}: ${field} "${value}" is not an integer`);
  }
  const n = Number(value);
  if (!DECIMAL_LITERAL.test(value) || !Number.isFinite(n)) {
    throw new MalformedInputError(`${at}: ${field} "${value}" is not a number`);
  }
  return n;
}

function assertNoExtraFields(rest: readonly string[], after: string, at: string): void {
  if (rest.some((field) => field.trim() !== '')) {
    throw new MalformedInputError(`${at}: unexpected fields after ${after}`);
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, at: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(`${at}: ${detail}`);
  }
  return result.data;
}

function assertUnique(seen: ReadonlyMap<string, unknown>, name: string, at: string): void {
  if (seen.has(name)) throw new ValidationError(`${at}: duplicate event "${name}"`);
}

/**
 * Parses catalog records `name:C|D:min:max:weight`.
 *
 * Empty bounds default to 0 and an empty weight to 1. A trailing ':' is
 * allowed; further fields are not.
 */
export function parseCatalog(text: string, source = 'events'): EventCatalog {
  const catalog = new Map<string, EventDefinition>();

  for (const { lineNo, text: line } of splitRecords(text, source)) {
    const at = `${source}:${lineNo}`;
    const [name = '', kindCode = '', min, max, weight, ...rest] = line.split(':');
    assertNoExtraFields(rest, 'weight', at);

    const def = validate(
      eventDefinitionSchema,
      {
        name,
        kind: parseEventKind(kindCode),
        min: parseNumberField(min, 0, 'min', at),
        max: parseNumberField(max, 0, 'max', at),
        weight: parseNumberField(weight, 1, 'weight', at, true),
      },
      at,
    );
    assertUnique(catalog, def.name, at);
    catalog.set(def.name, def);
  }

  return catalog;
}

/**
 * Parses statistics records `name:mean:stddev`, with or without the
 * trailing ':' the statistics artifact writes.
 *
 * Empty fields default to 0.
 */
export function parseStatistics(text: string, source = 'statistics'): StatisticsSource {
  const statistics = new Map<string, EventStatistic>();
  const missing: string[] = [];

  for (const { lineNo, text: line } of splitRecords(text, source)) {
    const at = `${source}:${lineNo}`;
    const [name = '', mean, stddev, ...rest] = line.split(':');
    assertNoExtraFields(rest, 'stddev', at);

    if (mean?.trim() === DATA_MISSING && stddev?.trim() === DATA_MISSING) {
      missing.push(name.trim());
      continue;
    }

    const stat = validate(
      eventStatisticSchema,
      {
        name,
        mean: parseNumberField(mean, 0, 'mean', at),
        stddev: parseNumberField(stddev, 0, 'stddev', at),
      },
      at,
    );
    assertUnique(statistics, stat.name, at);
    statistics.set(stat.name, stat);
  }

  return { statistics, missing };
}

export function loadCatalog(path: string): EventCatalog {
  return parseCatalog(readTextFile(path), path);
}

export function loadStatistics(path: string): StatisticsSource {
  return parseStatistics(readTextFile(path), path);
}
