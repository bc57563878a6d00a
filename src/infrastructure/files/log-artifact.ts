import type { DailyLog, LogBatch, LogRecord } from '../../domain/index.js';
import { DAY_KEY, MalformedInputError } from '../../domain/index.js';
import { readTextFile, writeTextFile } from './text-file.js';

/**
 * Log artifact:
 *
 *   Day:1
 *   logins:12
 *   bytes_out:381.5
 *   <blank>
 *   Day:2
 *   ...
 *
 * Values are written with `String(n)`, the shortest text that parses back
 * to the same number.
 */
export function formatLogBatch(batch: LogBatch): string {
  const lines: string[] = [];
  batch.forEach((log: DailyLog, i) => {
    lines.push(`${DAY_KEY}:${i + 1}`);
    for (const [event, value] of log) lines.push(`${event}:${String(value)}`);
    lines.push('');
  });
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

const DAY_MARKER = new RegExp(`^${DAY_KEY}:(\\d+)$`);

/** Reads log text back into records; blank separator lines are skipped. */
export function* parseLogRecords(text: string, source = 'log'): Generator<LogRecord> {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? '').trim();
    if (line === '') continue;

    const day = DAY_MARKER.exec(line);
    if (day !== null) {
      yield { kind: 'day', day: Number(day[1]) };
      continue;
    }

    const sep = line.indexOf(':');
    const event = sep > 0 ? line.slice(0, sep).trim() : '';
    const raw = sep > 0 ? line.slice(sep + 1).trim() : '';
    const value = Number(raw);
    if (event === '' || raw === '' || !Number.isFinite(value)) {
      throw new MalformedInputError(`${source}:${i + 1}: expected "<event>:<value>", got "${line}"`);
    }
    yield { kind: 'value', event, value };
  }
}

export function writeLogBatch(path: string, batch: LogBatch): void {
  writeTextFile(path, formatLogBatch(batch));
}

/** Reads a written log artifact back as records, ready for `accumulateEvents`. */
export function readLogBatch(path: string): LogRecord[] {
  return [...parseLogRecords(readTextFile(path), path)];
}
