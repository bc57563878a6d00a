import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { CommanderError } from 'commander';
import { buildProgram, createAlertLoopContext, run, runBaselinePhase } from '../src/bootstrap.js';
import { DEFAULT_CONFIG } from '../src/infrastructure/config.js';
import type { AppConfig } from '../src/infrastructure/config.js';
import { ConsistencyError } from '../src/domain/index.js';
import type { LineInput } from '../src/application/index.js';
import { fakeLogger, seqRandom } from './helpers.js';

const TMP_DIR = join(process.cwd(), '.tmp-test-bootstrap');

const config: AppConfig = {
  artifacts: { ...DEFAULT_CONFIG.artifacts, directory: TMP_DIR },
  logging: { level: 'silent' },
};

function writeTmp(name: string, content: string): string {
  const path = join(TMP_DIR, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

function scripted(answers: string[]): LineInput & { closed: boolean; close(): void } {
  return {
    closed: false,
    read: () => Promise.resolve(answers.shift() ?? null),
    close() {
      this.closed = true;
    },
  };
}

describe('runBaselinePhase', () => {
  beforeEach(() => {
    mkdirSync(TMP_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('writes the history log and baseline artifacts and returns the baseline', () => {
    const eventsPath = writeTmp('events.txt', '2\nA:C:0:10:1\nB:D:0:9:2\n');
    const statsPath = writeTmp('stats.txt', '2\nA:5:0:\nB:3:0:\n');
    const lines: string[] = [];

    const state = runBaselinePhase({
      eventsPath,
      statsPath,
      days: 3,
      config,
      log: fakeLogger(),
      write: (line) => lines.push(line),
    });

    expect(state.baseline.get('A')).toEqual({ name: 'A', mean: 5, stddev: 0 });
    expect(state.weights).toEqual(new Map([['A', 1], ['B', 2]]));
    expect(lines).toContain('Initialization success!');

    expect(readFileSync(join(TMP_DIR, 'logs.txt'), 'utf-8')).toBe(
      'Day:1\nA:5\nB:3\n\nDay:2\nA:5\nB:3\n\nDay:3\nA:5\nB:3\n\n',
    );
    expect(readFileSync(join(TMP_DIR, 'baseline.txt'), 'utf-8')).toBe(
      'Total Statistics\n===========\nA: 5, 5, 5\nB: 3, 3, 3\nDay:3\n',
    );
    expect(readFileSync(join(TMP_DIR, 'baseline_statistics.txt'), 'utf-8')).toBe('2\nA:5:0:\nB:3:0:\n');
  });

  it('aborts when catalog and statistics disagree', () => {
    const eventsPath = writeTmp('events.txt', '2\nA:C:0:10:1\nB:D:0:9:2\n');
    const statsPath = writeTmp('stats.txt', '1\nA:5:1:\n');

    expect(() =>
      runBaselinePhase({ eventsPath, statsPath, days: 3, config, log: fakeLogger(), write: () => {} }),
    ).toThrow(ConsistencyError);
  });
});

describe('createAlertLoopContext', () => {
  beforeEach(() => {
    mkdirSync(TMP_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('writes each live batch to the live log', () => {
    const eventsPath = writeTmp('events.txt', '1\nA:C:0:10:1\n');
    const statsPath = writeTmp('stats.txt', '1\nA:5:1:\n');
    const log = fakeLogger();
    const state = runBaselinePhase({ eventsPath, statsPath, days: 4, config, log, write: () => {}, random: seqRandom([0.2, 0.8]) });

    const ctx = createAlertLoopContext(state, config, log);
    ctx.persistLiveBatch?.([new Map([['A', 9.5]])]);

    expect(readFileSync(join(TMP_DIR, 'live_logs.txt'), 'utf-8')).toBe('Day:1\nA:9.5\n\n');
  });

  it('warns about statistics records marked as missing', () => {
    const eventsPath = writeTmp('events.txt', '1\nA:C:0:10:1\n');
    const statsPath = writeTmp('stats.txt', '1\nA:5:0:\n');
    const livePath = writeTmp('live.txt', '2\nA:6:0:\nB:Data missing:Data missing:\n');
    const log = fakeLogger();
    const state = runBaselinePhase({ eventsPath, statsPath, days: 2, config, log, write: () => {} });

    const stats = createAlertLoopContext(state, config, log).loadStatistics(livePath);

    expect([...stats.keys()]).toEqual(['A']);
    expect(log.warn).toHaveBeenCalledWith({ event: 'B', source: livePath }, 'Statistics record marked as missing');
  });
});

describe('buildProgram', () => {
  it('takes the events file, the stats file and the number of days', () => {
    const program = buildProgram(config, fakeLogger());

    expect(program.name()).toBe('baseline-sentry');
    expect(program.registeredArguments.map((arg) => arg.name())).toEqual(['events-file', 'stats-file', 'days']);
  });

  it('rejects a day count that is not a non-negative integer', async () => {
    const program = buildProgram(config, fakeLogger()).configureOutput({ writeErr: () => {} });

    await expect(program.parseAsync(['node', 'baseline-sentry', 'events.txt', 'stats.txt', 'many'])).rejects.toThrow(
      CommanderError,
    );
  });
});

describe('run', () => {
  beforeEach(() => {
    mkdirSync(TMP_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('builds the baseline, runs a live cycle and exits 0 on quit', async () => {
    const eventsPath = writeTmp('events.txt', '2\nA:C:0:10:1\nB:D:0:9:2\n');
    const statsPath = writeTmp('stats.txt', '2\nA:5:1:\nB:3:1:\n');
    const livePath = writeTmp('live.txt', '2\nA:5:0:\nB:3:0:\n');
    const input = scripted([livePath, '2', 'q']);
    const lines: string[] = [];

    const code = await run(['node', 'baseline-sentry', eventsPath, statsPath, '30'], {
      config,
      log: fakeLogger(),
      input,
      write: (line) => lines.push(line),
      random: seqRandom([0.1, 0.3, 0.5, 0.7, 0.9]),
    });

    expect(code).toBe(0);
    expect(input.closed).toBe(true);
    expect(lines).toContain('Anomaly Detection Threshold: 6');
    expect(lines.filter((line) => /^Day \d+: (OK|ALERT) - Anomaly Score = /.test(line))).toHaveLength(2);
    expect(readFileSync(join(TMP_DIR, 'live_logs.txt'), 'utf-8')).toBe('Day:1\nA:5\nB:3\n\nDay:2\nA:5\nB:3\n\n');
  });

  it('exits 1 with a diagnostic when the catalog is missing', async () => {
    const statsPath = writeTmp('stats.txt', '1\nA:5:1:\n');
    const missing = join(TMP_DIR, 'missing.txt');
    const lines: string[] = [];
    const log = fakeLogger();

    const code = await run(['node', 'baseline-sentry', missing, statsPath, '3'], {
      config,
      log,
      input: scripted([]),
      write: (line) => lines.push(line),
    });

    expect(code).toBe(1);
    expect(lines.at(-1)).toBe(`Error: Could not read ${missing}: file not found`);
    expect(log.fatal).toHaveBeenCalledTimes(1);
  });

  it('exits 1 with a diagnostic when the counts disagree', async () => {
    const eventsPath = writeTmp('events.txt', '2\nA:C:0:10:1\nB:D:0:9:2\n');
    const statsPath = writeTmp('stats.txt', '1\nA:5:1:\n');
    const lines: string[] = [];

    const code = await run(['node', 'baseline-sentry', eventsPath, statsPath, '3'], {
      config,
      log: fakeLogger(),
      input: scripted([]),
      write: (line) => lines.push(line),
    });

    expect(code).toBe(1);
    expect(lines.at(-1)).toBe('Error: Inconsistent number between events (2) and statistics (1)');
  });
});
