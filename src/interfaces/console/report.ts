import type { CycleReport, EventCatalog, StatisticsMap } from '../../domain/index.js';
import type { LoopOutput } from '../../application/index.js';

export const RULE = '='.repeat(74);

/** Section banner: rule, title, rule. */
export function banner(title: string): string[] {
  return [RULE, title, RULE];
}

export function formatCatalog(catalog: EventCatalog): string[] {
  return [...catalog.values()].map(
    (def) =>
      `${def.name.padEnd(15)}: kind=${def.kind}, min=${def.min}, max=${def.max}, weight=${def.weight}`,
  );
}

export function formatStatistics(stats: StatisticsMap): string[] {
  return [...stats.values()].map((stat) => `${stat.name.padEnd(15)}: mean=${stat.mean}, stddev=${stat.stddev}`);
}

export function formatCycleReport(report: CycleReport): string[] {
  return [
    ...banner('Daily Reports'),
    `Anomaly Detection Threshold: ${report.threshold}`,
    RULE,
    ...report.days.map((d) => `Day ${d.day}: ${d.status} - Anomaly Score = ${d.score}`),
    RULE,
  ];
}

/** Line-oriented sink for everything the operator reads. */
export type LineWriter = (line: string) => void;

export const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

export function createConsoleOutput(write: LineWriter = stdoutWriter): LoopOutput {
  return {
    notice(message: string): void {
      write(message);
    },
    report(report: CycleReport): void {
      write('');
      for (const line of formatCycleReport(report)) write(line);
    },
  };
}
