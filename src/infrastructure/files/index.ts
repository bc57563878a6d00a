export { readTextFile, writeTextFile } from './text-file.js';
export {
  DATA_MISSING,
  parseEventKind,
  parseCatalog,
  parseStatistics,
  loadCatalog,
  loadStatistics,
} from './record-reader.js';
export type { StatisticsSource } from './record-reader.js';
export { formatLogBatch, parseLogRecords, writeLogBatch, readLogBatch } from './log-artifact.js';
export {
  formatBaseline,
  parseBaseline,
  writeBaseline,
  formatComputedStatistics,
  writeComputedStatistics,
} from './baseline-artifact.js';
