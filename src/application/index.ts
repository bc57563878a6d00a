export { generateEvent, generateEvents } from './synthesizer.js';
export { normalCdf, normalQuantile, sampleTruncatedNormal } from './truncated-normal.js';
export type { RandomSource } from './truncated-normal.js';
export { accumulateEvents, toLogRecords } from './aggregator.js';
export { computeStatistics } from './baseline-estimator.js';
export type { BaselineEstimate } from './baseline-estimator.js';
export { alertThreshold, calculateDailyAnomalyScore, classifyDays } from './anomaly-scorer.js';
export { assertCatalogMatchesStatistics } from './consistency.js';
export {
  INITIAL_STATE,
  PROMPTS,
  interpretStatsFileInput,
  parseDayCount,
  runAlertCycle,
  runAlertLoop,
  step,
} from './alert-loop.js';
export type {
  AlertLoopContext,
  AlertLoopLog,
  LineInput,
  LoopInput,
  LoopOutput,
  LoopState,
  StatsFileCommand,
  StepResult,
} from './alert-loop.js';
export { eventNameSchema, eventDefinitionSchema, eventStatisticSchema } from './record-schema.js';
