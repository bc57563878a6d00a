export type {
  EventKind,
  EventDefinition,
  EventCatalog,
  EventStatistic,
  StatisticsMap,
  DailyLog,
  LogBatch,
  LogRecord,
  AccumulatedSeries,
  AlertStatus,
  DayVerdict,
  CycleReport,
} from './event.js';
export { EVENT_KIND_CODES, DAY_KEY, eventWeights } from './event.js';
export {
  SentryError,
  ValidationError,
  InvalidEventKindError,
  OutOfBoundsBaselineError,
  MalformedInputError,
  ConsistencyError,
  MissingStatisticError,
  MissingBaselineError,
  ResourceError,
} from './errors.js';
export type { SentryErrorCode } from './errors.js';
