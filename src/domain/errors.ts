/**
 * Error taxonomy.
 *
 * Every failure raised by the pipeline carries a stable `code` so the alert
 * loop can decide between re-prompting and aborting without string matching.
 */
export type SentryErrorCode =
  | 'VALIDATION'
  | 'INVALID_EVENT_KIND'
  | 'OUT_OF_BOUNDS_BASELINE'
  | 'MALFORMED_INPUT'
  | 'CONSISTENCY'
  | 'MISSING_STATISTIC'
  | 'MISSING_BASELINE'
  | 'RESOURCE';

export abstract class SentryError extends Error {
  abstract readonly code: SentryErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A catalog or statistics record breaks an invariant. */
export class ValidationError extends SentryError {
  readonly code: SentryErrorCode = 'VALIDATION';
}

export class InvalidEventKindError extends ValidationError {
  override readonly code: SentryErrorCode = 'INVALID_EVENT_KIND';

  constructor(readonly kind: string) {
    super(`Invalid event kind "${kind}". Expected 'C' for continuous or 'D' for discrete`);
  }
}

/** Zero stddev with a mean outside the event bounds: nothing can be drawn. */
export class OutOfBoundsBaselineError extends ValidationError {
  override readonly code: SentryErrorCode = 'OUT_OF_BOUNDS_BASELINE';

  constructor(readonly mean: number, readonly min: number, readonly max: number) {
    super(`Mean ${mean} lies outside [${min}, ${max}] and stddev is 0`);
  }
}

/** A count header, numeric field or interactive answer failed to parse. */
export class MalformedInputError extends SentryError {
  readonly code: SentryErrorCode = 'MALFORMED_INPUT';
}

/** Catalog and statistics disagree. */
export class ConsistencyError extends SentryError {
  readonly code: SentryErrorCode = 'CONSISTENCY';
}

export class MissingStatisticError extends ConsistencyError {
  override readonly code: SentryErrorCode = 'MISSING_STATISTIC';

  constructor(readonly event: string) {
    super(`No statistic supplied for event "${event}"`);
  }
}

export class MissingBaselineError extends ConsistencyError {
  override readonly code: SentryErrorCode = 'MISSING_BASELINE';

  constructor(readonly event: string) {
    super(`No baseline statistic for event "${event}"`);
  }
}

/** File could not be read or written. */
export class ResourceError extends SentryError {
  readonly code: SentryErrorCode = 'RESOURCE';

  constructor(
    readonly path: string,
    readonly operation: 'read' | 'write',
    cause: unknown,
  ) {
    super(`Could not ${operation} ${path}: ${describeCause(cause)}`, { cause });
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const code = 'code' in cause ? cause.code : undefined;
    if (code === 'ENOENT') return 'file not found';
    if (code === 'EACCES' || code === 'EPERM') return 'permission denied';
    if (code === 'EISDIR') return 'is a directory';
    return cause.message;
  }
  return String(cause);
}
