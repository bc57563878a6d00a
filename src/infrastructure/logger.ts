import { destination, pino } from 'pino';
import type { Logger } from 'pino';

/**
 * Structured logger for pipeline progress and diagnostics.
 *
 * Writes to stderr so stdout carries only the operator-facing report.
 */
export function createLogger(level: string): Logger {
  return pino({ level, base: { service: 'baseline-sentry' } }, destination(2));
}
