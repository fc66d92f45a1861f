import type { GenerationEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout specforge.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'ManifestPlanned', ... });
 *
 * // Standard logging
 * logger.info('Generating group publishers');
 * logger.error(new Error('Failed'), 'Chunk request failed');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ group: 'publishers' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured session event.
   */
  log(event: GenerationEvent): MaybePromise<void>;

  /**
   * High-signal event with a human-readable summary.
   */
  trace(event: GenerationEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled in production) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /** Log an error with optional message. */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
