/**
 * Error codes used throughout specforge.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ProviderError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'ManifestError'
  | 'WriteError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all specforge errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProviderError', 'Completion request failed', {
 *   cause: originalError,
 *   details: { statusCode: 500, provider: 'anthropic' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the completion service fails or returns nothing usable.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
  }
}

/**
 * Error thrown when rate limited by an API.
 * Includes optional retry-after information.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * The manifest reply could not be decoded into a list of relative paths.
 * Fatal for the session. The unparsed reply is kept for diagnosis.
 */
export class ManifestDecodeError extends AppError {
  public readonly rawResponse: string;
  /** Token counts of the failed request, when it got a reply */
  public readonly usage?: { inputTokens: number; outputTokens: number };

  constructor(
    message: string,
    rawResponse: string,
    options: AppErrorOptions & { usage?: { inputTokens: number; outputTokens: number } } = {},
  ) {
    super('ManifestError', message, options);
    this.rawResponse = rawResponse;
    this.usage = options.usage;
  }
}

/**
 * Error thrown when an artifact cannot be written below the output root.
 */
export class WriteError extends AppError {
  /** Artifact path that failed */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('WriteError', `${path}: ${message}`, options);
    this.path = path;
  }
}

/**
 * Error thrown when provider registry operations fail.
 * Extends ConfigError as it's usually a configuration issue.
 */
export class RegistryError extends ConfigError {
  public readonly exitCode = 2;
}

/**
 * Exit code the CLI should use for an error.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
