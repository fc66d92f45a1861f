import { ConfigError, ProviderError, RateLimitError, TimeoutError } from './errors';

/**
 * Shape of SDK errors that carry an HTTP status.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * SDK-specific error checks supplied by each adapter.
 */
export interface ErrorTypeConfig {
  isAPIError: (error: unknown) => error is APIErrorLike;
  isTimeoutError: (error: unknown) => boolean;
}

/**
 * Base class for SDK-backed adapters. Maps SDK failures onto the shared error
 * taxonomy:
 * - 429 status -> RateLimitError
 * - 401 status -> ConfigError
 * - timeouts -> TimeoutError
 * - any other status -> ProviderError
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  protected mapError(error: unknown): Error {
    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error });
      }
      if (error.status === 401) {
        return new ConfigError(error.message, { cause: error });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (this.errorConfig.isAPIError(error)) {
      return new ProviderError(error.message, {
        cause: error,
        details: error.status === undefined ? undefined : { status: error.status },
      });
    }

    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}
