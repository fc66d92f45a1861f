import { createEvent } from '@specforge/shared';
import type { AdapterContext, RetryOptions } from '../types';
import { RateLimitError, TimeoutError, ConfigError } from '../errors';

/**
 * Retry defaults for completion requests.
 *
 * Backoff is exponential with +/-10% jitter:
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * backoffFactor ^ (attempt - 1))
 * ```
 *
 * Retried: RateLimitError, TimeoutError, HTTP 429 and 5xx, and the network
 * codes ETIMEDOUT, ECONNRESET, ECONNREFUSED. Everything else, including
 * ConfigError and a caller abort, fails on the first attempt.
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

const RETRIABLE_NETWORK_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED']);

function numericField(value: unknown, key: 'status' | 'statusCode'): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const code: unknown = Reflect.get(value, 'code');
  if (typeof code === 'string') return code;
  const cause: unknown = Reflect.get(value, 'cause');
  if (typeof cause !== 'object' || cause === null) return undefined;
  const causeCode: unknown = Reflect.get(cause, 'code');
  return typeof causeCode === 'string' ? causeCode : undefined;
}

function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }

  const status = numericField(error, 'status') ?? numericField(error, 'statusCode');
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = errorCode(error);
  return code !== undefined && RETRIABLE_NETWORK_CODES.has(code);
}

/**
 * Runs one completion request with retry, per-attempt timeout and abort
 * handling, bracketed by ProviderRequestStarted / ProviderRequestFinished
 * trace events.
 *
 * ```typescript
 * const reply = await executeProviderRequest(
 *   ctx,
 *   'anthropic',
 *   'claude-3-5-sonnet-20241022',
 *   (signal) => client.messages.create({ ... }, { signal }),
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffFactor } = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();

  await ctx.logger.log(
    createEvent(ctx.runId, { type: 'ProviderRequestStarted', payload: { provider, model } }),
  );

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= maxRetries) {
    const abortController = new AbortController();
    const abortHandler = () => {
      abortController.abort();
    };

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortController.abort();
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      const timeoutMs = ctx.timeoutMs;
      timeoutId = setTimeout(() => {
        abortController.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    const cleanup = () => {
      if (timeoutId) clearTimeout(timeoutId);
      if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);
    };

    try {
      const result = await requestFn(abortController.signal);
      cleanup();

      await ctx.logger.log(
        createEvent(ctx.runId, {
          type: 'ProviderRequestFinished',
          payload: {
            provider,
            durationMs: Date.now() - startTime,
            success: true,
            retries: attempts,
          },
        }),
      );

      return result;
    } catch (error: unknown) {
      cleanup();
      lastError = error;

      if (ctx.abortSignal?.aborted) {
        throw error;
      }

      if (error instanceof ConfigError) {
        break;
      }

      if (!isRetriableError(error) || attempts >= maxRetries) {
        break;
      }

      attempts++;

      const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, attempts - 1));
      const jitter = delay * 0.1 * (Math.random() * 2 - 1);
      await new Promise((resolve) => setTimeout(resolve, Math.max(0, delay + jitter)));
    }
  }

  await ctx.logger.log(
    createEvent(ctx.runId, {
      type: 'ProviderRequestFinished',
      payload: {
        provider,
        durationMs: Date.now() - startTime,
        success: false,
        error: lastError instanceof Error ? lastError.message : String(lastError),
        retries: attempts,
      },
    }),
  );

  throw lastError;
}
