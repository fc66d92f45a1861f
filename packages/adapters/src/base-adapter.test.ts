import { describe, it, expect } from 'vitest';
import { BaseProviderAdapter, type APIErrorLike, type ErrorTypeConfig } from './base-adapter';
import { ConfigError, ProviderError, RateLimitError, TimeoutError } from './errors';

class TestAdapter extends BaseProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike =>
      typeof error === 'object' &&
      error !== null &&
      'status' in error &&
      typeof error.status === 'number' &&
      'message' in error &&
      typeof error.message === 'string',
    isTimeoutError: (error: unknown): boolean => error === 'timeout',
  };

  public map(error: unknown): Error {
    return this.mapError(error);
  }
}

describe('BaseProviderAdapter.mapError', () => {
  const adapter = new TestAdapter();

  it('maps 429 to RateLimitError', () => {
    expect(adapter.map({ status: 429, message: 'rate limited' })).toBeInstanceOf(RateLimitError);
  });

  it('maps 401 to ConfigError', () => {
    expect(adapter.map({ status: 401, message: 'unauthorized' })).toBeInstanceOf(ConfigError);
  });

  it('wraps other API errors in ProviderError with the status', () => {
    const original = Object.assign(new Error('server'), { status: 500 });
    const err = adapter.map(original);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err.message).toBe('server');
    expect(err instanceof ProviderError && err.details).toEqual({ status: 500 });
  });

  it('maps timeout errors to TimeoutError', () => {
    expect(adapter.map('timeout')).toBeInstanceOf(TimeoutError);
  });

  it('passes through plain errors', () => {
    const original = new Error('boom');
    expect(adapter.map(original)).toBe(original);
  });

  it('wraps non-Error values', () => {
    const err = adapter.map(123);
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('123');
  });
});
