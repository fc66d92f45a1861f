import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MemoryLogger } from '@specforge/shared';
import { executeProviderRequest } from './index';
import type { AdapterContext } from '../types';
import { RateLimitError, ConfigError, TimeoutError } from '../errors';

describe('executeProviderRequest', () => {
  let ctx: AdapterContext;
  let logger: MemoryLogger;

  beforeEach(() => {
    logger = new MemoryLogger();
    ctx = { runId: 'test-run', logger };
  });

  it('executes successfully without retries', async () => {
    const fn = vi.fn().mockResolvedValue('success');

    const result = await executeProviderRequest(ctx, 'test', 'model', fn);

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(logger.ofType('ProviderRequestStarted')[0].payload).toEqual({
      provider: 'test',
      model: 'model',
    });
    expect(logger.ofType('ProviderRequestFinished')[0].payload).toMatchObject({
      success: true,
      retries: 0,
    });
    expect(logger.events.every((e) => e.runId === 'test-run')).toBe(true);
  });

  it('retries on a rate limit', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new RateLimitError('Limit reached'))
      .mockResolvedValue('success');

    const result = await executeProviderRequest(ctx, 'test', 'model', fn, { initialDelayMs: 1 });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(logger.ofType('ProviderRequestFinished')[0].payload).toMatchObject({
      success: true,
      retries: 1,
    });
  });

  it('fails after max retries', async () => {
    const fn = vi.fn().mockRejectedValue(new RateLimitError('Limit reached'));

    await expect(
      executeProviderRequest(ctx, 'test', 'model', fn, { maxRetries: 2, initialDelayMs: 1 }),
    ).rejects.toThrow(RateLimitError);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(logger.ofType('ProviderRequestFinished')[0].payload).toMatchObject({
      success: false,
      retries: 2,
      error: 'Limit reached',
    });
  });

  it('does not retry a ConfigError', async () => {
    const fn = vi.fn().mockRejectedValue(new ConfigError('Bad key'));

    await expect(executeProviderRequest(ctx, 'test', 'model', fn)).rejects.toThrow(ConfigError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('times out each attempt and retries', async () => {
    ctx.timeoutMs = 10;
    const fn = vi.fn((signal: AbortSignal) => {
      return new Promise<string>((resolve, reject) => {
        const timeout = setTimeout(() => resolve('late'), 200);
        signal.addEventListener('abort', () => {
          clearTimeout(timeout);
          reject(signal.reason);
        });
      });
    });

    await expect(
      executeProviderRequest(ctx, 'test', 'model', fn, { maxRetries: 1, initialDelayMs: 1 }),
    ).rejects.toThrow(TimeoutError);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry after the caller aborts', async () => {
    const controller = new AbortController();
    ctx.abortSignal = controller.signal;

    const fn = vi.fn((signal: AbortSignal) => {
      return new Promise<string>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    });

    const promise = executeProviderRequest(ctx, 'test', 'model', fn);
    setTimeout(() => controller.abort(), 10);

    await expect(promise).rejects.toThrow('aborted');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries on 5xx status codes', async () => {
    const fn = vi.fn().mockRejectedValueOnce({ status: 503 }).mockResolvedValue('ok');

    const result = await executeProviderRequest(ctx, 'test', 'model', fn, { initialDelayMs: 1 });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('retries on network error codes, including a nested cause', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce({ code: 'ECONNRESET' })
      .mockRejectedValueOnce({ cause: { code: 'ETIMEDOUT' } })
      .mockResolvedValue('ok');

    const result = await executeProviderRequest(ctx, 'test', 'model', fn, {
      maxRetries: 5,
      initialDelayMs: 1,
    });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry on 4xx status codes', async () => {
    const fn = vi.fn().mockRejectedValue({ statusCode: 400 });

    await expect(
      executeProviderRequest(ctx, 'test', 'model', fn, { maxRetries: 5, initialDelayMs: 1 }),
    ).rejects.toEqual({ statusCode: 400 });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('logs non-Error failures as strings', async () => {
    const fn = vi.fn().mockRejectedValue('fail');

    await expect(executeProviderRequest(ctx, 'test', 'model', fn)).rejects.toBe('fail');

    const finished = logger.ofType('ProviderRequestFinished');
    expect(finished).toHaveLength(1);
    expect(finished[0].payload).toMatchObject({ success: false, error: 'fail', retries: 0 });
  });
});
