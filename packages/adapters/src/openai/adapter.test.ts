import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MemoryLogger } from '@specforge/shared';
import { OpenAIAdapter } from './adapter';
import { ConfigError, RateLimitError, TimeoutError } from '../errors';
import type { AdapterContext } from '../types';

const sdk = vi.hoisted(() => {
  class APIError extends Error {
    constructor(
      message: string,
      public status: number,
    ) {
      super(message);
    }
  }
  class APIConnectionTimeoutError extends Error {}
  return { create: vi.fn(), APIError, APIConnectionTimeoutError };
});

vi.mock('openai', () => ({
  default: class MockOpenAI {
    chat = { completions: { create: sdk.create } };
  },
  APIError: sdk.APIError,
  APIConnectionTimeoutError: sdk.APIConnectionTimeoutError,
}));

describe('OpenAIAdapter', () => {
  let adapter: OpenAIAdapter;
  let ctx: AdapterContext;

  beforeEach(() => {
    vi.clearAllMocks();
    ctx = { runId: 'test-run', logger: new MemoryLogger(), retryOptions: { maxRetries: 0 } };
    adapter = new OpenAIAdapter({ type: 'openai', model: 'gpt-4o', api_key: 'test-key' });
  });

  it('generate returns text and usage', async () => {
    sdk.create.mockResolvedValue({
      choices: [{ message: { content: 'Hello' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });

    const result = await adapter.generate(
      {
        messages: [
          { role: 'system', content: 'Be terse.' },
          { role: 'user', content: 'Hi' },
        ],
        maxTokens: 2000,
      },
      ctx,
    );

    expect(result.text).toBe('Hello');
    expect(result.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    expect(result.stopReason).toBe('stop');
    expect(sdk.create).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'gpt-4o',
        messages: [
          { role: 'system', content: 'Be terse.' },
          { role: 'user', content: 'Hi' },
        ],
        max_tokens: 2000,
        temperature: 0.2,
      }),
      expect.objectContaining({ signal: expect.anything() }),
    );
  });

  it('requests JSON output in json mode', async () => {
    sdk.create.mockResolvedValue({ choices: [{ message: { content: '[]' } }] });

    const result = await adapter.generate(
      { messages: [{ role: 'user', content: 'List' }], jsonMode: true },
      ctx,
    );

    expect(result.usage).toBeUndefined();
    expect(sdk.create).toHaveBeenCalledWith(
      expect.objectContaining({ response_format: { type: 'json_object' } }),
      expect.anything(),
    );
  });

  it('returns undefined text for an empty reply', async () => {
    sdk.create.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const result = await adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, ctx);
    expect(result.text).toBeUndefined();
  });

  it('maps 429 to RateLimitError', async () => {
    sdk.create.mockRejectedValue(new sdk.APIError('Rate limit', 429));
    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, ctx),
    ).rejects.toThrow(RateLimitError);
  });

  it('maps 401 to ConfigError', async () => {
    sdk.create.mockRejectedValue(new sdk.APIError('Unauthorized', 401));
    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, ctx),
    ).rejects.toThrow(ConfigError);
  });

  it('maps connection timeouts to TimeoutError', async () => {
    sdk.create.mockRejectedValue(new sdk.APIConnectionTimeoutError('Timeout'));
    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, ctx),
    ).rejects.toThrow(TimeoutError);
  });
});
