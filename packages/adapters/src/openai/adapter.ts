import OpenAI, { APIError, APIConnectionTimeoutError } from 'openai';
import type {
  ChatMessage,
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderConfig,
} from '@specforge/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { BaseProviderAdapter, type ErrorTypeConfig } from '../base-adapter';
import { ConfigError } from '../errors';
import { executeProviderRequest } from '../common';

export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  private client: OpenAI;
  private readonly modelName: string;
  private readonly providerId: string;
  private readonly temperature?: number;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIError => error instanceof APIError,
    isTimeoutError: (error: unknown) => error instanceof APIConnectionTimeoutError,
  };

  constructor(config: ProviderConfig, providerId = 'openai') {
    super();
    const apiKey = config.api_key || (config.api_key_env && process.env[config.api_key_env]);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API key for provider '${providerId}'. Set api_key or the ${config.api_key_env ?? 'OPENAI_API_KEY'} environment variable`,
      );
    }
    this.providerId = providerId;
    this.modelName = config.model;
    this.temperature = config.temperature;
    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  id(): string {
    return this.providerId;
  }

  model(): string {
    return this.modelName;
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      maxOutputTokens: 16384,
      latencyClass: 'medium',
      requiresNetwork: true,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, this.providerId, this.modelName, async (signal) => {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.modelName,
            messages: this.mapMessages(req.messages),
            max_tokens: req.maxTokens,
            temperature: req.temperature ?? this.temperature ?? 0.2,
            response_format: req.jsonMode ? { type: 'json_object' } : undefined,
          },
          { signal },
        );

        const choice = completion.choices[0];
        const usage = completion.usage
          ? {
              inputTokens: completion.usage.prompt_tokens,
              outputTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens,
            }
          : undefined;

        return {
          text: choice?.message.content || undefined,
          usage,
          stopReason: choice?.finish_reason,
          raw: completion,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }

  private mapMessages(messages: ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((m): OpenAI.Chat.ChatCompletionMessageParam => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'assistant':
          return { role: 'assistant', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
      }
    });
  }
}
