import Anthropic from '@anthropic-ai/sdk';
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

const DEFAULT_MAX_TOKENS = 1024;

export class AnthropicAdapter extends BaseProviderAdapter implements ProviderAdapter {
  private client: Anthropic;
  private readonly modelName: string;
  private readonly providerId: string;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is InstanceType<typeof Anthropic.APIError> => error instanceof Anthropic.APIError,
    isTimeoutError: (error: unknown) => error instanceof Anthropic.APIConnectionTimeoutError,
  };

  constructor(config: ProviderConfig, providerId = 'anthropic') {
    super();
    const apiKey = config.api_key || (config.api_key_env && process.env[config.api_key_env]);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API key for provider '${providerId}'. Set api_key or the ${config.api_key_env ?? 'ANTHROPIC_API_KEY'} environment variable`,
      );
    }
    this.providerId = providerId;
    this.modelName = config.model;
    this.client = new Anthropic({
      apiKey,
      baseURL: config.baseUrl,
      // executeProviderRequest owns retries
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
      supportsJsonMode: false,
      maxOutputTokens: 16384,
      latencyClass: 'medium',
      requiresNetwork: true,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, this.providerId, this.modelName, async (signal) => {
      try {
        const { system, messages } = this.mapMessages(req.messages);

        const response = await this.client.messages.create(
          {
            model: this.modelName,
            max_tokens: req.maxTokens || DEFAULT_MAX_TOKENS,
            system,
            messages,
            temperature: req.temperature,
          },
          { signal },
        );

        const text = response.content.flatMap((b) => (b.type === 'text' ? [b.text] : [])).join('');

        return {
          text,
          usage: {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens,
            totalTokens: response.usage.input_tokens + response.usage.output_tokens,
          },
          stopReason: response.stop_reason ?? undefined,
          raw: response,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }

  private mapMessages(messages: ChatMessage[]): {
    system?: string;
    messages: Anthropic.MessageParam[];
  } {
    let system: string | undefined;
    const mapped: Anthropic.MessageParam[] = [];

    for (const m of messages) {
      if (m.role === 'system') {
        system = system ? system + '\n' + m.content : m.content;
      } else {
        mapped.push({ role: m.role, content: m.content });
      }
    }

    return { system, messages: mapped };
  }
}
