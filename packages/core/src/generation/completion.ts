import { AppError, ProviderError, type RequestMetadata } from '@specforge/shared';
import type { AdapterContext, ProviderAdapter } from '@specforge/adapters';
import type { CompletionResult } from './types';

/**
 * Sends one single-message prompt and reduces the reply to text and token
 * counts. Failures other than the shared error types become ProviderError.
 */
export async function requestCompletion(
  adapter: ProviderAdapter,
  prompt: string,
  maxTokens: number,
  ctx: AdapterContext,
  metadata?: RequestMetadata,
): Promise<CompletionResult> {
  try {
    const response = await adapter.generate(
      { messages: [{ role: 'user', content: prompt }], maxTokens, metadata },
      ctx,
    );
    return {
      text: response.text ?? '',
      inputTokens: response.usage?.inputTokens ?? 0,
      outputTokens: response.usage?.outputTokens ?? 0,
    };
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new ProviderError(
      `Completion request to ${adapter.id()} failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}
