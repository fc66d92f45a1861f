import { AnthropicAdapter, FakeAdapter, OpenAIAdapter } from '@specforge/adapters';
import type { ProviderRegistry } from '@specforge/core';

/**
 * Registers the adapter factory of every supported provider type.
 */
export function registerProviders(registry: ProviderRegistry): ProviderRegistry {
  registry.registerFactory('anthropic', (cfg, id) => new AnthropicAdapter(cfg, id));
  registry.registerFactory('openai', (cfg, id) => new OpenAIAdapter(cfg, id));
  registry.registerFactory('fake', (cfg, id) => new FakeAdapter(cfg, id));
  return registry;
}
