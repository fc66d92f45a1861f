import { RegistryError, type Config, type GenerationConfig, type ProviderConfig } from '@specforge/shared';
import type { ProviderAdapter } from '@specforge/adapters';

export { RegistryError } from '@specforge/shared';

/**
 * Creates an adapter for one configured provider.
 */
export type AdapterFactory = (config: ProviderConfig, providerId: string) => ProviderAdapter;

/**
 * Maps provider types to adapter factories and caches one adapter per provider id.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry(config);
 * registry.registerFactory('anthropic', (cfg, id) => new AnthropicAdapter(cfg, id));
 * const adapter = registry.getAdapter('anthropic');
 * ```
 */
export class ProviderRegistry {
  private factories = new Map<string, AdapterFactory>();
  private adapters = new Map<string, ProviderAdapter>();

  constructor(private config: Config) {}

  registerFactory(type: string, factory: AdapterFactory) {
    this.factories.set(type, factory);
  }

  /**
   * @param override - replaces the configured provider entry, e.g. with a CLI api key applied
   * @throws {RegistryError} If the provider, its factory or its API key is missing
   */
  getAdapter(providerId: string, override?: ProviderConfig): ProviderAdapter {
    const cached = this.adapters.get(providerId);
    if (cached && !override) {
      return cached;
    }

    const providerConfig = override ?? this.config.providers?.[providerId];
    if (!providerConfig) {
      throw new RegistryError(`Provider '${providerId}' not found`);
    }

    const factory = this.factories.get(providerConfig.type);
    if (!factory) {
      throw new RegistryError(
        `Unknown provider type '${providerConfig.type}' for provider '${providerId}'`,
      );
    }

    let resolvedConfig = providerConfig;
    if (providerConfig.api_key_env && !providerConfig.api_key) {
      const fromEnv = process.env[providerConfig.api_key_env];
      if (!fromEnv) {
        throw new RegistryError(
          `Missing environment variable '${providerConfig.api_key_env}' for provider '${providerId}'`,
        );
      }
      resolvedConfig = { ...providerConfig, api_key: fromEnv };
    }

    const adapter = factory(resolvedConfig, providerId);
    this.adapters.set(providerId, adapter);
    return adapter;
  }

  /**
   * Lists the configured output caps that exceed what the adapter can produce.
   */
  outputLimitWarnings(adapter: ProviderAdapter, generation: GenerationConfig): string[] {
    const limit = adapter.capabilities().maxOutputTokens;
    if (limit === undefined) {
      return [];
    }
    return Object.entries(generation.maxTokens)
      .filter(([, value]) => value > limit)
      .map(
        ([phase, value]) =>
          `generation.maxTokens.${phase} (${value}) exceeds ${adapter.id()} output limit (${limit})`,
      );
  }
}
