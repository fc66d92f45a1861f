export { ConfigError, ProviderError, RateLimitError, TimeoutError } from '@specforge/shared';
