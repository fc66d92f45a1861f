import type { ModelRequest, ModelResponse, ProviderCapabilities } from '@specforge/shared';
import type { AdapterContext } from './types';

/**
 * A completion backend. The session only ever asks for a single text reply
 * to a prompt, so adapters implement one request shape.
 *
 * @example
 * ```typescript
 * class EchoAdapter implements ProviderAdapter {
 *   id() { return 'echo'; }
 *   capabilities() { return { supportsJsonMode: false, latencyClass: 'fast', requiresNetwork: false }; }
 *   async generate(req) { return { text: req.messages.at(-1)?.content }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  /** Identifier of the configured provider, e.g. the key under `providers:` */
  id(): string;
  capabilities(): ProviderCapabilities;
  /** Model name reported in trace events */
  model(): string;
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
