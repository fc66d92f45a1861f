/**
 * A message in a conversation with an LLM provider.
 */
export interface ChatMessage {
  /** The role of the message sender */
  role: 'system' | 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * Request payload for generating a model response.
 *
 * @example
 * ```typescript
 * const request: ModelRequest = {
 *   messages: [{ role: 'user', content: 'List the files this project needs.' }],
 *   maxTokens: 2000,
 * };
 * ```
 */
export interface ModelRequest {
  /** Conversation history to send to the model */
  messages: ChatMessage[];
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2, higher = more random) */
  temperature?: number;
  /** Request JSON-formatted output */
  jsonMode?: boolean;
  /** Additional metadata to pass through */
  metadata?: RequestMetadata;
}

/**
 * Which pipeline phase issued a request.
 */
export type RequestPurpose = 'manifest' | 'batch' | 'gap-fill' | 'iterate' | 'single-pass';

/**
 * Request annotations. Real providers ignore them; the fake provider answers from them.
 */
export interface RequestMetadata {
  purpose?: RequestPurpose;
  /** Paths the request asks for, in order */
  paths?: string[];
  /** Change description of an iteration request */
  modification?: string;
  [key: string]: unknown;
}

/**
 * Token usage statistics from a model response.
 */
export interface Usage {
  /** Number of tokens in the input/prompt */
  inputTokens?: number;
  /** Number of tokens generated in the output */
  outputTokens?: number;
  /** Total tokens (input + output) */
  totalTokens?: number;
}

/**
 * Response from a model generation request.
 */
export interface ModelResponse {
  /** Generated text content */
  text?: string;
  /** Token usage statistics */
  usage?: Usage;
  /** Why the model stopped, as reported by the provider */
  stopReason?: string;
  /** Raw provider-specific response data */
  raw?: unknown;
}

/**
 * Describes the capabilities of an LLM provider adapter.
 */
export interface ProviderCapabilities {
  /** Whether the provider supports JSON mode output */
  supportsJsonMode: boolean;
  /** Largest output size the adapter will request */
  maxOutputTokens?: number;
  /** Expected response latency classification */
  latencyClass: 'fast' | 'medium' | 'slow';
  /** Whether requests leave the process */
  requiresNetwork: boolean;
}
