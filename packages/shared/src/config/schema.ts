import { z } from 'zod';

/**
 * Per-million-token prices used to estimate session cost.
 */
export const PricingSchema = z.object({
  inputPerMTokUsd: z.number().nonnegative(),
  outputPerMTokUsd: z.number().nonnegative(),
});

export const DEFAULT_PRICING: Pricing = {
  inputPerMTokUsd: 3,
  outputPerMTokUsd: 15,
};

export const ProviderConfigSchema = z
  .object({
    type: z.string(),
    model: z.string(),
    api_key_env: z.string().optional(),
    api_key: z.string().optional(),
    baseUrl: z.string().optional(),
    timeoutMs: z.number().int().positive().optional(),
    maxRetries: z.number().int().min(0).optional(),
    temperature: z.number().min(0).max(2).optional(),
    pricing: PricingSchema.partial().optional(),
  })
  .passthrough();

/**
 * Output-size caps, in tokens, for each kind of request.
 */
export const MaxTokensConfigSchema = z.object({
  manifest: z.number().int().positive().default(2000),
  batch: z.number().int().positive().default(8000),
  gapFill: z.number().int().positive().default(4000),
  iterate: z.number().int().positive().default(16000),
  singlePass: z.number().int().positive().default(16000),
});

export const GenerationConfigSchema = z.object({
  /** Largest number of paths requested in one batch request */
  chunkSize: z.number().int().min(1).max(50).default(5),
  /** How many produced paths a gap-fill prompt lists for context */
  gapFillContextSize: z.number().int().min(0).default(10),
  /** Path suffixes written with executable permission bits */
  executableSuffixes: z.array(z.string().min(1)).default(['.sh']),
  maxTokens: MaxTokensConfigSchema.default({}),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  defaults: z
    .object({
      provider: z.string().optional(),
    })
    .default({}),
  providers: z.record(z.string(), ProviderConfigSchema).optional(),
  generation: GenerationConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type MaxTokensConfig = z.infer<typeof MaxTokensConfigSchema>;
export type Pricing = z.infer<typeof PricingSchema>;

/**
 * Fills missing prices from {@link DEFAULT_PRICING}.
 */
export function resolvePricing(provider?: ProviderConfig): Pricing {
  return {
    inputPerMTokUsd: provider?.pricing?.inputPerMTokUsd ?? DEFAULT_PRICING.inputPerMTokUsd,
    outputPerMTokUsd: provider?.pricing?.outputPerMTokUsd ?? DEFAULT_PRICING.outputPerMTokUsd,
  };
}
