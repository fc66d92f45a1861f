import type { Pricing } from '@specforge/shared';

/**
 * Running totals for one session. Values are never mutated; each request
 * produces a new value through {@link addUsage}.
 */
export interface SessionMetrics {
  readonly requests: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
  readonly costUsd: number;
  readonly elapsedMs: number;
}

/** Token counts of one completion */
export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
}

export function emptyMetrics(): SessionMetrics {
  return { requests: 0, inputTokens: 0, outputTokens: 0, totalTokens: 0, costUsd: 0, elapsedMs: 0 };
}

/**
 * USD cost of a completion, prices given per million tokens.
 */
export function computeCost(usage: TokenUsage, pricing: Pricing): number {
  return (
    (usage.inputTokens * pricing.inputPerMTokUsd) / 1_000_000 +
    (usage.outputTokens * pricing.outputPerMTokUsd) / 1_000_000
  );
}

export function addUsage(metrics: SessionMetrics, usage: TokenUsage, pricing: Pricing): SessionMetrics {
  return {
    ...metrics,
    requests: metrics.requests + 1,
    inputTokens: metrics.inputTokens + usage.inputTokens,
    outputTokens: metrics.outputTokens + usage.outputTokens,
    totalTokens: metrics.totalTokens + usage.inputTokens + usage.outputTokens,
    costUsd: metrics.costUsd + computeCost(usage, pricing),
  };
}

/** Folds the usage of several completions into `metrics`, in order. */
export function addUsages(
  metrics: SessionMetrics,
  usages: readonly TokenUsage[],
  pricing: Pricing,
): SessionMetrics {
  return usages.reduce<SessionMetrics>((acc, usage) => addUsage(acc, usage, pricing), metrics);
}

export function withElapsed(metrics: SessionMetrics, startedAt: number, now = Date.now()): SessionMetrics {
  return { ...metrics, elapsedMs: Math.max(0, now - startedAt) };
}
