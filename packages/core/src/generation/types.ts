import type { GenerationConfig } from '@specforge/shared';
import type { AdapterContext, ProviderAdapter } from '@specforge/adapters';
import type { SessionMetrics, TokenUsage } from '../cost/metrics';

/**
 * Result of a step that may fail without stopping the session.
 */
export type Outcome<T> = { ok: true; value: T } | { ok: false; reason: string; raw?: string };

/** path -> content; one entry per path */
export type ArtifactMap = Map<string, string>;

export type GroupName = 'infrastructure' | 'publishers' | 'consumers' | 'monitor' | 'config';

export interface Batch {
  name: GroupName;
  paths: string[];
}

/**
 * What the pipeline keeps of one completion.
 */
export interface CompletionResult extends TokenUsage {
  text: string;
}

/**
 * Everything a generation step needs to issue requests.
 */
export interface GenerationDeps {
  adapter: ProviderAdapter;
  ctx: AdapterContext;
  settings: GenerationConfig;
}

export type ChunkOutcome = Outcome<ArtifactMap> & {
  requested: string[];
  usage?: TokenUsage;
};

export interface BatchResult {
  files: ArtifactMap;
  chunks: ChunkOutcome[];
  usage: TokenUsage[];
}

export interface GapFillResult {
  files: ArtifactMap;
  resolved: Array<{ path: string; chars: number }>;
  unresolved: Array<{ path: string; reason: string }>;
  usage: TokenUsage[];
}

export interface IterationResult {
  files: ArtifactMap;
  /** Paths that existed before and were rewritten */
  changed: string[];
  /** Paths the reply introduced */
  added: string[];
  usage: TokenUsage;
  deletionSupported: false;
}

export type SessionMode = 'staged' | 'single-pass';

export interface SessionReport {
  runId: string;
  mode: SessionMode;
  manifest: string[];
  files: ArtifactMap;
  /** Distinct manifest paths */
  requested: number;
  /** Distinct manifest paths present in `files` */
  produced: number;
  unresolved: string[];
  metrics: SessionMetrics;
}

export interface IterationReport {
  runId: string;
  mode: 'iterate';
  files: ArtifactMap;
  changed: string[];
  added: string[];
  deletionSupported: false;
  metrics: SessionMetrics;
}
