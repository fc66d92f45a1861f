import { ConfigError } from '@specforge/shared';
import type { TokenUsage } from '../cost/metrics';
import { requestCompletion } from './completion';
import { batchPrompt } from './prompts';
import { parseJsonFileMap } from './response-parser';
import type { ArtifactMap, BatchResult, ChunkOutcome, GenerationDeps } from './types';

export function chunkPaths(paths: readonly string[], size: number): string[][] {
  if (size < 1) {
    throw new ConfigError(`Chunk size must be at least 1, got ${size}`);
  }
  const chunks: string[][] = [];
  for (let i = 0; i < paths.length; i += size) {
    chunks.push(paths.slice(i, i + size));
  }
  return chunks;
}

async function generateChunk(
  spec: string,
  paths: string[],
  deps: GenerationDeps,
): Promise<ChunkOutcome> {
  let text: string;
  let usage: TokenUsage;
  try {
    const completion = await requestCompletion(
      deps.adapter,
      batchPrompt(spec, paths),
      deps.settings.maxTokens.batch,
      deps.ctx,
      { purpose: 'batch', paths },
    );
    text = completion.text;
    usage = { inputTokens: completion.inputTokens, outputTokens: completion.outputTokens };
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    return {
      ok: false,
      reason: error instanceof Error ? error.message : String(error),
      requested: paths,
    };
  }

  const parsed = parseJsonFileMap(text);
  if (!parsed.ok) {
    return { ...parsed, requested: paths, usage };
  }

  // Paths outside the chunk are not part of the manifest.
  const requested = new Set(paths);
  const files: ArtifactMap = new Map([...parsed.value].filter(([path]) => requested.has(path)));
  return { ok: true, value: files, requested: paths, usage };
}

/**
 * Generates one group's files, `settings.chunkSize` paths per request.
 * A chunk that fails leaves its paths missing for gap-filling.
 */
export async function generateBatch(
  spec: string,
  paths: readonly string[],
  deps: GenerationDeps,
): Promise<BatchResult> {
  const files: ArtifactMap = new Map();
  const chunks: ChunkOutcome[] = [];
  const usage: TokenUsage[] = [];

  for (const chunk of chunkPaths(paths, deps.settings.chunkSize)) {
    const outcome = await generateChunk(spec, chunk, deps);
    chunks.push(outcome);
    if (outcome.usage) usage.push(outcome.usage);
    if (outcome.ok) {
      for (const [path, content] of outcome.value) {
        files.set(path, content);
      }
    }
  }

  return { files, chunks, usage };
}
