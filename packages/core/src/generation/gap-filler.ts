import { ConfigError } from '@specforge/shared';
import type { TokenUsage } from '../cost/metrics';
import { requestCompletion } from './completion';
import { gapFillPrompt } from './prompts';
import { stripSingleFencePair } from './response-parser';
import type { ArtifactMap, GapFillResult, GenerationDeps, Outcome } from './types';

export interface GapFillAttempt {
  outcome: Outcome<string>;
  usage?: TokenUsage;
}

/**
 * Requests one missing file on its own. An empty reply or a failed request
 * is a failed outcome; configuration errors propagate.
 */
export async function fillGap(
  spec: string,
  path: string,
  produced: ArtifactMap,
  deps: GenerationDeps,
): Promise<GapFillAttempt> {
  const context = [...produced.keys()].sort().slice(0, deps.settings.gapFillContextSize);

  try {
    const completion = await requestCompletion(
      deps.adapter,
      gapFillPrompt(spec, path, context),
      deps.settings.maxTokens.gapFill,
      deps.ctx,
      { purpose: 'gap-fill', paths: [path] },
    );
    const usage = { inputTokens: completion.inputTokens, outputTokens: completion.outputTokens };
    const content = stripSingleFencePair(completion.text);
    if (content.length === 0) {
      return { outcome: { ok: false, reason: 'empty reply', raw: completion.text }, usage };
    }
    return { outcome: { ok: true, value: content }, usage };
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    return {
      outcome: { ok: false, reason: error instanceof Error ? error.message : String(error) },
    };
  }
}

/**
 * Fills every manifest path missing from `files`, in manifest order. Each
 * resolved file joins the context of the requests after it.
 */
export async function fillGaps(
  spec: string,
  manifest: readonly string[],
  files: ArtifactMap,
  deps: GenerationDeps,
): Promise<GapFillResult> {
  const result: GapFillResult = {
    files: new Map(files),
    resolved: [],
    unresolved: [],
    usage: [],
  };

  const missing = [...new Set(manifest)].filter((path) => !files.has(path));
  for (const path of missing) {
    const attempt = await fillGap(spec, path, result.files, deps);
    if (attempt.usage) result.usage.push(attempt.usage);

    if (attempt.outcome.ok) {
      result.files.set(path, attempt.outcome.value);
      result.resolved.push({ path, chars: attempt.outcome.value.length });
    } else {
      result.unresolved.push({ path, reason: attempt.outcome.reason });
    }
  }

  return result;
}
