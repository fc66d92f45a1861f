import { requestCompletion } from './completion';
import { iteratePrompt } from './prompts';
import { parseDelimitedBlocks } from './response-parser';
import type { ArtifactMap, GenerationDeps, IterationResult } from './types';

/**
 * Applies a change request to an existing artifact set. The reply lists only
 * changed or new files; they overwrite or extend `existing`, and nothing is
 * ever removed.
 */
export async function iterateArtifacts(
  spec: string,
  modification: string,
  existing: ArtifactMap,
  deps: GenerationDeps,
): Promise<IterationResult> {
  const current = [...existing].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const completion = await requestCompletion(
    deps.adapter,
    iteratePrompt(spec, modification, current),
    deps.settings.maxTokens.iterate,
    deps.ctx,
    { purpose: 'iterate', modification },
  );

  const updates = parseDelimitedBlocks(completion.text);
  const files: ArtifactMap = new Map(existing);
  const changed: string[] = [];
  const added: string[] = [];

  for (const [path, content] of updates) {
    (existing.has(path) ? changed : added).push(path);
    files.set(path, content);
  }

  return {
    files,
    changed,
    added,
    usage: { inputTokens: completion.inputTokens, outputTokens: completion.outputTokens },
    deletionSupported: false,
  };
}
