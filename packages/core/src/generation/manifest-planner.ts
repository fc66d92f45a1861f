import { ManifestDecodeError, staysWithinRoot } from '@specforge/shared';
import type { TokenUsage } from '../cost/metrics';
import { requestCompletion } from './completion';
import { manifestPrompt } from './prompts';
import { stripCodeFences } from './response-parser';
import type { GenerationDeps } from './types';

export interface PlannedManifest {
  /** Ordered, duplicates kept */
  manifest: string[];
  usage: TokenUsage;
}

/**
 * Decodes a manifest reply into a list of relative paths.
 *
 * @throws {ManifestDecodeError} carrying the unparsed reply
 */
export function decodeManifest(text: string, usage?: TokenUsage): string[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(stripCodeFences(text));
  } catch (error) {
    throw new ManifestDecodeError(
      `Manifest reply is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      text,
      { cause: error, usage },
    );
  }

  if (!Array.isArray(decoded)) {
    throw new ManifestDecodeError('Manifest reply is not a JSON array', text, { usage });
  }

  return decoded.map((entry: unknown, index) => {
    if (typeof entry !== 'string' || !staysWithinRoot(entry)) {
      throw new ManifestDecodeError(
        `Manifest entry ${index} is not a file path inside the output directory: ${JSON.stringify(entry)}`,
        text,
        { usage },
      );
    }
    return entry;
  });
}

/**
 * Asks for the list of files the specification needs. Not retried: a reply
 * that does not decode ends the session.
 */
export async function planManifest(spec: string, deps: GenerationDeps): Promise<PlannedManifest> {
  const completion = await requestCompletion(
    deps.adapter,
    manifestPrompt(spec),
    deps.settings.maxTokens.manifest,
    deps.ctx,
    { purpose: 'manifest' },
  );
  const usage = { inputTokens: completion.inputTokens, outputTokens: completion.outputTokens };
  return { manifest: decodeManifest(completion.text, usage), usage };
}
