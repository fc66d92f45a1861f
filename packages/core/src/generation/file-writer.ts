import path from 'path';
import fs from 'fs-extra';
import { WriteError, staysWithinRoot } from '@specforge/shared';
import type { ArtifactMap } from './types';

export interface WriteOptions {
  /** Suffixes that get mode 0o755 */
  executableSuffixes: readonly string[];
}

export interface WriteResult {
  written: string[];
  executable: string[];
}

/**
 * Writes every artifact below `root`, sorted by path. Existing files are
 * overwritten in place; the tree is not written atomically.
 *
 * @throws {WriteError} before anything is written if a path escapes `root`
 */
export async function writeArtifacts(
  files: ArtifactMap,
  root: string,
  options: WriteOptions = { executableSuffixes: ['.sh'] },
): Promise<WriteResult> {
  const paths = [...files.keys()].sort();
  for (const p of paths) {
    if (!staysWithinRoot(p)) {
      throw new WriteError(p, 'path escapes the output root');
    }
  }

  await fs.ensureDir(root);
  const result: WriteResult = { written: [], executable: [] };

  for (const p of paths) {
    const target = path.join(root, p);
    try {
      await fs.ensureDir(path.dirname(target));
      await fs.writeFile(target, files.get(p) ?? '', 'utf8');
      if (options.executableSuffixes.some((suffix) => p.endsWith(suffix))) {
        await fs.chmod(target, 0o755);
        result.executable.push(p);
      }
    } catch (error) {
      throw new WriteError(p, error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }
    result.written.push(p);
  }

  return result;
}
