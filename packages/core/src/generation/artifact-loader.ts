import path from 'path';
import fs from 'fs-extra';
import { UsageError } from '@specforge/shared';
import type { ArtifactMap } from './types';

async function walk(root: string, relative: string[], files: ArtifactMap): Promise<void> {
  const entries = await fs.readdir(path.join(root, ...relative), { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const segments = [...relative, entry.name];
    if (entry.isDirectory()) {
      await walk(root, segments, files);
    } else if (entry.isFile()) {
      files.set(segments.join('/'), await fs.readFile(path.join(root, ...segments), 'utf8'));
    }
  }
}

/**
 * Reads a previously written output tree back into an artifact map. Any
 * path segment starting with `.` is skipped; keys use `/` separators.
 *
 * @throws {UsageError} if `root` is not a directory
 */
export async function loadArtifacts(root: string): Promise<ArtifactMap> {
  const stat = await fs.stat(root).catch(() => null);
  if (!stat) {
    throw new UsageError(`Output directory not found: ${root}`);
  }
  if (!stat.isDirectory()) {
    throw new UsageError(`Not a directory: ${root}`);
  }

  const files: ArtifactMap = new Map();
  await walk(root, [], files);
  return files;
}
