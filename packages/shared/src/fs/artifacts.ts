import { join } from './path';
import * as fs from 'fs/promises';

export const SPECFORGE_DIR = '.specforge';
export const RUNS_DIR = 'runs';

export interface RunArtifactPaths {
  root: string;
  trace: string;
  summary: string;
  effectiveConfig: string;
  manifestRaw: string;
}

/**
 * Returns the standard artifact paths of a run without touching the disk.
 */
export function getRunArtifactPaths(baseDir: string, runId: string): RunArtifactPaths {
  const runRootDir = join(baseDir, SPECFORGE_DIR, RUNS_DIR, runId);
  return {
    root: runRootDir,
    trace: join(runRootDir, 'trace.jsonl'),
    summary: join(runRootDir, 'summary.json'),
    effectiveConfig: join(runRootDir, 'effective-config.json'),
    manifestRaw: join(runRootDir, 'manifest_raw.txt'),
  };
}

/**
 * Creates the artifact directory for a specific run.
 * Returns the paths to the standard artifacts.
 */
export async function createRunDir(baseDir: string, runId: string): Promise<RunArtifactPaths> {
  const paths = getRunArtifactPaths(baseDir, runId);
  await fs.mkdir(paths.root, { recursive: true });
  return paths;
}

/**
 * Sortable, filesystem-safe run id: `YYYYMMDD-HHmmss-<suffix>`.
 */
export function createRunId(now: Date = new Date(), suffix?: string): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `-${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const tail = suffix ?? Math.random().toString(36).slice(2, 8);
  return `${stamp}-${tail}`;
}
