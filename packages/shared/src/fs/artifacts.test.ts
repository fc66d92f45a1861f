import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { remove } from 'fs-extra';
import { createRunDir, createRunId, getRunArtifactPaths } from './artifacts';
import { join } from './path';

describe('run artifacts', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    if (tmpDir) await remove(tmpDir);
    tmpDir = undefined;
  });

  it('computes the standard paths below .specforge/runs', () => {
    const paths = getRunArtifactPaths('/work', 'run-1');
    expect(paths).toEqual({
      root: '/work/.specforge/runs/run-1',
      trace: '/work/.specforge/runs/run-1/trace.jsonl',
      summary: '/work/.specforge/runs/run-1/summary.json',
      effectiveConfig: '/work/.specforge/runs/run-1/effective-config.json',
      manifestRaw: '/work/.specforge/runs/run-1/manifest_raw.txt',
    });
  });

  it('creates the run directory', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'specforge-artifacts-'));
    const paths = await createRunDir(tmpDir, 'run-2');
    const stat = await fs.stat(paths.root);
    expect(stat.isDirectory()).toBe(true);
  });

  it('builds sortable run ids', () => {
    const id = createRunId(new Date(Date.UTC(2026, 0, 2, 3, 4, 5)), 'abc123');
    expect(id).toBe('20260102-030405-abc123');
  });
});
