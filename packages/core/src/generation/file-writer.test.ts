import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { remove } from 'fs-extra';
import { WriteError } from '@specforge/shared';
import { writeArtifacts } from './file-writer';

describe('writeArtifacts', () => {
  let root: string;

  beforeEach(() => {
    root = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'specforge-write-')), 'out');
  });

  afterEach(async () => {
    await remove(path.dirname(root));
  });

  it('marks shell scripts executable and leaves other files alone', async () => {
    const result = await writeArtifacts(
      new Map([
        ['scripts/run.sh', 'echo hi'],
        ['app.py', 'print(1)'],
      ]),
      root,
    );

    expect(result).toEqual({ written: ['app.py', 'scripts/run.sh'], executable: ['scripts/run.sh'] });
    expect(fs.readFileSync(path.join(root, 'scripts/run.sh'), 'utf8')).toBe('echo hi');
    expect(fs.statSync(path.join(root, 'scripts/run.sh')).mode & 0o111).not.toBe(0);
    expect(fs.statSync(path.join(root, 'app.py')).mode & 0o100).toBe(0);
  });

  it('uses the configured executable suffixes', async () => {
    const result = await writeArtifacts(
      new Map([
        ['tool.py', 'x'],
        ['run.sh', 'y'],
      ]),
      root,
      { executableSuffixes: ['.py'] },
    );

    expect(result.executable).toEqual(['tool.py']);
  });

  it('overwrites an existing file', async () => {
    fs.mkdirSync(root, { recursive: true });
    fs.writeFileSync(path.join(root, 'a.txt'), 'old');

    await writeArtifacts(new Map([['a.txt', 'new']]), root);

    expect(fs.readFileSync(path.join(root, 'a.txt'), 'utf8')).toBe('new');
  });

  it('refuses paths that escape the root before writing anything', async () => {
    const files = new Map([
      ['a.txt', 'fine'],
      ['../escape.txt', 'nope'],
    ]);

    await expect(writeArtifacts(files, root)).rejects.toBeInstanceOf(WriteError);
    expect(fs.existsSync(root)).toBe(false);
  });
});
