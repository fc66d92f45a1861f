import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { remove } from 'fs-extra';
import { execa } from 'execa';
import { ConfigError, UsageError } from '@specforge/shared';
import { createProgram } from '../src/program';
import { NO_DELETION_NOTICE } from '../src/commands/iterate';

vi.mock('execa', () => ({
  execa: vi.fn().mockResolvedValue({ exitCode: 0 }),
}));

describe('CLI Integration Tests', () => {
  let root: string;
  let cwd: string;
  let homeDir: string;
  let logSpy: MockInstance<Parameters<typeof console.log>, void>;

  async function run(...args: string[]): Promise<void> {
    const program = createProgram({ cwd, homeDir, env: {} });
    program.exitOverride();
    await program.parseAsync(args, { from: 'user' });
  }

  function lastJson(): Record<string, unknown> {
    const calls = logSpy.mock.calls;
    const parsed: unknown = JSON.parse(String(calls[calls.length - 1][0]));
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('expected a JSON object');
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  function runDirs(): string[] {
    return fs.readdirSync(path.join(cwd, '.specforge', 'runs'));
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'specforge-cli-'));
    cwd = path.join(root, 'project');
    homeDir = path.join(root, 'home');
    fs.mkdirSync(cwd, { recursive: true });
    fs.mkdirSync(homeDir, { recursive: true });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.mocked(execa).mockClear();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await remove(root);
  });

  it('generates the project and records the run', async () => {
    await run('--provider', 'fake', '--json', 'generate', 'a publisher and a consumer', '-o', 'out');

    const output = lastJson();
    const outDir = path.join(cwd, 'out');
    expect(output.status).toBe('SUCCESS');
    expect(output.mode).toBe('staged');
    expect(output.outputDir).toBe(outDir);
    expect(output.files).toEqual({ requested: 8, produced: 8, unresolved: [] });
    expect(output.executable).toEqual(['scripts/start.sh']);

    expect(fs.readFileSync(path.join(outDir, 'publisher/publisher.py'), 'utf8')).toBe(
      'print("publisher/publisher.py")',
    );
    expect(fs.statSync(path.join(outDir, 'scripts/start.sh')).mode & 0o100).not.toBe(0);

    const [runId] = runDirs();
    const runDir = path.join(cwd, '.specforge', 'runs', runId);
    const summary = JSON.parse(fs.readFileSync(path.join(runDir, 'summary.json'), 'utf8'));
    expect(summary).toMatchObject({
      runId,
      mode: 'staged',
      provider: 'fake',
      model: 'fake-model',
      status: 'success',
      files: { requested: 8, produced: 8, unresolved: [] },
    });
    expect(summary.metrics.requests).toBe(6);
    expect(fs.existsSync(path.join(runDir, 'effective-config.json'))).toBe(true);

    const types = fs
      .readFileSync(path.join(runDir, 'trace.jsonl'), 'utf8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line).type);
    expect(types[0]).toBe('SessionStarted');
    expect(types).toContain('ManifestPlanned');
    expect(types.slice(-2)).toEqual(['SessionFinished', 'FilesWritten']);
  });

  it('reads the specification from a file in single-pass mode', async () => {
    fs.writeFileSync(path.join(cwd, 'system.md'), 'Three services talking over a queue.');

    await run('--provider', 'fake', '--json', 'generate', '@system.md', '--single-pass', '-o', 'out');

    const output = lastJson();
    expect(output.mode).toBe('single-pass');
    expect(output.files).toEqual({ requested: 8, produced: 8, unresolved: [] });
    expect(fs.existsSync(path.join(cwd, 'out/docker-compose.yml'))).toBe(true);
  });

  it('sends one batch request per file with --chunk-size 1', async () => {
    await run('--provider', 'fake', '--json', 'generate', 'spec', '--chunk-size', '1', '-o', 'out');

    const output = lastJson();
    expect(output.metrics).toMatchObject({ requests: 9 });
  });

  it('rejects a chunk size outside the configured range', async () => {
    await expect(
      run('--provider', 'fake', '--json', 'generate', 'spec', '--chunk-size', '0'),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects an unknown provider', async () => {
    await expect(run('--provider', 'nope', 'generate', 'spec')).rejects.toThrow(
      "Provider 'nope' is not configured (known: anthropic, fake, openai)",
    );
  });

  it('rejects a missing specification file', async () => {
    await expect(run('--provider', 'fake', 'generate', '@missing.md')).rejects.toBeInstanceOf(
      UsageError,
    );
  });

  it('runs docker-compose after approval with --yes', async () => {
    await run('--provider', 'fake', '--json', '--yes', 'generate', 'spec', '-o', 'out', '--execute');

    expect(execa).toHaveBeenCalledWith('docker-compose', ['up', '--build'], {
      cwd: path.join(cwd, 'out'),
      stdio: 'inherit',
    });
  });

  it('skips docker-compose when prompts are disabled', async () => {
    await run(
      '--provider',
      'fake',
      '--json',
      '--non-interactive',
      'generate',
      'spec',
      '-o',
      'out',
      '--execute',
    );

    expect(execa).not.toHaveBeenCalled();
  });

  it('applies a modification to a generated project without removing files', async () => {
    await run('--provider', 'fake', '--json', 'generate', 'spec', '-o', 'out');

    await run('--provider', 'fake', '--json', 'iterate', 'spec', 'add a healthcheck', '-o', 'out');

    const output = lastJson();
    expect(output.mode).toBe('iterate');
    expect(output.changed).toEqual([]);
    expect(output.added).toEqual(['CHANGES.md']);
    expect(output.notices).toEqual([NO_DELETION_NOTICE]);
    expect(fs.readFileSync(path.join(cwd, 'out/CHANGES.md'), 'utf8')).toBe(
      '# Changes\n\nadd a healthcheck',
    );
    expect(fs.existsSync(path.join(cwd, 'out/consumer/consumer.py'))).toBe(true);
    expect(runDirs()).toHaveLength(2);
  });

  it('refuses to iterate on a missing output directory', async () => {
    await expect(
      run('--provider', 'fake', 'iterate', 'spec', 'change', '-o', 'nowhere'),
    ).rejects.toThrow(/^Output directory not found: /);
  });
});
