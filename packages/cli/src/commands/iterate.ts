import path from 'path';
import { Command } from 'commander';
import { GenerationSession, loadArtifacts, writeArtifacts } from '@specforge/core';
import { SESSION_SUMMARY_SCHEMA_VERSION, SummaryWriter, createEvent } from '@specforge/shared';
import { OutputRenderer } from '../output';
import {
  prepareRun,
  processEnvironment,
  readSpecInput,
  type CliEnvironment,
  type GlobalOptions,
} from './context';
import { DEFAULT_OUTPUT_DIR } from './generate';

export const NO_DELETION_NOTICE =
  'Modifications can change or add files but never delete them. Remove obsolete files by hand.';

interface IterateOptions {
  output: string;
}

export function registerIterateCommand(
  program: Command,
  environment: CliEnvironment = processEnvironment(),
) {
  program
    .command('iterate')
    .argument('<spec>', 'The original specification text, or @file')
    .argument('<modification>', 'The change to make, or @file')
    .description('Apply a change request to a previously generated project')
    .option('-o, --output <dir>', 'Directory of the generated project', DEFAULT_OUTPUT_DIR)
    .action(async (specInput: string, modificationInput: string, options: IterateOptions) => {
      const globals = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globals.json);

      const spec = await readSpecInput(specInput, environment.cwd);
      const modification = await readSpecInput(modificationInput, environment.cwd, 'Modification');
      const outputDir = path.resolve(environment.cwd, options.output);
      const existing = await loadArtifacts(outputDir);

      const run = await prepareRun(globals, environment);
      if (globals.verbose) {
        renderer.log(`Run ${run.runId}: iterating on ${existing.size} files in ${outputDir}`);
      }

      const session = new GenerationSession({
        adapter: run.adapter,
        generation: run.config.generation,
        pricing: run.pricing,
        logger: run.logger,
        runId: run.runId,
        artifacts: run.artifacts,
        timeoutMs: run.provider.config.timeoutMs,
        retryOptions:
          run.provider.config.maxRetries !== undefined
            ? { maxRetries: run.provider.config.maxRetries }
            : undefined,
      });
      const report = await session.iterate(spec, modification, existing);

      // Only touched files are rewritten.
      const touched = new Map(
        [...report.changed, ...report.added].map((p) => [p, report.files.get(p) ?? '']),
      );
      const written = await writeArtifacts(touched, outputDir, {
        executableSuffixes: run.config.generation.executableSuffixes,
      });
      await run.logger.log(
        createEvent(run.runId, {
          type: 'FilesWritten',
          payload: { outputDir, paths: written.written, executable: written.executable },
        }),
      );

      await SummaryWriter.write(
        {
          schemaVersion: SESSION_SUMMARY_SCHEMA_VERSION,
          runId: run.runId,
          mode: 'iterate',
          provider: run.provider.id,
          model: run.adapter.model(),
          outputDir,
          startedAt: run.startedAt.toISOString(),
          finishedAt: new Date().toISOString(),
          status: 'success',
          files: { requested: touched.size, produced: touched.size, unresolved: [] },
          metrics: report.metrics,
          artifacts: { tracePath: run.artifacts.trace, effectiveConfigPath: run.effectiveConfigPath },
        },
        run.artifacts.root,
      );

      renderer.render({
        status: 'SUCCESS',
        mode: 'iterate',
        runId: run.runId,
        provider: run.provider.id,
        model: run.adapter.model(),
        outputDir,
        artifactsDir: run.artifacts.root,
        changed: report.changed,
        added: report.added,
        written: written.written,
        executable: written.executable,
        metrics: report.metrics,
        notices: [NO_DELETION_NOTICE],
      });
    });
}
