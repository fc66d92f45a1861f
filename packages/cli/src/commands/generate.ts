import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { execa } from 'execa';
import {
  GenerationSession,
  addUsage,
  emptyMetrics,
  writeArtifacts,
  type SessionReport,
} from '@specforge/core';
import {
  ManifestDecodeError,
  SESSION_SUMMARY_SCHEMA_VERSION,
  SummaryWriter,
  createEvent,
} from '@specforge/shared';
import { OutputRenderer, printTable } from '../output';
import { confirm } from '../utils/confirm';
import {
  prepareRun,
  processEnvironment,
  readSpecInput,
  type CliEnvironment,
  type GlobalOptions,
} from './context';

export const DEFAULT_OUTPUT_DIR = './generated-system';

interface GenerateOptions {
  output: string;
  singlePass?: boolean;
  chunkSize?: number;
  execute?: boolean;
}

function parseChunkSize(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Chunk size must be an integer.');
  }
  return parsed;
}

export function registerGenerateCommand(
  program: Command,
  environment: CliEnvironment = processEnvironment(),
) {
  program
    .command('generate')
    .argument('<spec>', 'Specification text, or @file to read it from a file')
    .description('Generate a multi-file project from a specification')
    .option('-o, --output <dir>', 'Directory to write the generated files to', DEFAULT_OUTPUT_DIR)
    .option('--single-pass', 'Ask for every file in one request instead of staged generation')
    .option('--chunk-size <n>', 'Files per batch request', parseChunkSize)
    .option('--execute', 'Run docker-compose up --build in the output directory afterwards')
    .action(async (specInput: string, options: GenerateOptions) => {
      const globals = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globals.json);

      const spec = await readSpecInput(specInput, environment.cwd);
      const outputDir = path.resolve(environment.cwd, options.output);
      const run = await prepareRun(
        globals,
        environment,
        options.chunkSize !== undefined ? { generation: { chunkSize: options.chunkSize } } : {},
      );
      const mode = options.singlePass ? 'single-pass' : 'staged';

      if (globals.verbose) {
        renderer.log(`Run ${run.runId}: ${mode} generation with ${run.provider.id} (${run.adapter.model()})`);
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

      const baseSummary = {
        schemaVersion: SESSION_SUMMARY_SCHEMA_VERSION,
        runId: run.runId,
        mode,
        provider: run.provider.id,
        model: run.adapter.model(),
        outputDir,
        startedAt: run.startedAt.toISOString(),
      } as const;

      let report: SessionReport;
      try {
        report = options.singlePass
          ? await session.generateSinglePass(spec)
          : await session.generate(spec);
      } catch (error) {
        const decodeError = error instanceof ManifestDecodeError ? error : undefined;
        const metrics = decodeError?.usage
          ? addUsage(emptyMetrics(), decodeError.usage, run.pricing)
          : emptyMetrics();
        await SummaryWriter.write(
          {
            ...baseSummary,
            finishedAt: new Date().toISOString(),
            status: 'failure',
            error: error instanceof Error ? error.message : String(error),
            files: { requested: 0, produced: 0, unresolved: [] },
            metrics,
            artifacts: {
              tracePath: run.artifacts.trace,
              effectiveConfigPath: run.effectiveConfigPath,
              manifestRawPath: decodeError ? run.artifacts.manifestRaw : undefined,
            },
          },
          run.artifacts.root,
        );
        if (decodeError && !globals.json) {
          renderer.render({
            status: 'FAILURE',
            mode,
            runId: run.runId,
            error: decodeError.message,
            artifactsDir: run.artifacts.root,
            manifestRawPath: run.artifacts.manifestRaw,
            metrics,
          });
        }
        throw error;
      }

      const written = await writeArtifacts(report.files, outputDir, {
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
          ...baseSummary,
          finishedAt: new Date().toISOString(),
          status: 'success',
          files: {
            requested: report.requested,
            produced: report.produced,
            unresolved: report.unresolved,
          },
          metrics: report.metrics,
          artifacts: { tracePath: run.artifacts.trace, effectiveConfigPath: run.effectiveConfigPath },
        },
        run.artifacts.root,
      );

      if (globals.verbose && !globals.json) {
        printTable(
          written.written.map((file) => ({
            path: file,
            chars: report.files.get(file)?.length ?? 0,
            executable: written.executable.includes(file) ? 'yes' : '',
          })),
        );
      }

      renderer.render({
        status: 'SUCCESS',
        mode,
        runId: run.runId,
        provider: run.provider.id,
        model: run.adapter.model(),
        outputDir,
        artifactsDir: run.artifacts.root,
        files: {
          requested: report.requested,
          produced: report.produced,
          unresolved: report.unresolved,
        },
        written: written.written,
        executable: written.executable,
        metrics: report.metrics,
        nextSteps: options.execute
          ? []
          : [`cd ${outputDir} && docker-compose up --build`],
      });

      if (options.execute) {
        const approved = await confirm(
          `Run docker-compose up --build in ${outputDir}?`,
          undefined,
          false,
          { yes: globals.yes, nonInteractive: globals.nonInteractive, logger: run.logger, runId: run.runId },
        );
        if (!approved) {
          renderer.log('Skipped docker-compose.');
          return;
        }
        await execa('docker-compose', ['up', '--build'], { cwd: outputDir, stdio: 'inherit' });
      }
    });
}
