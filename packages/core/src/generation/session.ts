import {
  ManifestDecodeError,
  atomicWrite,
  createEvent,
  type EventBus,
  type EventInit,
  type GenerationConfig,
  type Logger,
  type Pricing,
  type RunArtifactPaths,
} from '@specforge/shared';
import type { AdapterContext, ProviderAdapter, RetryOptions } from '@specforge/adapters';
import { addUsage, addUsages, emptyMetrics, withElapsed } from '../cost/metrics';
import { generateBatch, chunkPaths } from './batch-generator';
import { groupManifest } from './batch-grouper';
import { requestCompletion } from './completion';
import { fillGaps } from './gap-filler';
import { iterateArtifacts } from './iterate';
import { planManifest } from './manifest-planner';
import { singlePassPrompt } from './prompts';
import { parseDelimitedBlocks } from './response-parser';
import type {
  ArtifactMap,
  GenerationDeps,
  IterationReport,
  SessionMode,
  SessionReport,
} from './types';

const PREVIEW_CHARS = 500;

export interface GenerationSessionOptions {
  adapter: ProviderAdapter;
  generation: GenerationConfig;
  pricing: Pricing;
  logger: Logger;
  runId: string;
  /** Defaults to `logger.log` */
  events?: EventBus;
  /** Where a failed manifest reply is kept */
  artifacts?: RunArtifactPaths;
  timeoutMs?: number;
  retryOptions?: RetryOptions;
  abortSignal?: AbortSignal;
  /** Clock for elapsed time, in milliseconds */
  now?: () => number;
}

/**
 * Runs one generation or iteration against a single provider. Requests are
 * strictly sequential; metrics are folded from each phase's reported usage.
 */
export class GenerationSession {
  readonly runId: string;
  private readonly logger: Logger;
  private readonly events: EventBus;
  private readonly deps: GenerationDeps;
  private readonly now: () => number;

  constructor(private readonly options: GenerationSessionOptions) {
    this.runId = options.runId;
    this.logger = options.logger;
    this.events = options.events ?? { emit: (event) => options.logger.log(event) };
    this.now = options.now ?? Date.now;

    const ctx: AdapterContext = {
      runId: options.runId,
      logger: options.logger,
      abortSignal: options.abortSignal,
      timeoutMs: options.timeoutMs,
      retryOptions: options.retryOptions,
    };
    this.deps = { adapter: options.adapter, ctx, settings: options.generation };
  }

  /**
   * Plans a manifest, generates it group by group and fills the gaps.
   *
   * @throws {ManifestDecodeError} when the plan does not decode
   */
  async generate(spec: string): Promise<SessionReport> {
    const startedAt = this.now();
    let metrics = emptyMetrics();
    await this.started('staged', spec);

    let manifest: string[];
    try {
      const planned = await planManifest(spec, this.deps);
      manifest = planned.manifest;
      metrics = addUsage(metrics, planned.usage, this.options.pricing);
    } catch (error) {
      if (error instanceof ManifestDecodeError) {
        await this.manifestFailed(error);
      }
      throw error;
    }

    const distinct = [...new Set(manifest)];
    await this.emit({
      type: 'ManifestPlanned',
      payload: { paths: manifest, duplicates: manifest.length - distinct.length },
    });
    this.logger.info(`Manifest lists ${distinct.length} files`);

    let files: ArtifactMap = new Map();
    for (const batch of groupManifest(manifest)) {
      const chunkCount = chunkPaths(batch.paths, this.options.generation.chunkSize).length;
      await this.emit({
        type: 'BatchStarted',
        payload: { group: batch.name, paths: batch.paths, chunkCount },
      });

      const result = await generateBatch(spec, batch.paths, this.deps);
      metrics = addUsages(metrics, result.usage, this.options.pricing);
      for (const chunk of result.chunks) {
        if (chunk.ok) {
          await this.emit({
            type: 'ChunkGenerated',
            payload: { group: batch.name, requested: chunk.requested, received: [...chunk.value.keys()] },
          });
        } else {
          this.logger.warn(`Chunk of ${batch.name} failed: ${chunk.reason}`);
          await this.emit({
            type: 'ChunkFailed',
            payload: { group: batch.name, requested: chunk.requested, reason: chunk.reason },
          });
        }
      }
      files = new Map([...files, ...result.files]);
    }

    const gaps = await fillGaps(spec, manifest, files, this.deps);
    metrics = addUsages(metrics, gaps.usage, this.options.pricing);
    for (const resolved of gaps.resolved) {
      await this.emit({ type: 'GapFillResolved', payload: resolved });
    }
    for (const unresolved of gaps.unresolved) {
      await this.emit({ type: 'GapFillUnresolved', payload: unresolved });
    }

    const report: SessionReport = {
      runId: this.runId,
      mode: 'staged',
      manifest,
      files: gaps.files,
      requested: distinct.length,
      produced: distinct.filter((path) => gaps.files.has(path)).length,
      unresolved: gaps.unresolved.map((u) => u.path),
      metrics: withElapsed(metrics, startedAt, this.now()),
    };
    await this.finished(report);
    return report;
  }

  /**
   * One request for the whole system, answered in delimited blocks. There is
   * no manifest, so nothing can be reported missing.
   */
  async generateSinglePass(spec: string): Promise<SessionReport> {
    const startedAt = this.now();
    await this.started('single-pass', spec);

    const completion = await requestCompletion(
      this.deps.adapter,
      singlePassPrompt(spec),
      this.options.generation.maxTokens.singlePass,
      this.deps.ctx,
      { purpose: 'single-pass' },
    );
    const files = parseDelimitedBlocks(completion.text);
    if (files.size === 0) {
      this.logger.warn('Single-pass reply contained no file blocks');
    }

    const manifest = [...files.keys()];
    const report: SessionReport = {
      runId: this.runId,
      mode: 'single-pass',
      manifest,
      files,
      requested: manifest.length,
      produced: manifest.length,
      unresolved: [],
      metrics: withElapsed(addUsage(emptyMetrics(), completion, this.options.pricing), startedAt, this.now()),
    };
    await this.finished(report);
    return report;
  }

  /**
   * Applies a change request to `existing`. Files can be changed or added,
   * never removed.
   */
  async iterate(spec: string, modification: string, existing: ArtifactMap): Promise<IterationReport> {
    const startedAt = this.now();
    await this.started('iterate', spec);

    const result = await iterateArtifacts(spec, modification, existing, this.deps);
    await this.emit({
      type: 'IterationApplied',
      payload: { changed: result.changed, added: result.added, totalFiles: result.files.size },
    });

    const metrics = withElapsed(
      addUsage(emptyMetrics(), result.usage, this.options.pricing),
      startedAt,
      this.now(),
    );
    const touched = result.changed.length + result.added.length;
    await this.emit({
      type: 'SessionFinished',
      payload: {
        requested: touched,
        produced: touched,
        unresolved: [],
        totalTokens: metrics.totalTokens,
        costUsd: metrics.costUsd,
        elapsedMs: metrics.elapsedMs,
      },
    });

    return {
      runId: this.runId,
      mode: 'iterate',
      files: result.files,
      changed: result.changed,
      added: result.added,
      deletionSupported: result.deletionSupported,
      metrics,
    };
  }

  private async emit(init: EventInit): Promise<void> {
    await this.events.emit(createEvent(this.runId, init));
  }

  private async started(mode: SessionMode | 'iterate', spec: string): Promise<void> {
    await this.emit({
      type: 'SessionStarted',
      payload: { mode, specChars: spec.length, specTokenEstimate: Math.ceil(spec.length / 4) },
    });
  }

  private async manifestFailed(error: ManifestDecodeError): Promise<void> {
    if (error.usage) {
      this.logger.debug(
        `Manifest request used ${error.usage.inputTokens + error.usage.outputTokens} tokens`,
      );
    }
    if (this.options.artifacts) {
      await atomicWrite(this.options.artifacts.manifestRaw, error.rawResponse);
    }
    await this.emit({
      type: 'ManifestFailed',
      payload: { error: error.message, preview: error.rawResponse.slice(0, PREVIEW_CHARS) },
    });
  }

  private async finished(report: SessionReport): Promise<void> {
    await this.emit({
      type: 'SessionFinished',
      payload: {
        requested: report.requested,
        produced: report.produced,
        unresolved: report.unresolved,
        totalTokens: report.metrics.totalTokens,
        costUsd: report.metrics.costUsd,
        elapsedMs: report.metrics.elapsedMs,
      },
    });
  }
}
