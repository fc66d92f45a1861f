import pc from 'picocolors';

export interface OutputMetrics {
  requests: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd: number;
  elapsedMs: number;
}

export interface OutputResult {
  status: 'SUCCESS' | 'FAILURE';
  mode: 'staged' | 'single-pass' | 'iterate';
  runId?: string;
  provider?: string;
  model?: string;
  outputDir?: string;
  artifactsDir?: string;
  files?: {
    requested: number;
    produced: number;
    unresolved: string[];
  };
  /** Iteration only */
  changed?: string[];
  added?: string[];
  written?: string[];
  executable?: string[];
  metrics?: OutputMetrics;
  notices?: string[];
  error?: string;
  /** Where the unparsed manifest reply was kept */
  manifestRawPath?: string;
  nextSteps?: string[];
}

const LIST_LIMIT = 10;

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(data: OutputResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
    } else if (data.status === 'SUCCESS') {
      this.renderSuccess(data);
    } else {
      this.renderFailure(data);
    }
  }

  private renderSuccess(data: OutputResult): void {
    const headline = data.mode === 'iterate' ? 'Modification applied.' : 'Generation complete.';
    console.log(`\n${pc.green(`✅ ${headline}`)}`);

    if (data.files) {
      const { requested, produced, unresolved } = data.files;
      console.log(pc.bold('\nFiles:'));
      console.log(`  ${produced}/${requested} produced`);
      if (unresolved.length > 0) {
        console.log(pc.yellow(`  ${unresolved.length} unresolved:`));
        this.renderList(unresolved);
      }
    }

    if (data.changed && data.changed.length > 0) {
      console.log(pc.bold('\nChanged files:'));
      this.renderList(data.changed);
    }
    if (data.added && data.added.length > 0) {
      console.log(pc.bold('\nNew files:'));
      this.renderList(data.added);
    }

    this.renderCost(data);
    this.renderNotices(data);

    console.log(pc.bold('\nArtifacts:'));
    if (data.outputDir) console.log(`  Output: ${data.outputDir}`);
    if (data.runId) console.log(`  Run ID: ${data.runId}`);
    if (data.artifactsDir) {
      console.log(`  Trace: ${data.artifactsDir}/trace.jsonl`);
      console.log(`  Summary: ${data.artifactsDir}/summary.json`);
    }

    this.renderNextSteps(data);
  }

  private renderFailure(data: OutputResult): void {
    const headline = data.mode === 'iterate' ? 'Modification failed.' : 'Generation failed.';
    console.log(`\n${pc.red(`❌ ${headline}`)}`);

    if (data.error) {
      console.log(`  ${pc.bold('Reason:')} ${data.error}`);
    }

    this.renderCost(data);

    if (data.artifactsDir || data.manifestRawPath) {
      console.log(pc.bold('\nDiagnostics:'));
      if (data.manifestRawPath) console.log(`  - Manifest reply: ${data.manifestRawPath}`);
      if (data.artifactsDir) console.log(`  - Trace: ${data.artifactsDir}/trace.jsonl`);
    }

    this.renderNextSteps(data);
  }

  private renderList(items: string[]): void {
    items.slice(0, LIST_LIMIT).forEach((item) => console.log(`  - ${item}`));
    if (items.length > LIST_LIMIT) {
      console.log(`  ... and ${items.length - LIST_LIMIT} more.`);
    }
  }

  private renderCost(data: OutputResult): void {
    if (!data.metrics) return;
    const { totalTokens, inputTokens, outputTokens, costUsd, elapsedMs, requests } = data.metrics;
    console.log(pc.bold('\nCost & Time:'));
    console.log(
      `  - Total: ${totalTokens} tokens (in ${inputTokens}, out ${outputTokens}) ($${costUsd.toFixed(4)})`,
    );
    console.log(`  - Requests: ${requests}`);
    console.log(`  - Elapsed: ${(elapsedMs / 1000).toFixed(1)}s`);
  }

  private renderNotices(data: OutputResult): void {
    for (const notice of data.notices ?? []) {
      console.log(pc.yellow(`\n⚠ ${notice}`));
    }
  }

  private renderNextSteps(data: OutputResult): void {
    if (data.nextSteps && data.nextSteps.length > 0) {
      console.log(pc.bold('\nNext steps:'));
      data.nextSteps.forEach((step) => console.log(`  - ${step}`));
    }
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
