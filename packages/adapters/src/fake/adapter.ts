import type {
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderConfig,
} from '@specforge/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';

/** A scripted reply: text, a full response, or an error to throw */
export type FakeReply = string | ModelResponse | Error;

export interface FakeAdapterOptions {
  /** Replies returned in order before falling back to the canned system */
  replies?: FakeReply[];
}

const DEMO_MANIFEST = [
  'docker-compose.yml',
  'publisher/Dockerfile',
  'publisher/publisher.py',
  'consumer/Dockerfile',
  'consumer/consumer.py',
  'monitor/monitor.py',
  'requirements.txt',
  'scripts/start.sh',
];

function demoContent(path: string): string {
  if (path.endsWith('.sh')) return `#!/bin/sh\necho "running ${path}"`;
  if (path.endsWith('.py')) return `print("${path}")`;
  if (path.endsWith('.yml') || path.endsWith('.yaml')) return `# ${path}\nservices: {}`;
  if (path.endsWith('Dockerfile')) return 'FROM python:3.12-slim\nCOPY . /app';
  return `# ${path}`;
}

function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Offline provider. Answers each pipeline phase with a small canned system, or
 * plays back scripted replies. Every request is recorded.
 */
export class FakeAdapter implements ProviderAdapter {
  readonly requests: ModelRequest[] = [];
  private readonly replies: FakeReply[];

  constructor(
    private config: ProviderConfig = { type: 'fake', model: 'fake-model' },
    private readonly providerId = 'fake',
    options: FakeAdapterOptions = {},
  ) {
    this.replies = [...(options.replies ?? [])];
  }

  id(): string {
    return this.providerId;
  }

  model(): string {
    return this.config.model;
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      latencyClass: 'fast',
      requiresNetwork: false,
    };
  }

  async generate(request: ModelRequest, _ctx: AdapterContext): Promise<ModelResponse> {
    this.requests.push(request);
    const prompt = request.messages.map((m) => m.content).join('\n');

    const scripted = this.replies.shift();
    if (scripted instanceof Error) {
      throw scripted;
    }
    if (typeof scripted === 'object') {
      return scripted;
    }

    const text = scripted ?? this.cannedReply(request);
    return {
      text,
      usage: {
        inputTokens: estimateTokens(prompt),
        outputTokens: estimateTokens(text),
        totalTokens: estimateTokens(prompt) + estimateTokens(text),
      },
    };
  }

  private cannedReply(request: ModelRequest): string {
    const paths = request.metadata?.paths ?? [];
    switch (request.metadata?.purpose) {
      case 'manifest':
        return '```json\n' + JSON.stringify(DEMO_MANIFEST, null, 2) + '\n```';
      case 'batch':
        return JSON.stringify(Object.fromEntries(paths.map((p) => [p, demoContent(p)])));
      case 'gap-fill':
        return paths.length > 0 ? demoContent(paths[0]) : '';
      case 'single-pass':
        return DEMO_MANIFEST.map((p) => '```filename: ' + p + '\n' + demoContent(p) + '\n```').join(
          '\n\n',
        );
      case 'iterate':
        return (
          '```filename: CHANGES.md\n# Changes\n\n' +
          (request.metadata?.modification ?? '') +
          '\n```'
        );
      default:
        return '';
    }
  }
}
