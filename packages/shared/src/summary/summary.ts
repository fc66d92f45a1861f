import path from 'node:path';
import { atomicWrite } from '../fs/io';
import { redactForLogs } from '../redaction';

export const SESSION_SUMMARY_SCHEMA_VERSION = 1;

export type SessionMode = 'staged' | 'single-pass' | 'iterate';

export interface SessionSummary {
  schemaVersion: typeof SESSION_SUMMARY_SCHEMA_VERSION;
  runId: string;
  mode: SessionMode;
  provider: string;
  model?: string;
  outputDir?: string;
  startedAt: string; // ISO 8601
  finishedAt: string; // ISO 8601
  status: 'success' | 'failure';
  error?: string;
  files: {
    requested: number;
    produced: number;
    unresolved: string[];
  };
  metrics: {
    requests: number;
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
    costUsd: number;
    elapsedMs: number;
  };
  artifacts: {
    tracePath: string;
    effectiveConfigPath?: string;
    manifestRawPath?: string;
  };
}

export class SummaryWriter {
  static async write(summary: SessionSummary, runDir: string): Promise<string> {
    const summaryPath = path.join(runDir, 'summary.json');
    const summaryJson = JSON.stringify(redactForLogs(summary), null, 2);
    await atomicWrite(summaryPath, summaryJson);
    return summaryPath;
  }
}
