import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { SESSION_SUMMARY_SCHEMA_VERSION, SessionSummary, SummaryWriter } from './summary'
import { tmpdir } from 'os'
import { join } from 'path'
import { remove, readJson, ensureDir } from 'fs-extra'

describe('SummaryWriter', () => {
  const TEST_RUN_DIR = join(tmpdir(), 'specforge-summary-test', `${Date.now()}`)

  beforeEach(async () => {
    await ensureDir(TEST_RUN_DIR)
  })

  afterEach(async () => {
    await remove(TEST_RUN_DIR)
  })

  const summary: SessionSummary = {
    schemaVersion: SESSION_SUMMARY_SCHEMA_VERSION,
    runId: '20260101-000000-abc123',
    mode: 'staged',
    provider: 'fake',
    model: 'fake-model',
    outputDir: './generated-system',
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:05.000Z',
    status: 'success',
    files: { requested: 3, produced: 2, unresolved: ['monitor/app.py'] },
    metrics: {
      requests: 4,
      inputTokens: 1000,
      outputTokens: 2000,
      totalTokens: 3000,
      costUsd: 0.033,
      elapsedMs: 5000,
    },
    artifacts: { tracePath: '/tmp/run/trace.jsonl' },
  }

  it('writes summary.json into the run directory', async () => {
    const summaryPath = await SummaryWriter.write(summary, TEST_RUN_DIR)

    expect(summaryPath).toBe(join(TEST_RUN_DIR, 'summary.json'))
    expect(await readJson(summaryPath)).toEqual(summary)
  })

  it('masks secrets that leak into the error text', async () => {
    const failed: SessionSummary = {
      ...summary,
      status: 'failure',
      error: 'API_KEY=test-secret rejected',
    }
    const summaryPath = await SummaryWriter.write(failed, TEST_RUN_DIR)
    const onDisk = await readJson(summaryPath)
    expect(onDisk.error).toBe('[REDACTED] rejected')
  })
})
