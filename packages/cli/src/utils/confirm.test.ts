import { describe, it, expect, vi, beforeEach } from 'vitest';
import inquirer from 'inquirer';
import { MemoryLogger } from '@specforge/shared';
import { confirm } from './confirm';

vi.mock('inquirer', () => ({
  default: {
    prompt: vi.fn(),
  },
}));

describe('confirm', () => {
  let logger: MemoryLogger;
  const runId = 'test-run';

  beforeEach(() => {
    vi.clearAllMocks();
    logger = new MemoryLogger();
    Object.defineProperty(process.stdin, 'isTTY', { value: true, configurable: true });
  });

  it('approves without prompting when --yes is set', async () => {
    const result = await confirm('Run docker-compose', undefined, true, { yes: true, logger, runId });

    expect(result).toBe(true);
    expect(inquirer.prompt).not.toHaveBeenCalled();
    expect(logger.ofType('ConfirmationRequested')[0].payload).toEqual({
      action: 'Run docker-compose',
      details: undefined,
      defaultNo: true,
    });
    expect(logger.ofType('ConfirmationResolved')[0].payload).toEqual({
      approved: true,
      autoResolved: true,
    });
  });

  it('denies when non-interactive', async () => {
    const result = await confirm('Action', undefined, true, { nonInteractive: true, logger, runId });

    expect(result).toBe(false);
    expect(inquirer.prompt).not.toHaveBeenCalled();
    expect(logger.ofType('ConfirmationResolved')[0].payload).toEqual({
      approved: false,
      autoResolved: true,
    });
  });

  it('denies when stdin is not a TTY', async () => {
    Object.defineProperty(process.stdin, 'isTTY', { value: false, configurable: true });

    expect(await confirm('Action', undefined, true, { logger, runId })).toBe(false);
    expect(inquirer.prompt).not.toHaveBeenCalled();
  });

  it('returns the answer given at the prompt', async () => {
    vi.mocked(inquirer.prompt).mockResolvedValueOnce({ confirmed: true });

    const result = await confirm('Action', 'Details', true, { logger, runId });

    expect(result).toBe(true);
    expect(vi.mocked(inquirer.prompt).mock.calls[0][0]).toEqual([
      { type: 'confirm', name: 'confirmed', message: 'Action\nDetails', default: false },
    ]);
    expect(logger.ofType('ConfirmationResolved')[0].payload).toEqual({
      approved: true,
      autoResolved: false,
    });
  });

  it('works without a logger', async () => {
    vi.mocked(inquirer.prompt).mockResolvedValueOnce({ confirmed: false });

    expect(await confirm('Action')).toBe(false);
  });
});
