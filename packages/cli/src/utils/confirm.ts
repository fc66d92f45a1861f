import inquirer from 'inquirer';
import { createEvent, type Logger } from '@specforge/shared';

export interface ConfirmOptions {
  yes?: boolean;
  nonInteractive?: boolean;
  logger?: Pick<Logger, 'log'>;
  runId?: string;
}

/**
 * Asks the operator to approve an action. `--yes` approves without asking;
 * `--non-interactive` or a missing TTY denies.
 *
 * @param defaultNo - Whether the default answer is 'No'
 */
export async function confirm(
  action: string,
  details?: string,
  defaultNo: boolean = true,
  options: ConfirmOptions = {},
): Promise<boolean> {
  const { logger, runId } = options;
  const record = async (approved: boolean, autoResolved: boolean) => {
    if (logger && runId) {
      await logger.log(
        createEvent(runId, { type: 'ConfirmationResolved', payload: { approved, autoResolved } }),
      );
    }
  };

  if (logger && runId) {
    await logger.log(
      createEvent(runId, { type: 'ConfirmationRequested', payload: { action, details, defaultNo } }),
    );
  }

  if (options.yes) {
    await record(true, true);
    return true;
  }

  if (options.nonInteractive || !process.stdin.isTTY) {
    await record(false, true);
    return false;
  }

  const response = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message: details ? `${action}\n${details}` : action,
      default: !defaultNo,
    },
  ]);

  await record(response.confirmed, false);
  return response.confirmed;
}
