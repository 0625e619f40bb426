/**
 * Project delete command - Delete the project and wait for it to disappear
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import {
  createDeletionWaiter,
  type DeletionEvent,
  type DeletionListener,
  type DeletionOutcome,
} from '../../services';
import type { Result } from '../../types';
import { formatDuration, printDim, printInfo, printSuccess, printWarning } from '../../utils/output';
import { CLIError, DeletionError, ErrorCode, unwrapOrThrow, withErrorHandler } from '../../utils/errors';
import { createContext, parsePositiveInt, requireSession } from '../../utils/validation';

interface DeleteOptions {
  maxWait?: number;
  pollInterval?: number;
  yes?: boolean;
}

function waitingText(event: DeletionEvent): string {
  return `Waiting for project ${event.identifier} to be deleted... (${event.elapsedSeconds}/${event.maxWaitSeconds} seconds elapsed)`;
}

/**
 * The parts of an ora spinner the listener drives
 */
export interface DeletionSpinner {
  text: string;
  readonly isEnabled: boolean;
  clear(): void;
  render(): void;
}

/**
 * Render waiter events: the spinner text follows each check, and progress
 * lines persist above it. Without a terminal the spinner prints nothing, so
 * every check gets its own line.
 */
export function createDeletionListener(spinner: DeletionSpinner): DeletionListener {
  return (event) => {
    if (event.type === 'check') {
      spinner.text = waitingText(event);
      if (!spinner.isEnabled) {
        printDim(waitingText(event));
      }
      return;
    }
    spinner.clear();
    printInfo(`Still waiting... (${event.elapsedSeconds}/${event.maxWaitSeconds} seconds elapsed)`);
    spinner.render();
  };
}

/**
 * The error a deletion run ends the command with, or undefined when it
 * exits cleanly (deleted, or nothing to delete)
 */
export function deletionFailure(
  result: Result<DeletionOutcome, CLIError>,
  project: string,
  ocBinary: string
): CLIError | undefined {
  if (!result.success) {
    return result.error;
  }
  if (result.data.status !== 'timed_out') {
    return undefined;
  }
  return new DeletionError(
    'The project may still be in the process of deletion.',
    ErrorCode.DELETION_TIMED_OUT,
    `Check the status manually with: ${ocBinary} get project ${project}`
  );
}

export function registerProjectDeleteCommand(parent: Command): void {
  parent
    .command('delete [name]')
    .alias('rm')
    .description('Delete the project and wait until it is fully removed')
    .option('--max-wait <seconds>', 'Maximum time to wait for deletion (env: MAX_WAIT_TIME)', parsePositiveInt)
    .option('--poll-interval <seconds>', 'Time between deletion checks (env: POLL_INTERVAL)', parsePositiveInt)
    .option('-y, --yes', 'Skip confirmation prompt')
    .action(withErrorHandler(async (name: string | undefined, options: DeleteOptions) => {
      const { config, cluster } = createContext();
      const project = name ?? config.projectName;
      const maxWaitSeconds = options.maxWait ?? config.deletion.maxWaitSeconds;
      const pollIntervalSeconds = options.pollInterval ?? config.deletion.pollIntervalSeconds;

      await requireSession(cluster, { requireReachable: true });

      const presence = unwrapOrThrow(await cluster.getProject(project));
      if (presence === 'absent') {
        printWarning(`Project ${project} does not exist. Nothing to delete.`);
        return;
      }

      if (!options.yes && !cluster.isDryRun) {
        const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
          {
            type: 'confirm',
            name: 'confirm',
            message: `Delete project ${project} and everything in it?`,
            default: false,
          },
        ]);

        if (!confirm) {
          printInfo('Cancelled');
          return;
        }
      }

      const spinner = ora();
      const waiter = createDeletionWaiter(cluster.projects(), {
        config: { maxWaitSeconds, pollIntervalSeconds },
        onEvent: createDeletionListener(spinner),
      });

      printInfo(`Deleting OpenShift project: ${project} (${config.displayName})`);
      const request = unwrapOrThrow(await waiter.requestDeletion(project));
      if (request.status === 'nothing_to_delete') {
        printWarning(`Project ${project} was already gone. Nothing to delete.`);
        return;
      }
      printSuccess(`Project deletion initiated for ${project}`);

      if (cluster.isDryRun) {
        printInfo('Dry run: not waiting for deletion');
        return;
      }

      printInfo(`This may take a few minutes. Maximum wait time: ${maxWaitSeconds} seconds`);
      spinner.start(`Waiting for project ${project} to be deleted...`);

      const outcome = await waiter.awaitAbsence(project);
      if (!outcome.success) {
        spinner.fail('Deletion status could not be checked');
      } else if (outcome.data.status === 'deleted') {
        spinner.succeed(`Project ${project} has been fully deleted!`);
        console.log(chalk.gray(`  Took about ${formatDuration(outcome.data.elapsedSeconds)}`));
      } else {
        spinner.warn(`Project ${project} still exists after ${maxWaitSeconds} seconds.`);
      }

      const failure = deletionFailure(outcome, project, config.ocBinary);
      if (failure) {
        throw failure;
      }
    }));
}
