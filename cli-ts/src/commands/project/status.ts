/**
 * Project status command - Show whether the project exists
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { printInfo, printSuccess, printWarning } from '../../utils/output';
import { unwrapOrThrow, withErrorHandler } from '../../utils/errors';
import { createContext, requireSession } from '../../utils/validation';

export function registerProjectStatusCommand(parent: Command): void {
  parent
    .command('status [name]')
    .description('Show whether the project exists (defaults to PROJECT_NAME)')
    .action(withErrorHandler(async (name: string | undefined) => {
      const { config, cluster } = createContext();
      const project = name ?? config.projectName;

      const user = await requireSession(cluster);
      printInfo(`Logged in as ${user}`);

      const presence = unwrapOrThrow(await cluster.getProject(project));
      if (presence === 'absent') {
        printWarning(`Project ${project} does not exist`);
        console.log(chalk.gray('  Create it with: servingctl project create'));
        return;
      }

      printSuccess(`Project ${project} exists`);
      const current = await cluster.currentProject();
      if (current.success) {
        console.log(chalk.gray(`  Current project: ${current.data}`));
      }
    }));
}
