/**
 * Project create command - Create or reconcile the serving project
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { createProjectService } from '../../services';
import { indent, printBlank, printHeader, printInfo, printRaw, printSuccess, printWarning } from '../../utils/output';
import { unwrapOrThrow, withErrorHandler } from '../../utils/errors';
import { createContext, requireSession } from '../../utils/validation';

export function registerProjectCreateCommand(parent: Command): void {
  parent
    .command('create')
    .description('Create the project with its labels and annotations (idempotent)')
    .action(withErrorHandler(async () => {
      const { config, cluster } = createContext();

      printHeader(`Project setup - ${config.displayName}`);
      await requireSession(cluster);

      const service = createProjectService(cluster, config);
      const report = unwrapOrThrow(await service.setup({
        onStep: (message) => printInfo(message),
        onExisting: (name) => printWarning(`Project ${name} already exists. Ensuring configuration is up to date...`),
        onCreated: (name) => printSuccess(`Project ${name} created successfully`),
        onWarning: (error) => {
          printWarning(`${error.message}, continuing...`);
          if (error.output) {
            console.log(chalk.gray(indent(error.output)));
          }
        },
      }));

      if (report.labelsApplied) printSuccess('Labels applied successfully');
      if (report.annotationsApplied) printSuccess('Annotations applied successfully');

      printBlank();
      if (report.description !== undefined) {
        printInfo('Project details:');
        printRaw(report.description.trimEnd());
        printBlank();
        printSuccess(`Setup complete! Project '${config.displayName}' is ready to use.`);
      } else {
        printSuccess(`Setup operations completed for project '${config.displayName}'.`);
      }
    }));
}
