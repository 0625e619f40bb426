/**
 * Project commands - Create, inspect and delete the serving project
 */

import type { Command } from 'commander';
import { registerProjectCreateCommand } from './create';
import { registerProjectDeleteCommand } from './delete';
import { registerProjectStatusCommand } from './status';

/**
 * Register all project commands under 'servingctl project <cmd>'
 */
export function registerProjectCommands(program: Command): void {
  const project = program
    .command('project')
    .description('Manage the model serving project');

  registerProjectCreateCommand(project);
  registerProjectStatusCommand(project);
  registerProjectDeleteCommand(project);
}
