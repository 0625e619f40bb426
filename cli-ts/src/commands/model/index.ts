/**
 * Model commands - Deploy inference services
 */

import type { Command } from 'commander';
import { registerModelDeployCommand } from './deploy';

export function registerModelCommands(program: Command): void {
  const model = program
    .command('model')
    .description('Deploy models to the serving project');

  registerModelDeployCommand(model);
}
