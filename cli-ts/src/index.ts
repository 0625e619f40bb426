#!/usr/bin/env tsx

/**
 * servingctl - Main entry point
 * Provision and tear down an OpenShift project for model serving
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { SERVINGCTL_VERSION } from './constants';

// Commands
import { registerProjectCommands } from './commands/project';
import { registerSecretsCommands } from './commands/secrets';
import { registerModelCommands } from './commands/model';
import { registerGpuCommands } from './commands/gpu';
import { registerConfigCommand } from './commands/config';

const program = new Command();

program
  .name('servingctl')
  .description('Provision and tear down an OpenShift project for model serving')
  .version(SERVINGCTL_VERSION, '-v, --version', 'Show version information')
  .option('--dry-run', 'Print mutating oc commands instead of running them (env: DRY_RUN)')
  .option('--verbose', 'Echo every oc command before running it (env: VERBOSE)')
  .option('--no-color', 'Disable colored output');

// Global flags are read through the environment, like the rest of the configuration
program.hook('preAction', (thisCommand) => {
  const options = thisCommand.opts<{ dryRun?: boolean; verbose?: boolean }>();
  if (options.dryRun) process.env.DRY_RUN = 'true';
  if (options.verbose) process.env.VERBOSE = 'true';
});

// Register all commands
registerProjectCommands(program);
registerSecretsCommands(program);
registerModelCommands(program);
registerGpuCommands(program);
registerConfigCommand(program);

// Default action (no command) - show quick start
program.action(async () => {
  console.log(chalk.green('========================================================'));
  console.log(chalk.green(`   servingctl v${SERVINGCTL_VERSION}`));
  console.log(chalk.green('========================================================'));
  console.log('');
  console.log(chalk.cyan('Run with --help to see available commands'));
  console.log('');
  console.log(chalk.yellow('Provisioning:'));
  console.log('  servingctl project create         Create and label the project');
  console.log('  servingctl secrets generate       Generate connection secrets');
  console.log('  servingctl model deploy           Deploy the model manifest');
  console.log('');
  console.log(chalk.yellow('Inspection:'));
  console.log('  servingctl project status         Check the project exists');
  console.log('  servingctl gpu pods               List pods using GPUs');
  console.log('  servingctl config show            Show resolved configuration');
  console.log('');
  console.log(chalk.yellow('Teardown:'));
  console.log('  servingctl project delete         Delete and wait for removal');
});

// Error handling
program.showHelpAfterError('(add --help for additional information)');

// Parse arguments
await program.parseAsync(process.argv);
