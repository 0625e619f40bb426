/**
 * Secrets commands - Connection secrets for model URIs
 */

import type { Command } from 'commander';
import { registerSecretsGenerateCommand } from './generate';

export function registerSecretsCommands(program: Command): void {
  const secrets = program
    .command('secrets')
    .description('Manage model connection secrets');

  registerSecretsGenerateCommand(secrets);
}
