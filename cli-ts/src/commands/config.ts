/**
 * Config command - Display and validate the resolved configuration
 */

import type { Command } from 'commander';
import { existsSync } from 'fs';
import { describeConfig, loadConfig } from '../utils/config';
import { printKeyValue, printSection, printSuccess, printWarning } from '../utils/output';
import { withErrorHandler } from '../utils/errors';
import { ENV_FILE_PATH } from '../constants';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Inspect configuration');

  config
    .command('show')
    .description('Print every setting with its resolved value')
    .option('--json', 'Output as JSON')
    .action(withErrorHandler(async (options: { json?: boolean }) => {
      const entries = describeConfig(loadConfig());

      if (options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      printSection('Configuration');
      for (const [key, value] of entries) {
        printKeyValue(key.padEnd(27), value === '' ? '(empty)' : value);
      }
    }));

  config
    .command('validate')
    .description(`Validate the environment and ${ENV_FILE_PATH}`)
    .action(withErrorHandler(async () => {
      if (!existsSync(ENV_FILE_PATH)) {
        printWarning(`${ENV_FILE_PATH} not found, using the environment and defaults only`);
      }
      loadConfig();
      printSuccess('Configuration is valid');
    }));
}
