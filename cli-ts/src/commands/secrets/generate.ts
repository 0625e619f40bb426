/**
 * Secrets generate command - Write (and apply) a secret per model URI
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { createSecretService, loadDefaultCatalog, loadUriList } from '../../services';
import { indent, printBlank, printError, printInfo, printSuccess, printWarning } from '../../utils/output';
import { CLIError, ClusterError, ErrorCode, unwrapOrThrow, withErrorHandler } from '../../utils/errors';
import { createContext } from '../../utils/validation';

interface GenerateOptions {
  uri?: string[];
  file?: string;
  dir?: string;
  project?: string;
  apply: boolean;
}

export function registerSecretsGenerateCommand(parent: Command): void {
  parent
    .command('generate')
    .alias('gen')
    .description('Generate connection secret manifests from OCI model URIs')
    .option('-u, --uri <uri...>', 'Model URI(s) to process (default: bundled catalogue)')
    .option('-f, --file <path>', 'YAML file listing model URIs')
    .option('-d, --dir <path>', 'Output directory (env: SECRETS_DIR)')
    .option('-p, --project <name>', 'Project to apply secrets to (env: OC_PROJECT)')
    .option('--no-apply', 'Only write the manifests (env: APPLY_SECRETS=false)')
    .action(withErrorHandler(async (options: GenerateOptions) => {
      const { config, cluster } = createContext();
      const namespace = options.project ?? config.targetProject;
      const secretsDir = options.dir ?? config.secretsDir;

      const uris = options.uri
        ?? unwrapOrThrow(options.file ? loadUriList(options.file) : loadDefaultCatalog());

      printInfo('Starting secret generation...');

      let apply = config.applySecrets && options.apply;
      if (apply) {
        if (cluster.isSessionUsable()) {
          printInfo(`Secrets will be applied to project: ${namespace}`);
        } else {
          printWarning(`${config.ocBinary} command not available or not logged in. Secrets will only be generated as YAML files.`);
          apply = false;
        }
      }

      const service = createSecretService(cluster, { secretsDir, namespace, apply });
      const summary = await service.generate(uris, {
        onStart: (uri) => {
          printBlank();
          printInfo(`Processing URI: ${uri}`);
        },
        onWritten: (_secret, file) => printSuccess(`Secret YAML generated: ${file}`),
        onApplied: (secret) => printSuccess(`Secret ${secret.name} applied successfully to project ${namespace}`),
        onFailed: (uri, error) => {
          printError(error.message);
          if (error instanceof ClusterError && error.output) {
            console.log(chalk.gray(indent(error.output)));
          } else {
            console.log(chalk.gray(`  ${uri}`));
          }
        },
      });

      const applied = summary.generated.filter(item => item.applied).length;

      printBlank();
      printSuccess('Secret generation complete!');
      printInfo(`Generated ${summary.generated.length} secret(s) in ${secretsDir}`);
      if (apply) {
        printInfo(`Applied ${applied} secret(s) to project ${namespace}`);
      }

      if (summary.failures.length > 0) {
        throw new CLIError(
          `${summary.failures.length} of ${uris.length} URI(s) could not be processed`,
          ErrorCode.COMMAND_FAILED,
          'See the errors above'
        );
      }
    }));
}
