/**
 * Model deploy command - Apply a model manifest and its connection secret
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { isAbsolute, join } from 'path';
import {
  connectionSecretForManifest,
  createModelService,
  createSecretService,
  loadModelManifest,
} from '../../services';
import { printBlank, printInfo, printSuccess, printWarning } from '../../utils/output';
import { CLIError, ErrorCode, unwrapOrThrow, withErrorHandler } from '../../utils/errors';
import { createContext, requireSession } from '../../utils/validation';

interface DeployOptions {
  file?: string;
  project?: string;
}

export function registerModelDeployCommand(parent: Command): void {
  parent
    .command('deploy')
    .description('Deploy an LLMInferenceService manifest (idempotent)')
    .option('-f, --file <path>', 'Manifest file, relative to MODELS_DIR unless absolute (env: MODEL_FILE)')
    .option('-p, --project <name>', 'Target project (env: OC_PROJECT)')
    .action(withErrorHandler(async (options: DeployOptions) => {
      const { config, cluster } = createContext();
      const project = options.project ?? config.targetProject;
      const file = options.file ?? config.modelFile;
      const manifestPath = isAbsolute(file) ? file : join(config.modelsDir, file);

      await requireSession(cluster);

      printInfo('Starting model deployment...');
      printInfo(`Project: ${project}`);

      const presence = unwrapOrThrow(await cluster.getProject(project));
      if (presence === 'absent') {
        throw new CLIError(
          `Project ${project} does not exist. Please create it first.`,
          ErrorCode.PROJECT_NOT_FOUND,
          'Run: servingctl project create'
        );
      }

      const switched = await cluster.switchProject(project);
      if (!switched.success) {
        printWarning(`${switched.error.message}, continuing with -n ${project}`);
      }

      const manifest = unwrapOrThrow(loadModelManifest(manifestPath));
      const connection = connectionSecretForManifest(manifest);
      if (connection) {
        printInfo(`Checking if secret ${connection.name} exists...`);
      } else {
        printWarning('No connection secret specified in model file. Skipping secret creation.');
      }

      const secrets = createSecretService(cluster, {
        secretsDir: config.secretsDir,
        namespace: project,
        apply: true,
      });
      const service = createModelService(cluster, secrets, project);

      const spinner = ora(`Deploying LLMInferenceService: ${manifest.name}`).start();
      const result = await service.deploy(manifestPath, manifest);
      if (!result.success) {
        spinner.fail(`Failed to deploy model ${manifest.name}`);
        throw result.error;
      }

      spinner.succeed(`Model ${manifest.name} deployed successfully`);
      if (result.data.secret) {
        const { name, created } = result.data.secret;
        if (created) {
          printSuccess(`Secret ${name} created successfully`);
        } else {
          printWarning(`Secret ${name} already exists. Skipping creation.`);
        }
      }
      if (result.data.output) {
        console.log(chalk.gray(`  ${result.data.output}`));
      }

      printBlank();
      printSuccess('Model deployment complete!');
      printInfo(`Check status with: ${config.ocBinary} get llminferenceservice -n ${project}`);
      printInfo(`Check pods with: ${config.ocBinary} get pods -n ${project} | grep ${manifest.name}`);
    }));
}
