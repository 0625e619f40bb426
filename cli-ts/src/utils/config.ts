/**
 * Configuration utilities
 * Resolves the ServingConfig from the environment and .env.servingctl
 */

import { loadEnvFile, mergeEnvironment } from './env';
import { ConfigError } from './errors';
import { formatValidationErrors, validateServingEnv } from '../schemas';
import { ENV_FILE_PATH } from '../constants';
import type { ServingConfig } from '../types';

export interface LoadConfigOptions {
  /** Environment to read (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory holding .env.servingctl (defaults to the working directory) */
  dir?: string;
  /** Values that take precedence over both the file and the environment */
  overrides?: Record<string, string>;
}

/**
 * Load and validate the configuration.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(options: LoadConfigOptions = {}): ServingConfig {
  const merged = {
    ...mergeEnvironment(loadEnvFile(options.dir), options.env ?? process.env),
    ...options.overrides,
  };

  const result = validateServingEnv(merged);
  if (!result.success) {
    throw new ConfigError(
      formatValidationErrors(result.error, 'environment'),
      `Fix the variables above in your shell or in ${ENV_FILE_PATH}`
    );
  }

  return result.data;
}

/**
 * Flatten a config into VARIABLE=value pairs, as `config show` prints them
 */
export function describeConfig(config: ServingConfig): Array<[string, string]> {
  return [
    ['PROJECT_NAME', config.projectName],
    ['DISPLAY_NAME', config.displayName],
    ['REQUESTER', config.requester],
    ['OC_PROJECT', config.targetProject],
    ['MODELMESH_ENABLED', String(config.labels.modelmeshEnabled)],
    ['ODH_DASHBOARD_ENABLED', String(config.labels.dashboardEnabled)],
    ['POD_SECURITY_AUDIT', config.labels.podSecurityAudit],
    ['POD_SECURITY_AUDIT_VERSION', config.labels.podSecurityAuditVersion],
    ['POD_SECURITY_WARN', config.labels.podSecurityWarn],
    ['POD_SECURITY_WARN_VERSION', config.labels.podSecurityWarnVersion],
    ['MAX_WAIT_TIME', String(config.deletion.maxWaitSeconds)],
    ['POLL_INTERVAL', String(config.deletion.pollIntervalSeconds)],
    ['SECRETS_DIR', config.secretsDir],
    ['MODELS_DIR', config.modelsDir],
    ['MODEL_FILE', config.modelFile],
    ['APPLY_SECRETS', String(config.applySecrets)],
    ['ALL_NAMESPACES', String(config.allNamespaces)],
    ['VERBOSE', String(config.verbose)],
    ['DRY_RUN', String(config.dryRun)],
    ['OC_BIN', config.ocBinary],
  ];
}
