/**
 * Schema validation for the environment-style settings
 * Uses Zod for runtime type checking and validation
 */

import { z } from 'zod';
import {
  DEFAULT_DISPLAY_NAME,
  DEFAULT_MAX_WAIT_SECONDS,
  DEFAULT_MODEL_FILE,
  DEFAULT_MODELS_DIR,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_PROJECT_NAME,
  DEFAULT_REQUESTER_DOMAIN,
  DEFAULT_SECRETS_DIR,
} from '../constants';

/**
 * Kubernetes object names: lowercase alphanumeric with hyphens
 */
const RESOURCE_NAME_REGEX = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

const ResourceNameSchema = z.string().max(63).regex(
  RESOURCE_NAME_REGEX,
  'Use lowercase letters, numbers, and hyphens only (e.g., "my-project")'
);

/**
 * Shell-style boolean: only the literal strings "true" and "false"
 */
const FlagSchema = (defaultValue: boolean) =>
  z.enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true'));

const SecondsSchema = (defaultValue: number) =>
  z.coerce.number().int().positive().optional().default(defaultValue);

const PodSecurityLevelSchema = z.enum(['privileged', 'baseline', 'restricted']);

/**
 * Raw environment variables, as read from process.env and .env.servingctl
 */
export const ServingEnvSchema = z.object({
  PROJECT_NAME: ResourceNameSchema.optional().default(DEFAULT_PROJECT_NAME).describe(
    'Name of the project (namespace) to manage'
  ),
  DISPLAY_NAME: z.string().min(1).optional().default(DEFAULT_DISPLAY_NAME).describe(
    'Human-readable project name'
  ),
  REQUESTER: z.string().min(1).optional().describe(
    'Value of the openshift.io/requester annotation (default: $USER@' + DEFAULT_REQUESTER_DOMAIN + ')'
  ),
  USER: z.string().optional(),
  OC_PROJECT: ResourceNameSchema.optional().describe(
    'Project that secrets and models are applied to (default: PROJECT_NAME)'
  ),
  MODELMESH_ENABLED: FlagSchema(false),
  ODH_DASHBOARD_ENABLED: FlagSchema(true),
  POD_SECURITY_AUDIT: PodSecurityLevelSchema.optional().default('baseline'),
  POD_SECURITY_AUDIT_VERSION: z.string().min(1).optional().default('latest'),
  POD_SECURITY_WARN: PodSecurityLevelSchema.optional().default('baseline'),
  POD_SECURITY_WARN_VERSION: z.string().min(1).optional().default('latest'),
  MAX_WAIT_TIME: SecondsSchema(DEFAULT_MAX_WAIT_SECONDS).describe(
    'Seconds to wait for project deletion to converge'
  ),
  POLL_INTERVAL: SecondsSchema(DEFAULT_POLL_INTERVAL_SECONDS).describe(
    'Seconds between deletion checks'
  ),
  SECRETS_DIR: z.string().min(1).optional().default(DEFAULT_SECRETS_DIR),
  MODELS_DIR: z.string().min(1).optional().default(DEFAULT_MODELS_DIR),
  MODEL_FILE: z.string().min(1).optional().default(DEFAULT_MODEL_FILE),
  APPLY_SECRETS: FlagSchema(true),
  ALL_NAMESPACES: FlagSchema(true),
  VERBOSE: FlagSchema(false),
  DRY_RUN: FlagSchema(false),
  OC_BIN: z.string().min(1).optional().default('oc').describe(
    'Cluster CLI executable'
  ),
});

/**
 * Resolved configuration passed to services
 */
export const ServingConfigSchema = ServingEnvSchema.transform((env) => ({
  projectName: env.PROJECT_NAME,
  displayName: env.DISPLAY_NAME,
  requester: env.REQUESTER ?? `${env.USER ?? 'unknown'}@${DEFAULT_REQUESTER_DOMAIN}`,
  targetProject: env.OC_PROJECT ?? env.PROJECT_NAME,
  labels: {
    modelmeshEnabled: env.MODELMESH_ENABLED,
    dashboardEnabled: env.ODH_DASHBOARD_ENABLED,
    podSecurityAudit: env.POD_SECURITY_AUDIT,
    podSecurityAuditVersion: env.POD_SECURITY_AUDIT_VERSION,
    podSecurityWarn: env.POD_SECURITY_WARN,
    podSecurityWarnVersion: env.POD_SECURITY_WARN_VERSION,
  },
  deletion: {
    maxWaitSeconds: env.MAX_WAIT_TIME,
    pollIntervalSeconds: env.POLL_INTERVAL,
  },
  secretsDir: env.SECRETS_DIR,
  modelsDir: env.MODELS_DIR,
  modelFile: env.MODEL_FILE,
  applySecrets: env.APPLY_SECRETS,
  allNamespaces: env.ALL_NAMESPACES,
  verbose: env.VERBOSE,
  dryRun: env.DRY_RUN,
  ocBinary: env.OC_BIN,
}));

export type ServingConfig = z.output<typeof ServingConfigSchema>;
export type ProjectLabelSettings = ServingConfig['labels'];
