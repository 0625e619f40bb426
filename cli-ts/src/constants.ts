/**
 * Application-wide constants
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

// Read version from root package.json (single source of truth)
const rootPackageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')));

export const SERVINGCTL_VERSION = rootPackageJson.version;

/**
 * Default values
 */
export const DEFAULT_PROJECT_NAME = 'demo-rh-ai-3-0';
export const DEFAULT_DISPLAY_NAME = 'Demo RH AI 3.0';
export const DEFAULT_REQUESTER_DOMAIN = 'redhat.com';
export const DEFAULT_MAX_WAIT_SECONDS = 300;
export const DEFAULT_POLL_INTERVAL_SECONDS = 5;

/**
 * File paths (relative to the working directory)
 */
export const ENV_FILE_PATH = '.env.servingctl';
export const DEFAULT_SECRETS_DIR = 'secrets';
export const DEFAULT_MODELS_DIR = 'models';
export const DEFAULT_MODEL_FILE = 'llmd.yaml';

/**
 * Model catalogue shipped with the CLI
 */
export const MODEL_CATALOG_URL = new URL('../data/model-uris.yml', import.meta.url);

/**
 * Labels, annotations and resource keys understood by the serving platform
 */
export const GPU_RESOURCE = 'nvidia.com/gpu';
export const DASHBOARD_LABEL = 'opendatahub.io/dashboard';
export const CONNECTIONS_ANNOTATION = 'opendatahub.io/connections';
export const MODELCAR_PREFIX = 'modelcar-';
