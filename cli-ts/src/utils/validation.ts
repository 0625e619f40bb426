/**
 * Command Context Helpers
 *
 * Resolve the configuration and cluster session every command starts from,
 * throwing CLIError instead of exiting the process.
 */

import { InvalidArgumentError } from 'commander';
import { loadConfig } from './config';
import { unwrapOrThrow } from './errors';
import { createClusterService, type ClusterService, type SessionOptions } from '../services/cluster-service';
import type { ServingConfig } from '../types';

/**
 * Everything a command needs to talk to the cluster
 */
export interface CommandContext {
  config: ServingConfig;
  cluster: ClusterService;
}

/**
 * Load configuration and build the cluster service from it
 */
export function createContext(overrides?: Record<string, string>): CommandContext {
  const config = loadConfig({ overrides });
  const cluster = createClusterService({
    ocBinary: config.ocBinary,
    dryRun: config.dryRun,
    verbose: config.verbose,
  });
  return { config, cluster };
}

/**
 * Fail fast when the CLI is missing, logged out or (optionally) offline.
 * Returns the logged-in user.
 */
export async function requireSession(
  cluster: ClusterService,
  options: SessionOptions = {}
): Promise<string> {
  return unwrapOrThrow(await cluster.ensureSession(options));
}

/**
 * Parse a positive integer command option
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}
