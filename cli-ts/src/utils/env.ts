/**
 * Environment utilities
 * Functions for loading and parsing environment files
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ENV_FILE_PATH } from '../constants';

/**
 * Parse KEY=value lines. Comments, blank lines and an optional `export`
 * keyword are skipped; one level of matching quotes is removed.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const vars: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim().replace(/^export\s+/, '');
    if (trimmed.startsWith('#') || !trimmed) continue;

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex > 0) {
      const key = trimmed.substring(0, eqIndex).trim();
      let value = trimmed.substring(eqIndex + 1).trim();
      const quote = value[0];
      if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
        value = value.slice(1, -1);
      }
      vars[key] = value;
    }
  }

  return vars;
}

/**
 * Load all variables from .env.servingctl in the given directory
 */
export function loadEnvFile(dir: string = process.cwd()): Record<string, string> {
  const envFile = join(dir, ENV_FILE_PATH);

  if (!existsSync(envFile)) {
    return {};
  }

  return parseEnvFile(readFileSync(envFile, 'utf-8'));
}

/**
 * Merge the env file under the real environment: exported variables win
 */
export function mergeEnvironment(
  fileVars: Record<string, string>,
  env: NodeJS.ProcessEnv
): Record<string, string> {
  const merged: Record<string, string> = { ...fileVars };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      merged[key] = value;
    }
  }
  return merged;
}
