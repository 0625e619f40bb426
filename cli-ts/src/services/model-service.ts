/**
 * Model Service
 *
 * Deploys an LLMInferenceService manifest, creating the connection secret it
 * references when the project does not have it yet.
 */

import { existsSync, readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import type { ClusterService } from './cluster-service';
import type { ConnectionSecret, SecretService } from './secret-service';
import { ok, err, type Result } from '../types';
import { CLIError, ErrorCode, ValidationError } from '../utils/errors';
import { describeUri } from '../utils/model-uri';
import { ModelManifestSchema, type ModelManifest } from '../schemas/manifest.schema';
import { transformZodErrors } from '../schemas/validation';

/**
 * Outcome of a deployment
 */
export interface DeployResult {
  model: string;
  /** Connection secret handling; absent when the manifest names none */
  secret?: { name: string; created: boolean };
  output: string;
}

/**
 * Read and validate a model manifest
 */
export function loadModelManifest(path: string): Result<ModelManifest, CLIError> {
  if (!existsSync(path)) {
    return err(new CLIError(`Model file not found: ${path}`, ErrorCode.CONFIG_NOT_FOUND,
      'Set MODELS_DIR and MODEL_FILE, or pass --file'));
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    return err(new ValidationError(
      `Could not parse ${path}: ${error instanceof Error ? error.message : String(error)}`
    ));
  }

  const parsed = ModelManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = transformZodErrors(parsed.error)[0];
    return err(new ValidationError(
      `Could not extract model name from ${path}`,
      issue ? `${issue.path}: ${issue.message}` : undefined
    ));
  }

  return ok(parsed.data);
}

/**
 * Secret the manifest points at, labelled after the model URI.
 * Falls back to the secret name when there is no usable URI.
 */
export function connectionSecretForManifest(manifest: ModelManifest): ConnectionSecret | undefined {
  if (!manifest.connectionSecret) {
    return undefined;
  }
  const uri = manifest.modelUri ?? '';
  const description = uri ? describeUri(uri) : '';
  return {
    name: manifest.connectionSecret,
    description: description || manifest.connectionSecret,
    uri,
  };
}

/**
 * Model Service - applies model manifests to a project
 */
export class ModelService {
  constructor(
    private readonly cluster: ClusterService,
    private readonly secrets: SecretService,
    private readonly namespace: string
  ) {}

  async deploy(manifestPath: string, manifest: ModelManifest): Promise<Result<DeployResult, CLIError>> {
    let secret: DeployResult['secret'];

    const connection = connectionSecretForManifest(manifest);
    if (connection) {
      const ensured = await this.secrets.ensure(connection);
      if (!ensured.success) {
        return err(new CLIError(
          `Failed to create required secret ${connection.name}: ${ensured.error.message}`,
          ensured.error.code,
          'Deployment aborted before applying the model',
          ensured.error
        ));
      }
      secret = { name: connection.name, created: ensured.data };
    }

    const applied = await this.cluster.applyFile(manifestPath, this.namespace);
    if (!applied.success) {
      return applied;
    }

    return ok({ model: manifest.name, secret, output: applied.data });
  }
}

/**
 * Factory function to create a ModelService
 */
export function createModelService(
  cluster: ClusterService,
  secrets: SecretService,
  namespace: string
): ModelService {
  return new ModelService(cluster, secrets, namespace);
}
