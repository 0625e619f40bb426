/**
 * Secret Service
 *
 * Turns model URIs into connection secrets: renders the manifest, writes it
 * under the secrets directory and optionally applies it to the project.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ClusterService } from './cluster-service';
import { ok, err, type Result } from '../types';
import { CLIError, ValidationError } from '../utils/errors';
import { encodeUri, parseModelUri, toDescription, toSecretName } from '../utils/model-uri';
import { ModelUriListSchema } from '../schemas/manifest.schema';
import { DASHBOARD_LABEL, MODEL_CATALOG_URL } from '../constants';

/**
 * A secret that stores a model URI for the serving dashboard
 */
export interface ConnectionSecret {
  name: string;
  description: string;
  uri: string;
}

export interface SecretServiceOptions {
  secretsDir: string;
  namespace: string;
  /** Apply each generated secret to the namespace */
  apply: boolean;
}

export interface GeneratedSecret {
  secret: ConnectionSecret;
  file: string;
  applied: boolean;
}

export interface GenerateSummary {
  generated: GeneratedSecret[];
  failures: Array<{ uri: string; error: CLIError }>;
}

/**
 * Callbacks the command uses to report per-URI progress
 */
export interface SecretReporter {
  onStart?(uri: string): void;
  onWritten?(secret: ConnectionSecret, file: string): void;
  onApplied?(secret: ConnectionSecret): void;
  onFailed?(uri: string, error: CLIError): void;
}

/**
 * Render the Secret manifest for a connection
 */
export function renderSecretManifest(secret: ConnectionSecret): string {
  return stringifyYaml({
    kind: 'Secret',
    apiVersion: 'v1',
    metadata: {
      name: secret.name,
      labels: {
        [DASHBOARD_LABEL]: 'true',
      },
      annotations: {
        'opendatahub.io/connection-type-protocol': 'uri',
        'opendatahub.io/connection-type-ref': 'uri-v1',
        'openshift.io/description': secret.description,
        'openshift.io/display-name': secret.description,
      },
    },
    data: {
      URI: encodeUri(secret.uri),
    },
    type: 'Opaque',
  });
}

/**
 * Connection secret for a catalogue URI
 */
export function connectionSecretFor(uri: string): Result<ConnectionSecret, ValidationError> {
  const parsed = parseModelUri(uri);
  if (!parsed.success) {
    return parsed;
  }
  return ok({
    name: toSecretName(parsed.data),
    description: toDescription(parsed.data),
    uri,
  });
}

/**
 * Read a YAML list of URIs (a bare sequence or `uris: [...]`)
 */
export function loadUriList(path: string | URL): Result<string[], ValidationError> {
  if (!existsSync(path)) {
    return err(new ValidationError(`URI list not found: ${String(path)}`));
  }

  const parsed = ModelUriListSchema.safeParse(parseYaml(readFileSync(path, 'utf-8')));
  if (!parsed.success) {
    return err(new ValidationError(
      `Invalid URI list in ${String(path)}`,
      'Expected a YAML list of strings, or a "uris:" key holding one'
    ));
  }
  return ok(parsed.data);
}

/**
 * Model URIs shipped with the CLI
 */
export function loadDefaultCatalog(): Result<string[], ValidationError> {
  return loadUriList(MODEL_CATALOG_URL);
}

/**
 * Secret Service - generates and applies connection secrets
 */
export class SecretService {
  constructor(
    private readonly cluster: ClusterService,
    private readonly options: SecretServiceOptions
  ) {}

  /**
   * Write the manifest to <secretsDir>/<name>.yaml, creating the directory
   */
  write(secret: ConnectionSecret): string {
    if (!existsSync(this.options.secretsDir)) {
      mkdirSync(this.options.secretsDir, { recursive: true });
    }
    const file = join(this.options.secretsDir, `${secret.name}.yaml`);
    writeFileSync(file, renderSecretManifest(secret));
    return file;
  }

  /**
   * Generate a secret for every URI. An invalid URI or a failed apply is
   * recorded and the remaining URIs are still processed.
   */
  async generate(uris: string[], reporter: SecretReporter = {}): Promise<GenerateSummary> {
    const summary: GenerateSummary = { generated: [], failures: [] };

    for (const uri of uris) {
      reporter.onStart?.(uri);

      const secret = connectionSecretFor(uri);
      if (!secret.success) {
        summary.failures.push({ uri, error: secret.error });
        reporter.onFailed?.(uri, secret.error);
        continue;
      }

      const file = this.write(secret.data);
      reporter.onWritten?.(secret.data, file);

      let applied = false;
      if (this.options.apply) {
        const result = await this.cluster.applyFile(file, this.options.namespace);
        if (result.success) {
          applied = true;
          reporter.onApplied?.(secret.data);
        } else {
          summary.failures.push({ uri, error: result.error });
          reporter.onFailed?.(uri, result.error);
        }
      }

      summary.generated.push({ secret: secret.data, file, applied });
    }

    return summary;
  }

  /**
   * Create the secret in the namespace unless it already exists.
   * Returns true when it was created.
   */
  async ensure(secret: ConnectionSecret): Promise<Result<boolean, CLIError>> {
    const presence = await this.cluster.secretExists(secret.name, this.options.namespace);
    if (!presence.success) {
      return presence;
    }
    if (presence.data === 'present') {
      return ok(false);
    }

    const applied = await this.cluster.applyManifest(renderSecretManifest(secret), this.options.namespace);
    if (!applied.success) {
      return applied;
    }
    return ok(true);
  }
}

/**
 * Factory function to create a SecretService
 */
export function createSecretService(
  cluster: ClusterService,
  options: SecretServiceOptions
): SecretService {
  return new SecretService(cluster, options);
}
