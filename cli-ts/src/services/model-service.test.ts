import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { connectionSecretForManifest, loadModelManifest, ModelService } from './model-service';
import { SecretService } from './secret-service';
import { ClusterService } from './cluster-service';
import { ErrorCode } from '../utils/errors';
import { createFakeRunner, NOT_FOUND } from '../testing/fake-runner';

const MANIFEST = `apiVersion: serving.kserve.io/v1alpha1
kind: LLMInferenceService
metadata:
  name: llama-3-2-3b-instruct
  annotations:
    opendatahub.io/connections: llama-3-2-3b-instruct
spec:
  model:
    uri: oci://quay.io/redhat-ai-services/modelcar-catalog:llama-3.2-3b-instruct
`;

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'servingctl-models-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeManifest(content: string): string {
  const file = join(dir, 'llmd.yaml');
  writeFileSync(file, content);
  return file;
}

describe('loadModelManifest', () => {
  it('extracts the name, connection secret and URI', () => {
    expect(loadModelManifest(writeManifest(MANIFEST))).toEqual({
      success: true,
      data: {
        kind: 'LLMInferenceService',
        name: 'llama-3-2-3b-instruct',
        connectionSecret: 'llama-3-2-3b-instruct',
        modelUri: 'oci://quay.io/redhat-ai-services/modelcar-catalog:llama-3.2-3b-instruct',
      },
    });
  });

  it('reports a missing file as CONFIG_NOT_FOUND', () => {
    const result = loadModelManifest(join(dir, 'missing.yaml'));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
      expect(result.error.message).toBe(`Model file not found: ${join(dir, 'missing.yaml')}`);
    }
  });

  it('fails when the manifest has no name', () => {
    const file = writeManifest('kind: LLMInferenceService\nmetadata:\n  labels: {}\n');
    const result = loadModelManifest(file);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.VALIDATION_FAILED);
      expect(result.error.message).toBe(`Could not extract model name from ${file}`);
    }
  });

  it('fails on malformed YAML', () => {
    const result = loadModelManifest(writeManifest('metadata: {name: broken\n'));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.VALIDATION_FAILED);
    }
  });

  it('treats a blank connections annotation as absent', () => {
    const result = loadModelManifest(writeManifest(
      "metadata:\n  name: phi\n  annotations:\n    opendatahub.io/connections: ' '\n"
    ));

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.connectionSecret).toBeUndefined();
    }
  });
});

describe('connectionSecretForManifest', () => {
  it('describes the secret by the end of the model URI', () => {
    expect(connectionSecretForManifest({
      kind: 'LLMInferenceService',
      name: 'llama',
      connectionSecret: 'llama-conn',
      modelUri: 'oci://quay.io/redhat-ai-services/modelcar-catalog:llama-3.2-3b-instruct',
    })).toEqual({
      name: 'llama-conn',
      description: 'llama-3.2-3b-instruct',
      uri: 'oci://quay.io/redhat-ai-services/modelcar-catalog:llama-3.2-3b-instruct',
    });
  });

  it('falls back to the secret name without a URI', () => {
    expect(connectionSecretForManifest({ kind: undefined, name: 'llama', connectionSecret: 'llama-conn', modelUri: undefined }))
      .toEqual({ name: 'llama-conn', description: 'llama-conn', uri: '' });
  });

  it('returns nothing when no secret is referenced', () => {
    expect(connectionSecretForManifest({ kind: undefined, name: 'llama', connectionSecret: undefined, modelUri: 'oci://x' }))
      .toBeUndefined();
  });
});

describe('ModelService.deploy', () => {
  function createService(responses: Parameters<typeof createFakeRunner>[0]) {
    const fake = createFakeRunner(responses);
    const cluster = new ClusterService({ runner: fake.runner });
    const secrets = new SecretService(cluster, { secretsDir: dir, namespace: 'demo', apply: true });
    return { fake, service: new ModelService(cluster, secrets, 'demo') };
  }

  it('creates the missing secret, then applies the manifest', async () => {
    const file = writeManifest(MANIFEST);
    const { fake, service } = createService({
      'oc get secret llama-3-2-3b-instruct -n demo': NOT_FOUND('secrets', 'llama-3-2-3b-instruct'),
      [`oc apply -f ${file} -n demo`]: { stdout: 'llminferenceservice.serving.kserve.io/llama-3-2-3b-instruct created\n' },
    });
    const manifest = loadModelManifest(file);
    if (!manifest.success) throw manifest.error;

    const result = await service.deploy(file, manifest.data);

    expect(result).toEqual({
      success: true,
      data: {
        model: 'llama-3-2-3b-instruct',
        secret: { name: 'llama-3-2-3b-instruct', created: true },
        output: 'llminferenceservice.serving.kserve.io/llama-3-2-3b-instruct created',
      },
    });
    expect(fake.lines()).toEqual([
      'oc get secret llama-3-2-3b-instruct -n demo',
      'oc apply -f - -n demo',
      `oc apply -f ${file} -n demo`,
    ]);
  });

  it('aborts before applying the model when the secret cannot be checked', async () => {
    const file = writeManifest(MANIFEST);
    const { fake, service } = createService({
      'oc get secret llama-3-2-3b-instruct -n demo': { exitCode: 1, stderr: 'Unauthorized' },
    });
    const manifest = loadModelManifest(file);
    if (!manifest.success) throw manifest.error;

    const result = await service.deploy(file, manifest.data);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.CHECK_FAILED);
      expect(result.error.message).toBe('Failed to create required secret llama-3-2-3b-instruct: Error checking secret llama-3-2-3b-instruct');
    }
    expect(fake.lines()).toEqual(['oc get secret llama-3-2-3b-instruct -n demo']);
  });

  it('skips the secret step when the manifest names none', async () => {
    const file = writeManifest('metadata:\n  name: phi\n');
    const { fake, service } = createService({});
    const manifest = loadModelManifest(file);
    if (!manifest.success) throw manifest.error;

    const result = await service.deploy(file, manifest.data);

    expect(result).toEqual({ success: true, data: { model: 'phi', secret: undefined, output: '' } });
    expect(fake.lines()).toEqual([`oc apply -f ${file} -n demo`]);
  });
});
