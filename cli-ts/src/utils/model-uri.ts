/**
 * Model URI helpers
 *
 * Catalogue URIs look like oci://registry.redhat.io/rhelai1/modelcar-<model>:<tag>.
 */

import { ok, err, type Result } from '../types';
import { ValidationError } from './errors';
import { MODELCAR_PREFIX } from '../constants';

export interface ModelReference {
  uri: string;
  modelName: string;
  tag?: string;
}

/**
 * Split a modelcar URI into model name and tag
 */
export function parseModelUri(uri: string): Result<ModelReference, ValidationError> {
  const image = uri.slice(uri.lastIndexOf('/') + 1);

  if (!image.startsWith(MODELCAR_PREFIX)) {
    return err(new ValidationError(
      `URI does not contain '${MODELCAR_PREFIX}' prefix: ${uri}`,
      `Expected an image named ${MODELCAR_PREFIX}<model>[:<tag>]`
    ));
  }

  const modelWithTag = image.slice(MODELCAR_PREFIX.length);
  const colon = modelWithTag.indexOf(':');
  const modelName = colon === -1 ? modelWithTag : modelWithTag.slice(0, colon);
  const tag = colon === -1 ? undefined : modelWithTag.slice(modelWithTag.lastIndexOf(':') + 1);

  if (!modelName) {
    return err(new ValidationError(`URI has an empty model name: ${uri}`));
  }

  return ok({ uri, modelName, tag: tag || undefined });
}

/**
 * granite-8b-lab-v1 + 1.4.0 -> granite-8b-lab-v1-140
 */
export function toSecretName(ref: ModelReference): string {
  if (!ref.tag) {
    return ref.modelName;
  }
  return `${ref.modelName}-${ref.tag.replace(/[.:]/g, '')}`;
}

/**
 * granite-8b-lab-v1 + 1.4.0 -> granite-8b-lab-v1:1.4.0
 */
export function toDescription(ref: ModelReference): string {
  return ref.tag ? `${ref.modelName}:${ref.tag}` : ref.modelName;
}

/**
 * Short label for a URI found in a model manifest: the text after the last
 * ':' and then after the last '/'.
 */
export function describeUri(uri: string): string {
  const afterColon = uri.slice(uri.lastIndexOf(':') + 1);
  return afterColon.slice(afterColon.lastIndexOf('/') + 1);
}

export function encodeUri(uri: string): string {
  return Buffer.from(uri, 'utf-8').toString('base64');
}
