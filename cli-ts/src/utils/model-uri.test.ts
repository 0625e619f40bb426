import { describe, it, expect } from 'vitest';
import { describeUri, encodeUri, parseModelUri, toDescription, toSecretName } from './model-uri';
import { ErrorCode } from './errors';

describe('parseModelUri', () => {
  it('splits a catalogue URI into model and tag', () => {
    const result = parseModelUri('oci://registry.redhat.io/rhelai1/modelcar-granite-8b-lab-v1:1.4.0');

    expect(result).toEqual({
      success: true,
      data: {
        uri: 'oci://registry.redhat.io/rhelai1/modelcar-granite-8b-lab-v1:1.4.0',
        modelName: 'granite-8b-lab-v1',
        tag: '1.4.0',
      },
    });
  });

  it('accepts an untagged image', () => {
    const result = parseModelUri('oci://quay.io/models/modelcar-phi-3');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.modelName).toBe('phi-3');
      expect(result.data.tag).toBeUndefined();
    }
  });

  it('takes the tag after the last colon', () => {
    const result = parseModelUri('oci://quay.io/models/modelcar-phi:3:mini');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.modelName).toBe('phi');
      expect(result.data.tag).toBe('mini');
    }
  });

  it('rejects images without the modelcar- prefix', () => {
    const result = parseModelUri('oci://registry.redhat.io/rhelai1/granite-8b:1.4.0');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.VALIDATION_FAILED);
      expect(result.error.message).toBe(
        "URI does not contain 'modelcar-' prefix: oci://registry.redhat.io/rhelai1/granite-8b:1.4.0"
      );
    }
  });

  it('rejects an empty model name', () => {
    expect(parseModelUri('oci://quay.io/models/modelcar-:1.0').success).toBe(false);
  });
});

describe('secret naming', () => {
  it('drops dots from the tag in the secret name', () => {
    const ref = { uri: '', modelName: 'granite-8b-lab-v1', tag: '1.4.0' };

    expect(toSecretName(ref)).toBe('granite-8b-lab-v1-140');
    expect(toDescription(ref)).toBe('granite-8b-lab-v1:1.4.0');
  });

  it('uses the bare model name without a tag', () => {
    const ref = { uri: '', modelName: 'phi-3' };

    expect(toSecretName(ref)).toBe('phi-3');
    expect(toDescription(ref)).toBe('phi-3');
  });
});

describe('describeUri', () => {
  it('keeps the text after the last colon and slash', () => {
    expect(describeUri('oci://quay.io/redhat-ai-services/modelcar-catalog:llama-3.2-3b-instruct')).toBe('llama-3.2-3b-instruct');
    expect(describeUri('oci://quay.io/models/phi')).toBe('phi');
  });
});

describe('encodeUri', () => {
  it('base64-encodes the URI', () => {
    expect(encodeUri('oci://a')).toBe(Buffer.from('oci://a').toString('base64'));
  });
});
