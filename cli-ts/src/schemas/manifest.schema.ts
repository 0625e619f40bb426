/**
 * Schemas for the cluster documents the CLI reads:
 * model manifests, `oc get pods -o json` output and URI lists
 */

import { z } from 'zod';
import { CONNECTIONS_ANNOTATION } from '../constants';

/**
 * LLMInferenceService manifest, reduced to the fields the deploy step reads
 */
export const ModelManifestSchema = z.object({
  kind: z.string().optional(),
  metadata: z.object({
    name: z.string().min(1).describe('Name of the inference service'),
    annotations: z.record(z.string()).optional(),
  }),
  spec: z.object({
    model: z.object({
      uri: z.string().min(1).optional().describe('OCI URI of the model image'),
    }).optional(),
  }).optional(),
}).transform((manifest) => ({
  kind: manifest.kind,
  name: manifest.metadata.name,
  connectionSecret: manifest.metadata.annotations?.[CONNECTIONS_ANNOTATION]?.trim() || undefined,
  modelUri: manifest.spec?.model?.uri,
}));

export type ModelManifest = z.output<typeof ModelManifestSchema>;

/**
 * Resource quantities come back as strings, but hand-written lists may hold numbers
 */
const QuantitySchema = z.union([z.string(), z.number()]);

const ResourceListSchema = z.record(QuantitySchema);

export const ContainerSchema = z.object({
  name: z.string(),
  resources: z.object({
    requests: ResourceListSchema.optional(),
    limits: ResourceListSchema.optional(),
  }).optional(),
});

export const PodListSchema = z.object({
  items: z.array(z.object({
    metadata: z.object({
      name: z.string(),
      namespace: z.string(),
    }),
    spec: z.object({
      containers: z.array(ContainerSchema).default([]),
    }),
  })),
});

export type PodList = z.output<typeof PodListSchema>;
export type PodContainer = z.output<typeof ContainerSchema>;

/**
 * YAML list of model URIs: either a bare sequence or `uris: [...]`
 */
export const ModelUriListSchema = z.union([
  z.array(z.string().min(1)),
  z.object({ uris: z.array(z.string().min(1)) }).transform((list) => list.uris),
]);
