/**
 * GPU Service
 *
 * Finds pods that have one or more GPUs assigned.
 */

import type { ClusterService, PodScope } from './cluster-service';
import type { GpuPod } from '../types';
import { ok, type Result } from '../types';
import type { ClusterError } from '../utils/errors';
import type { PodContainer, PodList } from '../schemas/manifest.schema';
import { GPU_RESOURCE } from '../constants';

function quantity(value: string | number | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number.parseInt(String(value), 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * GPUs a container holds: its limit when set, otherwise its request
 */
export function containerGpus(container: PodContainer): number {
  const limit = quantity(container.resources?.limits?.[GPU_RESOURCE]);
  if (limit !== undefined) {
    return limit;
  }
  return quantity(container.resources?.requests?.[GPU_RESOURCE]) ?? 0;
}

/**
 * Sum GPUs per pod, keeping containers with at least one GPU.
 * Sorted by namespace/name.
 */
export function aggregateGpuPods(pods: PodList): GpuPod[] {
  const totals = new Map<string, GpuPod>();

  for (const pod of pods.items) {
    for (const container of pod.spec.containers) {
      const gpus = containerGpus(container);
      if (gpus < 1) continue;

      const key = `${pod.metadata.namespace}/${pod.metadata.name}`;
      const entry = totals.get(key) ?? { namespace: pod.metadata.namespace, name: pod.metadata.name, gpus: 0 };
      entry.gpus += gpus;
      totals.set(key, entry);
    }
  }

  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, pod]) => pod);
}

export function totalGpus(pods: GpuPod[]): number {
  return pods.reduce((sum, pod) => sum + pod.gpus, 0);
}

/**
 * GPU Service - lists GPU-consuming pods
 */
export class GpuService {
  constructor(private readonly cluster: ClusterService) {}

  async findGpuPods(scope: PodScope): Promise<Result<GpuPod[], ClusterError>> {
    const pods = await this.cluster.listPods(scope);
    if (!pods.success) {
      return pods;
    }
    return ok(aggregateGpuPods(pods.data));
  }
}

/**
 * Factory function to create a GpuService
 */
export function createGpuService(cluster: ClusterService): GpuService {
  return new GpuService(cluster);
}
