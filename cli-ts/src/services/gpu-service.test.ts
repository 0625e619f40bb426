import { describe, it, expect } from 'vitest';
import { aggregateGpuPods, containerGpus, GpuService, totalGpus } from './gpu-service';
import { ClusterService } from './cluster-service';
import { createFakeRunner } from '../testing/fake-runner';

function pod(namespace: string, name: string, containers: Array<{ limits?: Record<string, string>; requests?: Record<string, string> }>) {
  return {
    metadata: { name, namespace },
    spec: {
      containers: containers.map((resources, index) => ({ name: `c${index}`, resources })),
    },
  };
}

describe('containerGpus', () => {
  it('prefers the limit over the request', () => {
    expect(containerGpus({ name: 'main', resources: { limits: { 'nvidia.com/gpu': '2' }, requests: { 'nvidia.com/gpu': '1' } } })).toBe(2);
  });

  it('falls back to the request', () => {
    expect(containerGpus({ name: 'main', resources: { requests: { 'nvidia.com/gpu': 1 } } })).toBe(1);
  });

  it('counts zero without GPU resources', () => {
    expect(containerGpus({ name: 'main' })).toBe(0);
    expect(containerGpus({ name: 'main', resources: { limits: { cpu: '4' } } })).toBe(0);
  });
});

describe('aggregateGpuPods', () => {
  it('sums GPUs per pod and skips pods without any', () => {
    const pods = aggregateGpuPods({
      items: [
        pod('ml', 'trainer-0', [{ limits: { 'nvidia.com/gpu': '1' } }, { limits: { 'nvidia.com/gpu': '2' } }]),
        pod('ml', 'web-0', [{ limits: { cpu: '1' } }]),
        pod('demo', 'llama-predictor', [{ requests: { 'nvidia.com/gpu': '1' } }]),
        pod('demo', 'idle', [{ limits: { 'nvidia.com/gpu': '0' } }]),
      ],
    });

    expect(pods).toEqual([
      { namespace: 'demo', name: 'llama-predictor', gpus: 1 },
      { namespace: 'ml', name: 'trainer-0', gpus: 3 },
    ]);
    expect(totalGpus(pods)).toBe(4);
  });
});

describe('GpuService.findGpuPods', () => {
  it('queries the scope and aggregates the result', async () => {
    const fake = createFakeRunner({
      'oc get pods -n demo -o json': {
        stdout: JSON.stringify({ items: [pod('demo', 'llama-predictor', [{ limits: { 'nvidia.com/gpu': '1' } }])] }),
      },
    });

    const result = await new GpuService(new ClusterService({ runner: fake.runner })).findGpuPods({ namespace: 'demo' });

    expect(result).toEqual({ success: true, data: [{ namespace: 'demo', name: 'llama-predictor', gpus: 1 }] });
  });

  it('passes listing failures through', async () => {
    const fake = createFakeRunner({ 'oc get pods -A -o json': { exitCode: 1, stderr: 'forbidden' } });

    const result = await new GpuService(new ClusterService({ runner: fake.runner })).findGpuPods({ allNamespaces: true });

    expect(result.success).toBe(false);
  });
});
