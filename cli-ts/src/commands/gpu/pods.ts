/**
 * GPU pods command - List pods using one GPU or more
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { createGpuService, totalGpus, type PodScope } from '../../services';
import type { GpuPod } from '../../types';
import { printBlank, printInfo, printSuccess, printWarning } from '../../utils/output';
import { unwrapOrThrow, withErrorHandler } from '../../utils/errors';
import { createContext, requireSession } from '../../utils/validation';
import { GPU_TABLE_COUNT_COLUMN_WIDTH, GPU_TABLE_POD_COLUMN_WIDTH } from '../../utils/constants';

interface GpuPodsOptions {
  namespace?: string;
  allNamespaces?: boolean;
  json?: boolean;
}

/**
 * POD / GPUs table rows, without colour
 */
export function formatGpuTable(pods: GpuPod[]): string[] {
  const row = (pod: string, gpus: string) =>
    `${pod.padEnd(GPU_TABLE_POD_COLUMN_WIDTH)} ${gpus.padEnd(GPU_TABLE_COUNT_COLUMN_WIDTH)}`.trimEnd();

  return [
    row('POD', 'GPUs'),
    row('---', '----'),
    ...pods.map(pod => row(`${pod.namespace}/${pod.name}`, String(pod.gpus))),
  ];
}

export function registerGpuPodsCommand(parent: Command): void {
  parent
    .command('pods')
    .description('List pods that request or limit nvidia.com/gpu')
    .option('-n, --namespace <name>', 'Only search this project')
    .option('-A, --all-namespaces', 'Search every namespace (env: ALL_NAMESPACES)')
    .option('--json', 'Output as JSON')
    .action(withErrorHandler(async (options: GpuPodsOptions) => {
      const { config, cluster } = createContext();
      await requireSession(cluster);

      let scope: PodScope;
      if (options.namespace) {
        scope = { namespace: options.namespace };
      } else if (options.allNamespaces || config.allNamespaces) {
        scope = { allNamespaces: true };
      } else {
        scope = { namespace: config.targetProject };
      }

      if (!options.json) {
        printInfo('Finding pods using GPUs...');
        printInfo('namespace' in scope ? `Searching in project: ${scope.namespace}` : 'Searching all namespaces...');
      }

      const pods = unwrapOrThrow(await createGpuService(cluster).findGpuPods(scope));

      if (options.json) {
        console.log(JSON.stringify({ pods, totalGpus: totalGpus(pods) }, null, 2));
        return;
      }

      printBlank();
      if (pods.length === 0) {
        printWarning('No pods found using GPUs.');
        return;
      }

      printSuccess(`Found ${pods.length} pod(s) using GPUs:`);
      printBlank();
      const [header, rule, ...rows] = formatGpuTable(pods);
      console.log(chalk.gray(header));
      console.log(chalk.gray(rule));
      for (const line of rows) {
        console.log(chalk.cyan(line));
      }
      printBlank();
      printInfo(`Total GPUs in use: ${totalGpus(pods)}`);
    }));
}
