/**
 * GPU commands - Inspect GPU usage in the cluster
 */

import type { Command } from 'commander';
import { registerGpuPodsCommand } from './pods';

export function registerGpuCommands(program: Command): void {
  const gpu = program
    .command('gpu')
    .description('Inspect GPU usage');

  registerGpuPodsCommand(gpu);
}
