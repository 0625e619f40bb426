/**
 * Cluster CLI process helpers
 */

import { spawnSync } from 'child_process';
import type { CommandResult, CommandRunner, RunOptions } from '../types';

/**
 * Run a command synchronously and capture its output.
 * A command that cannot be spawned reports exit code 127, like a shell would.
 */
export const spawnRunner: CommandRunner = (
  command: string,
  args: string[],
  options: RunOptions = {}
): CommandResult => {
  const result = spawnSync(command, args, {
    encoding: 'utf-8',
    shell: false,
    input: options.input,
    stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
  });

  if (result.error) {
    return {
      stdout: '',
      stderr: result.error.message,
      exitCode: 127,
    };
  }

  return {
    stdout: result.stdout || '',
    stderr: result.stderr || '',
    exitCode: result.status ?? 1,
  };
};

/**
 * Check if a command exists on PATH
 */
export function commandExists(runner: CommandRunner, command: string): boolean {
  const result = runner('sh', ['-c', `command -v ${quoteArg(command)}`]);
  return result.exitCode === 0;
}

/**
 * `oc` reports a missing object as `Error from server (NotFound): ...`
 * or `... "name" not found`.
 */
export function isNotFoundOutput(output: string): boolean {
  return /NotFound|not found/.test(output);
}

/**
 * Combined stdout and stderr, the way a terminal would have shown them
 */
export function combinedOutput(result: CommandResult): string {
  return [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n');
}

/**
 * Quote an argument for display or for `sh -c`
 */
export function quoteArg(arg: string): string {
  if (arg !== '' && /^[\w@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command line for verbose and dry-run output
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(quoteArg).join(' ');
}
