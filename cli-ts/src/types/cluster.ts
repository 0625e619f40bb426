/**
 * Cluster CLI type definitions
 */

/**
 * Captured output of one external command
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  /** Text piped to the command's stdin */
  input?: string;
}

/**
 * Runs an external command to completion.
 * The default implementation is built on spawnSync; tests pass a scripted fake.
 */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => CommandResult;

/**
 * Observed state of a named resource
 */
export type ResourcePresence = 'present' | 'absent';

/**
 * Outcome of a delete request the manager accepted or had nothing to act on
 */
export type DeleteResponse = 'deleted' | 'not_found';

/**
 * A pod with at least one GPU assigned, aggregated over its containers
 */
export interface GpuPod {
  namespace: string;
  name: string;
  gpus: number;
}
