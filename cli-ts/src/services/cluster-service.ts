/**
 * Cluster Service
 *
 * Typed wrapper around the OpenShift CLI. Every invocation is inspected and
 * classified: "not found" is a value, anything else is a ClusterError.
 * Used by all commands; nothing here exits the process.
 */

import type {
  CommandResult,
  CommandRunner,
  DeleteResponse,
  ResourcePresence,
  RunOptions,
} from '../types';
import { ok, err, type Result } from '../types';
import { ClusterError, ErrorCode } from '../utils/errors';
import { printDim } from '../utils/output';
import {
  combinedOutput,
  commandExists,
  formatCommand,
  isNotFoundOutput,
  spawnRunner,
} from '../utils/oc';
import { PodListSchema, type PodList } from '../schemas/manifest.schema';
import type { ResourceManager } from './deletion-waiter';

export interface ClusterServiceOptions {
  /** Cluster CLI executable (default: oc) */
  ocBinary?: string;
  /** Print mutating commands instead of running them */
  dryRun?: boolean;
  /** Echo every command before running it */
  verbose?: boolean;
  runner?: CommandRunner;
}

export interface SessionOptions {
  /** Also require `oc cluster-info` to succeed */
  requireReachable?: boolean;
}

export type PodScope = { allNamespaces: true } | { namespace: string };

/**
 * Cluster Service - runs and classifies `oc` commands
 */
export class ClusterService {
  private readonly oc: string;
  private readonly runner: CommandRunner;
  private readonly dryRun: boolean;
  private readonly verbose: boolean;

  constructor(options: ClusterServiceOptions = {}) {
    this.oc = options.ocBinary ?? 'oc';
    this.runner = options.runner ?? spawnRunner;
    this.dryRun = options.dryRun ?? false;
    this.verbose = options.verbose ?? false;
  }

  get isDryRun(): boolean {
    return this.dryRun;
  }

  private run(args: string[], options?: RunOptions): CommandResult {
    if (this.verbose) {
      printDim(`$ ${formatCommand(this.oc, args)}`);
    }
    return this.runner(this.oc, args, options);
  }

  /**
   * Run a command that changes cluster or session state.
   * In dry-run mode it is only printed.
   */
  private mutate(args: string[], options?: RunOptions): CommandResult {
    if (this.dryRun) {
      printDim(`[dry-run] ${formatCommand(this.oc, args)}${options?.input !== undefined ? ' <<EOF' : ''}`);
      return { stdout: '', stderr: '', exitCode: 0 };
    }
    return this.run(args, options);
  }

  /**
   * The CLI binary is on PATH
   */
  assertAvailable(): Result<void, ClusterError> {
    if (!commandExists(this.runner, this.oc)) {
      return err(new ClusterError(`${this.oc} command not found.`, {
        code: ErrorCode.TOOL_UNAVAILABLE,
        suggestion: 'Install the OpenShift CLI and make sure it is on your PATH',
      }));
    }
    return ok(undefined);
  }

  /**
   * A session token is present; returns the logged-in user name
   */
  assertLoggedIn(): Result<string, ClusterError> {
    const whoami = this.run(['whoami']);
    if (whoami.exitCode !== 0) {
      return err(new ClusterError('Not logged in to OpenShift.', {
        code: ErrorCode.NOT_LOGGED_IN,
        suggestion: `Run '${this.oc} login' first`,
        output: combinedOutput(whoami),
      }));
    }
    return ok(whoami.stdout.trim());
  }

  assertReachable(): Result<void, ClusterError> {
    const info = this.run(['cluster-info']);
    if (info.exitCode !== 0) {
      return err(new ClusterError('Cannot connect to the OpenShift cluster.', {
        code: ErrorCode.CLUSTER_UNREACHABLE,
        suggestion: 'Check your network connection and cluster URL',
        output: combinedOutput(info),
      }));
    }
    return ok(undefined);
  }

  /**
   * Check the CLI is installed, logged in and (optionally) able to reach the cluster.
   * Stops at the first failure. Returns the logged-in user name.
   */
  async ensureSession(options: SessionOptions = {}): Promise<Result<string, ClusterError>> {
    const available = this.assertAvailable();
    if (!available.success) {
      return available;
    }

    const user = this.assertLoggedIn();
    if (!user.success || !options.requireReachable) {
      return user;
    }

    const reachable = this.assertReachable();
    if (!reachable.success) {
      return reachable;
    }

    return user;
  }

  /**
   * Lightweight availability probe, for steps that degrade instead of failing
   */
  isSessionUsable(): boolean {
    return this.assertAvailable().success && this.assertLoggedIn().success;
  }

  async getProject(name: string): Promise<Result<ResourcePresence, ClusterError>> {
    return this.lookup(['get', 'project', name], `project ${name}`);
  }

  async secretExists(name: string, namespace: string): Promise<Result<ResourcePresence, ClusterError>> {
    return this.lookup(['get', 'secret', name, '-n', namespace], `secret ${name}`);
  }

  private lookup(args: string[], what: string): Result<ResourcePresence, ClusterError> {
    const result = this.run(args);
    if (result.exitCode === 0) {
      return ok('present');
    }

    const output = combinedOutput(result);
    if (isNotFoundOutput(output)) {
      return ok('absent');
    }

    return err(new ClusterError(`Error checking ${what}`, {
      code: ErrorCode.CHECK_FAILED,
      output,
    }));
  }

  async deleteProject(name: string): Promise<Result<DeleteResponse, ClusterError>> {
    const result = this.mutate(['delete', 'project', name]);
    if (result.exitCode === 0) {
      return ok('deleted');
    }

    const output = combinedOutput(result);
    if (isNotFoundOutput(output)) {
      return ok('not_found');
    }

    return err(new ClusterError(`Failed to initiate deletion of project ${name}`, {
      code: ErrorCode.DELETION_REQUEST_FAILED,
      output,
    }));
  }

  async newProject(name: string, displayName: string): Promise<Result<void, ClusterError>> {
    return this.expectSuccess(
      this.mutate(['new-project', name, `--display-name=${displayName}`]),
      `Failed to create project ${name}`
    );
  }

  async switchProject(name: string): Promise<Result<void, ClusterError>> {
    return this.expectSuccess(
      this.mutate(['project', name]),
      `Failed to switch to project ${name}`
    );
  }

  async currentProject(): Promise<Result<string, ClusterError>> {
    const result = this.run(['project', '-q']);
    if (result.exitCode !== 0) {
      return err(new ClusterError('Could not determine the current project', {
        output: combinedOutput(result),
      }));
    }
    return ok(result.stdout.trim());
  }

  async labelNamespace(name: string, labels: Record<string, string>): Promise<Result<void, ClusterError>> {
    return this.expectSuccess(
      this.mutate(['label', 'namespace', name, ...toPairs(labels), '--overwrite']),
      `Failed to label namespace ${name}`
    );
  }

  async annotateNamespace(name: string, annotations: Record<string, string>): Promise<Result<void, ClusterError>> {
    return this.expectSuccess(
      this.mutate(['annotate', 'namespace', name, ...toPairs(annotations), '--overwrite']),
      `Failed to annotate namespace ${name}`
    );
  }

  async describeProject(name: string): Promise<Result<string, ClusterError>> {
    const result = this.run(['describe', 'project', name]);
    if (result.exitCode !== 0) {
      return err(new ClusterError(`Could not describe project ${name}`, {
        code: ErrorCode.CHECK_FAILED,
        output: combinedOutput(result),
      }));
    }
    return ok(result.stdout);
  }

  /**
   * `oc apply -f <file>` into a namespace; returns the CLI's report
   */
  async applyFile(path: string, namespace: string): Promise<Result<string, ClusterError>> {
    const result = this.mutate(['apply', '-f', path, '-n', namespace]);
    if (result.exitCode !== 0) {
      return err(new ClusterError(`Failed to apply ${path} to project ${namespace}`, {
        output: combinedOutput(result),
      }));
    }
    return ok(result.stdout.trim());
  }

  /**
   * `oc apply -f -` with the manifest on stdin
   */
  async applyManifest(manifest: string, namespace: string): Promise<Result<string, ClusterError>> {
    const result = this.mutate(['apply', '-f', '-', '-n', namespace], { input: manifest });
    if (result.exitCode !== 0) {
      return err(new ClusterError(`Failed to apply manifest to project ${namespace}`, {
        output: combinedOutput(result),
      }));
    }
    return ok(result.stdout.trim());
  }

  async listPods(scope: PodScope): Promise<Result<PodList, ClusterError>> {
    const scopeArgs = 'namespace' in scope ? ['-n', scope.namespace] : ['-A'];
    const result = this.run(['get', 'pods', ...scopeArgs, '-o', 'json']);

    if (result.exitCode !== 0) {
      return err(new ClusterError('Failed to fetch pods', {
        code: ErrorCode.CHECK_FAILED,
        output: combinedOutput(result),
      }));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch (error) {
      return err(new ClusterError(`Unexpected pod list output: ${error instanceof Error ? error.message : String(error)}`, {
        code: ErrorCode.CHECK_FAILED,
      }));
    }

    const parsed = PodListSchema.safeParse(raw);
    if (!parsed.success) {
      return err(new ClusterError(`Unexpected pod list format: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        code: ErrorCode.CHECK_FAILED,
      }));
    }

    return ok(parsed.data);
  }

  /**
   * Projects as a ResourceManager, for the deletion waiter
   */
  projects(): ResourceManager {
    return {
      kind: 'project',
      exists: (name) => this.getProject(name),
      delete: (name) => this.deleteProject(name),
    };
  }

  private expectSuccess(result: CommandResult, message: string): Result<void, ClusterError> {
    if (result.exitCode !== 0) {
      return err(new ClusterError(message, { output: combinedOutput(result) }));
    }
    return ok(undefined);
  }
}

function toPairs(values: Record<string, string>): string[] {
  return Object.entries(values).map(([key, value]) => `${key}=${value}`);
}

/**
 * Factory function to create a ClusterService
 */
export function createClusterService(options: ClusterServiceOptions = {}): ClusterService {
  return new ClusterService(options);
}
