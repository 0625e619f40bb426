/**
 * Deletion Waiter
 *
 * Requests deletion of a named resource, then polls until the resource
 * manager no longer reports it or the wait bound is used up.
 *
 * Elapsed time is counted in poll intervals, not read from a clock, and the
 * sleep function is injected, so the loop is deterministic under test.
 */

import type { DeleteResponse, ResourcePresence } from '../types';
import { ok, err, type Result } from '../types';
import { CLIError, ClusterError, DeletionError, ErrorCode, ValidationError } from '../utils/errors';
import { DEFAULT_MAX_WAIT_SECONDS, DEFAULT_POLL_INTERVAL_SECONDS } from '../constants';
import { DELETION_PROGRESS_EVERY_SECONDS } from '../utils/constants';

/**
 * The external resource manager, addressed by name.
 * Both operations must report "not found" as a value, not as an error.
 */
export interface ResourceManager {
  /** Resource kind used in messages, e.g. "project" */
  readonly kind: string;
  exists(identifier: string): Promise<Result<ResourcePresence, Error>>;
  delete(identifier: string): Promise<Result<DeleteResponse, Error>>;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface DeletionWaitConfig {
  /** Upper bound on the wait, in seconds (default: 300) */
  maxWaitSeconds: number;
  /** Seconds slept between existence checks (default: 5) */
  pollIntervalSeconds: number;
  /** Emit a progress event each time the elapsed wait crosses a multiple of this (default: 30) */
  progressEverySeconds: number;
}

export const DEFAULT_DELETION_WAIT_CONFIG: DeletionWaitConfig = {
  maxWaitSeconds: DEFAULT_MAX_WAIT_SECONDS,
  pollIntervalSeconds: DEFAULT_POLL_INTERVAL_SECONDS,
  progressEverySeconds: DELETION_PROGRESS_EVERY_SECONDS,
};

export type DeletionEvent =
  | { type: 'check'; identifier: string; elapsedSeconds: number; maxWaitSeconds: number; present: boolean }
  | { type: 'progress'; identifier: string; elapsedSeconds: number; maxWaitSeconds: number };

export type DeletionListener = (event: DeletionEvent) => void;

export type RequestOutcome =
  | { status: 'accepted' }
  | { status: 'nothing_to_delete' };

export type WaitOutcome =
  | { status: 'deleted'; elapsedSeconds: number; sleeps: number }
  | { status: 'timed_out'; elapsedSeconds: number; sleeps: number };

export type DeletionOutcome = WaitOutcome | { status: 'nothing_to_delete' };

export interface DeletionWaiterOptions {
  config?: Partial<DeletionWaitConfig>;
  sleep?: Sleep;
  onEvent?: DeletionListener;
}

/**
 * ResourceDeletionWaiter - delete, then wait for convergence
 */
export class ResourceDeletionWaiter {
  private readonly config: DeletionWaitConfig;
  private readonly sleep: Sleep;
  private readonly onEvent?: DeletionListener;

  constructor(
    private readonly manager: ResourceManager,
    options: DeletionWaiterOptions = {}
  ) {
    const config = options.config ?? {};
    this.config = {
      maxWaitSeconds: config.maxWaitSeconds ?? DEFAULT_DELETION_WAIT_CONFIG.maxWaitSeconds,
      pollIntervalSeconds: config.pollIntervalSeconds ?? DEFAULT_DELETION_WAIT_CONFIG.pollIntervalSeconds,
      progressEverySeconds: config.progressEverySeconds ?? DEFAULT_DELETION_WAIT_CONFIG.progressEverySeconds,
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.onEvent = options.onEvent;
    assertBounds(this.config.maxWaitSeconds, this.config.pollIntervalSeconds);
    if (!Number.isInteger(this.config.progressEverySeconds) || this.config.progressEverySeconds <= 0) {
      throw new ValidationError(`Progress interval must be a positive integer, got ${this.config.progressEverySeconds}`);
    }
  }

  /**
   * Issue a single delete request
   */
  async requestDeletion(identifier: string): Promise<Result<RequestOutcome, CLIError>> {
    const response = await this.manager.delete(identifier);

    if (!response.success) {
      return err(asDeletionRequestFailed(response.error, this.manager.kind, identifier));
    }

    const outcome: RequestOutcome = response.data === 'not_found'
      ? { status: 'nothing_to_delete' }
      : { status: 'accepted' };
    return ok(outcome);
  }

  /**
   * Poll until the resource is gone or the bound is reached.
   * TimedOut is an outcome; only a failed existence check is an error.
   */
  async awaitAbsence(
    identifier: string,
    maxWaitSeconds: number = this.config.maxWaitSeconds,
    pollIntervalSeconds: number = this.config.pollIntervalSeconds
  ): Promise<Result<WaitOutcome, CLIError>> {
    assertBounds(maxWaitSeconds, pollIntervalSeconds);

    const every = this.config.progressEverySeconds;
    let elapsedSeconds = 0;
    let sleeps = 0;
    let lastReported = 0;

    while (elapsedSeconds < maxWaitSeconds) {
      const presence = await this.check(identifier, elapsedSeconds, maxWaitSeconds);
      if (!presence.success) {
        return presence;
      }
      if (presence.data === 'absent') {
        return ok<WaitOutcome>({ status: 'deleted', elapsedSeconds, sleeps });
      }

      const bucket = Math.floor(elapsedSeconds / every);
      if (bucket > lastReported) {
        lastReported = bucket;
        this.onEvent?.({ type: 'progress', identifier, elapsedSeconds, maxWaitSeconds });
      }

      await this.sleep(pollIntervalSeconds * 1000);
      sleeps++;
      elapsedSeconds += pollIntervalSeconds;
    }

    // The resource may have gone during the last sleep
    const final = await this.check(identifier, elapsedSeconds, maxWaitSeconds);
    if (!final.success) {
      return final;
    }

    return ok<WaitOutcome>({
      status: final.data === 'absent' ? 'deleted' : 'timed_out',
      elapsedSeconds,
      sleeps,
    });
  }

  /**
   * Check, delete, wait. A resource that is already gone is never waited on.
   * Non-interactive entry point; `project delete` runs the same steps itself
   * so it can confirm and report between them.
   */
  async deleteAndWait(identifier: string): Promise<Result<DeletionOutcome, CLIError>> {
    const presence = await this.manager.exists(identifier);
    if (!presence.success) {
      return err(asCheckFailed(presence.error, this.manager.kind, identifier));
    }
    if (presence.data === 'absent') {
      return ok<DeletionOutcome>({ status: 'nothing_to_delete' });
    }

    const request = await this.requestDeletion(identifier);
    if (!request.success) {
      return request;
    }
    if (request.data.status === 'nothing_to_delete') {
      return ok<DeletionOutcome>({ status: 'nothing_to_delete' });
    }

    return this.awaitAbsence(identifier);
  }

  private async check(
    identifier: string,
    elapsedSeconds: number,
    maxWaitSeconds: number
  ): Promise<Result<ResourcePresence, CLIError>> {
    const presence = await this.manager.exists(identifier);
    if (!presence.success) {
      return err(asCheckFailed(presence.error, this.manager.kind, identifier));
    }

    this.onEvent?.({
      type: 'check',
      identifier,
      elapsedSeconds,
      maxWaitSeconds,
      present: presence.data === 'present',
    });

    return ok(presence.data);
  }
}

function assertBounds(maxWaitSeconds: number, pollIntervalSeconds: number): void {
  if (!Number.isInteger(pollIntervalSeconds) || pollIntervalSeconds <= 0) {
    throw new ValidationError(`Poll interval must be a positive integer, got ${pollIntervalSeconds}`);
  }
  if (!Number.isInteger(maxWaitSeconds) || maxWaitSeconds < 0) {
    throw new ValidationError(`Maximum wait must be a non-negative integer, got ${maxWaitSeconds}`);
  }
}

function asCheckFailed(error: Error, kind: string, identifier: string): CLIError {
  if (error instanceof CLIError && error.code === ErrorCode.CHECK_FAILED) {
    return error;
  }
  return new ClusterError(`Error checking ${kind} ${identifier}: ${error.message}`, {
    code: ErrorCode.CHECK_FAILED,
  });
}

function asDeletionRequestFailed(error: Error, kind: string, identifier: string): CLIError {
  if (error instanceof CLIError && error.code === ErrorCode.DELETION_REQUEST_FAILED) {
    return error;
  }
  return new DeletionError(`Failed to initiate deletion of ${kind} ${identifier}: ${error.message}`);
}

/**
 * Factory function to create a ResourceDeletionWaiter
 */
export function createDeletionWaiter(
  manager: ResourceManager,
  options: DeletionWaiterOptions = {}
): ResourceDeletionWaiter {
  return new ResourceDeletionWaiter(manager, options);
}
