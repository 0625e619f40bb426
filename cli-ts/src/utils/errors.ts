/**
 * Command Error Handling
 *
 * Every failure a command can end in is a CLIError carrying its own exit code.
 * Commands throw; withErrorHandler prints and exits.
 */

import { printBlank, printRaw, colors } from './output';

/**
 * CLI Error codes, also used as process exit codes
 */
export enum ErrorCode {
  // General errors (1-9)
  UNKNOWN = 1,
  COMMAND_FAILED = 3,

  // Configuration errors (10-19)
  CONFIG_NOT_FOUND = 10,
  CONFIG_INVALID = 11,

  // Cluster CLI errors (40-49)
  TOOL_UNAVAILABLE = 40,
  NOT_LOGGED_IN = 41,
  CLUSTER_UNREACHABLE = 42,
  CHECK_FAILED = 43,
  PROJECT_NOT_FOUND = 44,

  // Deletion errors (50-59)
  DELETION_REQUEST_FAILED = 50,
  DELETION_TIMED_OUT = 51,

  // Validation errors (60-69)
  VALIDATION_FAILED = 60,
}

/**
 * Base CLI error class with structured information
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN,
    public readonly suggestion?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CLIError';
  }

  /**
   * Create error from unknown thrown value
   */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): CLIError {
    if (error instanceof CLIError) {
      return error;
    }
    if (error instanceof Error) {
      return new CLIError(error.message, code, undefined, error);
    }
    return new CLIError(String(error), code);
  }
}

export class ConfigError extends CLIError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.CONFIG_INVALID, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Failures reported by (or about) the cluster CLI
 */
export class ClusterError extends CLIError {
  /** Raw output of the command that failed, if any */
  readonly output?: string;

  constructor(
    message: string,
    options?: { code?: ErrorCode; suggestion?: string; output?: string }
  ) {
    super(message, options?.code ?? ErrorCode.COMMAND_FAILED, options?.suggestion);
    this.name = 'ClusterError';
    this.output = options?.output;
  }
}

export class DeletionError extends CLIError {
  constructor(message: string, code: ErrorCode = ErrorCode.DELETION_REQUEST_FAILED, suggestion?: string) {
    super(message, code, suggestion);
    this.name = 'DeletionError';
  }
}

export class ValidationError extends CLIError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.VALIDATION_FAILED, suggestion);
    this.name = 'ValidationError';
  }
}

/**
 * Format error for display
 */
export function formatError(error: CLIError): string {
  const lines: string[] = [];

  lines.push(colors.error(`Error: ${error.message}`));

  if (error instanceof ClusterError && error.output) {
    for (const line of error.output.trimEnd().split('\n')) {
      lines.push(colors.dim(`  ${line}`));
    }
  }

  if (error.suggestion) {
    lines.push(colors.dim(`  → ${error.suggestion}`));
  }

  if (process.env.DEBUG && error.cause) {
    lines.push(colors.dim(`  Caused by: ${error.cause.message}`));
    if (error.cause.stack) {
      lines.push(colors.dim(error.cause.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Handle error and exit process
 * This is the ONLY place that should call process.exit for errors
 */
export function handleError(error: unknown): never {
  const cliError = CLIError.from(error);

  printBlank();
  printRaw(formatError(cliError));
  printBlank();

  process.exit(cliError.code);
}

/**
 * Type for async command action handlers
 */
export type CommandAction<T extends unknown[] = unknown[]> = (...args: T) => Promise<void>;

/**
 * Wrap a command action with error handling
 *
 * ```typescript
 * .action(withErrorHandler(async (name, options) => {
 *   if (!valid) throw new ValidationError('Invalid input');
 * }))
 * ```
 */
export function withErrorHandler<T extends unknown[]>(
  action: CommandAction<T>
): CommandAction<T> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * Wrap Result type errors into CLIError
 */
export function unwrapOrThrow<T>(
  result: { success: true; data: T } | { success: false; error: Error },
  code: ErrorCode = ErrorCode.UNKNOWN,
  suggestion?: string
): T {
  if (result.success) {
    return result.data;
  }
  if (result.error instanceof CLIError) {
    throw result.error;
  }
  throw new CLIError(result.error.message, code, suggestion, result.error);
}
