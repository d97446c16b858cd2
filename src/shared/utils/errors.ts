/**
 * Custom error classes
 *
 * Run outcomes are reported as a FailureResult carrying one of the
 * CommandExecutionError subclasses. Only ConfigurationError is thrown.
 */

export const ERROR_CATEGORIES = [
  'validation',
  'spawn-failure',
  'timeout',
  'cancelled',
  'resource-exhausted',
  'non-zero-exit',
  'internal',
] as const;
export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export type ErrorCode =
  | 'INVALID_COMMAND'
  | 'BLOCKED_COMMAND'
  | 'SPAWN_FAILED'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'POOL_EXHAUSTED'
  | 'NON_ZERO_EXIT'
  | 'TERMINATED_BY_SIGNAL'
  | 'INTERNAL_ERROR';

export interface SerializedError {
  name: string;
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
}

export class ShellweaveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShellweaveError';
  }
}

export class ConfigurationError extends ShellweaveError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export abstract class CommandExecutionError extends ShellweaveError {
  abstract readonly code: ErrorCode;
  abstract readonly category: ErrorCategory;
  readonly timestamp: string;

  constructor(
    message: string,
    public readonly command: string
  ) {
    super(message);
    this.name = new.target.name;
    this.timestamp = new Date().toISOString();
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
    };
  }
}

export class InvalidCommandError extends CommandExecutionError {
  readonly code = 'INVALID_COMMAND';
  readonly category = 'validation';
}

export class BlockedCommandError extends CommandExecutionError {
  readonly code = 'BLOCKED_COMMAND';
  readonly category = 'validation';

  constructor(
    command: string,
    public readonly reasons: readonly string[]
  ) {
    super(`Command blocked: ${reasons.join('; ')}`, command);
  }
}

export class ProcessSpawnError extends CommandExecutionError {
  readonly code = 'SPAWN_FAILED';
  readonly category = 'spawn-failure';

  constructor(
    command: string,
    public readonly osCode: string | undefined,
    cause: unknown
  ) {
    super(`Failed to spawn process: ${describeCause(cause)}`, command);
    this.cause = cause;
  }
}

export class TimeoutError extends CommandExecutionError {
  readonly code = 'TIMEOUT';
  readonly category = 'timeout';

  constructor(
    command: string,
    public readonly timeoutMs: number
  ) {
    super(`Command timed out after ${timeoutMs}ms`, command);
  }
}

export class CancelledError extends CommandExecutionError {
  readonly code = 'CANCELLED';
  readonly category = 'cancelled';

  constructor(command: string) {
    super('Command was cancelled', command);
  }
}

export class ResourceExhaustedError extends CommandExecutionError {
  readonly code = 'POOL_EXHAUSTED';
  readonly category = 'resource-exhausted';

  constructor(
    command: string,
    public readonly maxConcurrent: number
  ) {
    super(`Too many concurrent processes (max ${maxConcurrent})`, command);
  }
}

export class NonZeroExitError extends CommandExecutionError {
  readonly code: 'NON_ZERO_EXIT' | 'TERMINATED_BY_SIGNAL';
  readonly category = 'non-zero-exit';

  constructor(
    command: string,
    public readonly exitCode: number | undefined,
    public readonly signal: string | undefined
  ) {
    super(
      signal
        ? `Process terminated with signal: ${signal}`
        : `Process exited with code ${exitCode ?? 'unknown'}`,
      command
    );
    this.code = signal ? 'TERMINATED_BY_SIGNAL' : 'NON_ZERO_EXIT';
  }
}

export class InternalExecutionError extends CommandExecutionError {
  readonly code = 'INTERNAL_ERROR';
  readonly category = 'internal';

  constructor(command: string, cause: unknown) {
    super(`Internal execution fault: ${describeCause(cause)}`, command);
    this.cause = cause;
  }
}

/**
 * Whether a caller may reasonably retry a failure of this category
 */
export function isRetryableCategory(category: ErrorCategory): boolean {
  return category === 'resource-exhausted';
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
