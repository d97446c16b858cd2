/**
 * Result construction and serialization
 */

import type { CommandExecutionError, SerializedError } from '../shared/utils/errors.js';
import type { BackendKind, CommandResult, FailureResult, SuccessResult } from './types.js';

export interface ResultContext {
  command: string;
  originalCommand: string;
  backend?: BackendKind;
  correlationId: string;
  duration: number;
  stdout?: string;
  stderr?: string;
  truncated?: boolean;
}

export function buildSuccess(context: ResultContext): SuccessResult {
  const result: SuccessResult = {
    success: true,
    exitCode: 0,
    ...fields(context),
  };
  return Object.freeze(result);
}

export function buildFailure(
  context: ResultContext,
  error: CommandExecutionError,
  exitCode = -1
): FailureResult {
  const result: FailureResult = {
    success: false,
    exitCode,
    error,
    ...fields(context),
  };
  return Object.freeze(result);
}

export function isSuccessResult(result: CommandResult): result is SuccessResult {
  return result.success;
}

export function isFailureResult(result: CommandResult): result is FailureResult {
  return !result.success;
}

interface SerializedResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  duration: number;
  timestamp: string;
  command: string;
  backend: BackendKind | null;
  correlationId: string;
  truncated: boolean;
  error?: SerializedError;
}

/**
 * One JSON line per result, for hosts that speak line-delimited JSON
 */
export function serializeResult(result: CommandResult): string {
  const serialized: SerializedResult = {
    success: result.success,
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
    duration: result.duration,
    timestamp: result.timestamp,
    command: result.command,
    backend: result.backend ?? null,
    correlationId: result.correlationId,
    truncated: result.truncated,
  };
  if (!result.success) {
    serialized.error = result.error.toJSON();
  }
  return JSON.stringify(serialized);
}

function fields(context: ResultContext) {
  return {
    stdout: context.stdout ?? '',
    stderr: context.stderr ?? '',
    command: context.command,
    originalCommand: context.originalCommand,
    backend: context.backend,
    duration: context.duration,
    timestamp: new Date().toISOString(),
    correlationId: context.correlationId,
    truncated: context.truncated ?? false,
  };
}
