/**
 * Unit tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  BlockedCommandError,
  CancelledError,
  CommandExecutionError,
  ConfigurationError,
  InternalExecutionError,
  InvalidCommandError,
  NonZeroExitError,
  ProcessSpawnError,
  ResourceExhaustedError,
  ShellweaveError,
  TimeoutError,
  isRetryableCategory,
} from '../../../src/shared/utils/errors.js';

describe('errors', () => {
  it.each([
    [new InvalidCommandError('Command is empty', ''), 'INVALID_COMMAND', 'validation'],
    [new BlockedCommandError('rm -rf /', ['Deletes root filesystem']), 'BLOCKED_COMMAND', 'validation'],
    [new ProcessSpawnError('x', 'ENOENT', new Error('spawn x ENOENT')), 'SPAWN_FAILED', 'spawn-failure'],
    [new TimeoutError('sleep 9', 500), 'TIMEOUT', 'timeout'],
    [new CancelledError('sleep 9'), 'CANCELLED', 'cancelled'],
    [new ResourceExhaustedError('echo', 4), 'POOL_EXHAUSTED', 'resource-exhausted'],
    [new NonZeroExitError('false', 1, undefined), 'NON_ZERO_EXIT', 'non-zero-exit'],
    [new InternalExecutionError('echo', new Error('boom')), 'INTERNAL_ERROR', 'internal'],
  ])('%s should carry its code and category', (error, code, category) => {
    expect(error).toBeInstanceOf(CommandExecutionError);
    expect(error).toBeInstanceOf(ShellweaveError);
    expect(error.code).toBe(code);
    expect(error.category).toBe(category);
    expect(error.name).toBe(error.constructor.name);
  });

  it('should describe blocked reasons', () => {
    const error = new BlockedCommandError('x', ['Fork bomb', 'Formats filesystem']);
    expect(error.message).toBe('Command blocked: Fork bomb; Formats filesystem');
    expect(error.reasons).toEqual(['Fork bomb', 'Formats filesystem']);
  });

  it('should wrap the spawn cause', () => {
    const cause = new Error('spawn nope ENOENT');
    const error = new ProcessSpawnError('nope', 'ENOENT', cause);
    expect(error.message).toBe('Failed to spawn process: spawn nope ENOENT');
    expect(error.osCode).toBe('ENOENT');
    expect(error.cause).toBe(cause);
  });

  it('should distinguish signal termination from a non-zero exit', () => {
    const exited = new NonZeroExitError('exit 3', 3, undefined);
    const killed = new NonZeroExitError('sleep 9', undefined, 'SIGKILL');

    expect(exited.message).toBe('Process exited with code 3');
    expect(killed.code).toBe('TERMINATED_BY_SIGNAL');
    expect(killed.category).toBe('non-zero-exit');
    expect(killed.message).toBe('Process terminated with signal: SIGKILL');
  });

  it('should serialize to name, code, category and message', () => {
    expect(new ResourceExhaustedError('echo', 4).toJSON()).toEqual({
      name: 'ResourceExhaustedError',
      code: 'POOL_EXHAUSTED',
      category: 'resource-exhausted',
      message: 'Too many concurrent processes (max 4)',
    });
  });

  it('should mark only resource exhaustion as retryable', () => {
    expect(isRetryableCategory('resource-exhausted')).toBe(true);
    expect(isRetryableCategory('timeout')).toBe(false);
    expect(isRetryableCategory('validation')).toBe(false);
  });

  it('should keep configuration issues', () => {
    const error = new ConfigurationError('Invalid configuration', ['pool.maxConcurrent: bad']);
    expect(error.name).toBe('ConfigurationError');
    expect(error.issues).toEqual(['pool.maxConcurrent: bad']);
  });
});
