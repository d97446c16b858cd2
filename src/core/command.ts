/**
 * Command validation at the call boundary
 */

import type { Command } from './types.js';
import { InvalidCommandError } from '../shared/utils/errors.js';

/**
 * Non-empty, not blank, no NUL bytes
 */
export function isValidCommand(value: unknown): value is Command {
  return (
    typeof value === 'string' &&
    value.length > 0 &&
    value.trim().length > 0 &&
    !value.includes('\x00')
  );
}

/**
 * Explains why a raw value is not a valid command, or returns undefined when it is
 */
export function describeInvalidCommand(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return `Command must be a string, received ${value === null ? 'null' : typeof value}`;
  }
  if (value.trim().length === 0) {
    return 'Command is empty';
  }
  if (value.includes('\x00')) {
    return 'Command contains a NUL byte';
  }
  return undefined;
}

export function toCommand(value: unknown): Command {
  if (isValidCommand(value)) {
    return value;
  }
  const reason = describeInvalidCommand(value) ?? 'Invalid command';
  throw new InvalidCommandError(reason, typeof value === 'string' ? value : '');
}
