/**
 * Unit tests for command validation
 */

import { describe, it, expect } from 'vitest';
import { describeInvalidCommand, isValidCommand, toCommand } from '../../../src/core/command.js';
import { InvalidCommandError } from '../../../src/shared/utils/errors.js';

describe('command validation', () => {
  it('should accept ordinary command text', () => {
    expect(isValidCommand('echo hello')).toBe(true);
    expect(describeInvalidCommand('echo hello')).toBeUndefined();
  });

  it('should reject empty and blank text', () => {
    expect(isValidCommand('')).toBe(false);
    expect(isValidCommand('   \t')).toBe(false);
    expect(describeInvalidCommand('   ')).toBe('Command is empty');
  });

  it('should reject NUL bytes', () => {
    expect(isValidCommand('echo a\x00b')).toBe(false);
    expect(describeInvalidCommand('echo a\x00b')).toBe('Command contains a NUL byte');
  });

  it('should reject non-string values', () => {
    expect(isValidCommand(42)).toBe(false);
    expect(describeInvalidCommand(null)).toBe('Command must be a string, received null');
    expect(describeInvalidCommand(42)).toBe('Command must be a string, received number');
  });

  it('should throw InvalidCommandError from toCommand', () => {
    expect(toCommand('ls -la')).toBe('ls -la');
    expect(() => toCommand('')).toThrow(InvalidCommandError);
    try {
      toCommand('');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidCommandError);
      if (error instanceof InvalidCommandError) {
        expect(error.code).toBe('INVALID_COMMAND');
        expect(error.category).toBe('validation');
        expect(error.message).toBe('Command is empty');
      }
    }
  });
});
