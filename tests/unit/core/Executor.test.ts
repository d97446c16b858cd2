/**
 * Unit tests for Executor paths that resolve before a process is spawned
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Executor } from '../../../src/core/Executor.js';
import { ShellClassifier } from '../../../src/core/ShellClassifier.js';
import { CommandNormalizer } from '../../../src/core/CommandNormalizer.js';
import { CommandGuard } from '../../../src/core/CommandGuard.js';
import { ProcessPool } from '../../../src/core/ProcessPool.js';
import { PerformanceTracker } from '../../../src/core/PerformanceTracker.js';
import { isFailureResult } from '../../../src/core/results.js';
import type { CommandResult, FailureResult } from '../../../src/core/types.js';
import { Logger } from '../../../src/shared/utils/logger.js';
import { SH_ONLY_SHELLS } from '../../helpers/engineHelpers.js';

function expectFailure(result: CommandResult): FailureResult {
  if (!isFailureResult(result)) {
    throw new Error(`Expected a failure, got exit code ${result.exitCode}`);
  }
  return result;
}

describe('Executor', () => {
  let pool: ProcessPool;
  let logger: Logger;
  let executor: Executor;

  const build = (rewriteDrivePaths = false): Executor =>
    new Executor({
      classifier: new ShellClassifier(SH_ONLY_SHELLS),
      normalizer: new CommandNormalizer({ rewriteDrivePaths }),
      guard: new CommandGuard(),
      pool,
      logger,
      metrics: new PerformanceTracker(),
    });

  beforeEach(() => {
    pool = new ProcessPool(1);
    logger = new Logger({ level: 'debug' });
    executor = build();
  });

  describe('validation', () => {
    it('should reject an empty command', async () => {
      const record = vi.spyOn(logger, 'record');

      const result = expectFailure(await executor.run(''));

      expect(result.error.code).toBe('INVALID_COMMAND');
      expect(result.error.message).toBe('Command is empty');
      expect(result.exitCode).toBe(-1);
      expect(result.stdout).toBe('');
      expect(result.stderr).toBe('');
      expect(record).toHaveBeenCalledWith(
        'warn',
        'Command failed',
        expect.objectContaining({ errorCode: 'INVALID_COMMAND', outcome: 'validation' }),
        'Executor',
        result.correlationId
      );
    });

    it('should reject a command containing NUL', async () => {
      const result = expectFailure(await executor.run('echo a\x00b'));
      expect(result.error.message).toBe('Command contains a NUL byte');
    });

    it.each([0, -5, 1.5])('should reject timeoutMs %s', async (timeoutMs) => {
      const result = expectFailure(await executor.run('echo hi', { timeoutMs }));

      expect(result.error.code).toBe('INVALID_COMMAND');
      expect(result.error.message).toBe(`Timeout must be a positive integer, got ${timeoutMs}`);
    });

    it('should reject a distribution name that is not a plain identifier', async () => {
      const result = expectFailure(await executor.run('wsl ls', { distribution: 'Ubuntu; rm' }));

      expect(result.error.code).toBe('INVALID_COMMAND');
      expect(result.error.message).toBe('Invalid distribution name: "Ubuntu; rm"');
    });

    it('should not touch the pool for invalid input', async () => {
      await executor.run('   ');
      expect(pool.getStats()).toMatchObject({ admitted: 0, refused: 0 });
    });
  });

  describe('guard', () => {
    it('should block destructive commands', async () => {
      const result = expectFailure(await executor.run('rm -rf /'));

      expect(result.error.code).toBe('BLOCKED_COMMAND');
      expect(result.error.category).toBe('validation');
      expect(result.error.message).toBe('Command blocked: Deletes root filesystem');
      expect(result.command).toBe('rm -rf /');
      expect(pool.getStats().admitted).toBe(0);
    });

    it('should inspect the normalized text as well', async () => {
      executor = build(true);

      const result = expectFailure(await executor.run('del /s /q /c/'));

      expect(result.error.code).toBe('BLOCKED_COMMAND');
      expect(result.command).toBe('del /s /q C:\\');
      expect(result.originalCommand).toBe('del /s /q /c/');
    });
  });

  it('should report a pre-aborted signal as cancelled without spawning', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = expectFailure(await executor.run('echo hi', { signal: controller.signal }));

    expect(result.error.code).toBe('CANCELLED');
    expect(result.error.category).toBe('cancelled');
    expect(pool.getStats().admitted).toBe(0);
  });

  it('should refuse admission when the pool is full', async () => {
    const held = pool.tryAdmit();
    expect(held).not.toBeNull();

    const result = expectFailure(await executor.run('echo one && echo two'));

    expect(result.error.code).toBe('POOL_EXHAUSTED');
    expect(result.error.category).toBe('resource-exhausted');
    expect(result.error.message).toBe('Too many concurrent processes (max 1)');
    expect(result.command).toBe('echo one ; echo two');
    expect(result.backend).toBe('console');
    expect(pool.getStats()).toMatchObject({ active: 1, refused: 1 });
  });

  it('should pass the correlation id and description through', async () => {
    const record = vi.spyOn(logger, 'record');

    const result = await executor.run('', { correlationId: 'corr-1', description: 'lint step' });

    expect(result.correlationId).toBe('corr-1');
    expect(record).toHaveBeenCalledWith(
      'warn',
      'Command failed',
      expect.objectContaining({ description: 'lint step' }),
      'Executor',
      'corr-1'
    );
  });

  it('should generate distinct correlation ids', async () => {
    const first = await executor.run('');
    const second = await executor.run('');
    expect(first.correlationId).not.toBe(second.correlationId);
  });

  it('should record metrics for every outcome', async () => {
    await executor.run('');
    await executor.run('rm -rf /');

    const metrics = executor.getMetrics();
    expect(metrics.commandsExecuted).toBe(2);
    expect(metrics.successRate).toBe(0);

    executor.resetMetrics();
    expect(executor.getMetrics().commandsExecuted).toBe(0);
  });

  it('should expose pool and cache stats', async () => {
    pool.tryAdmit();
    await executor.run('echo hi');

    const stats = executor.getStats();
    expect(stats.pool).toMatchObject({ active: 1, max: 1, refused: 1 });
    expect(stats.metrics.commandsExecuted).toBe(1);
    expect(stats.normalizerCache.size).toBe(1);
    expect(stats.classifierCache.size).toBe(1);
  });
});
