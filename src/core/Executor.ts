/**
 * Executor - runs one command end to end
 *
 * validate -> guard -> normalize -> classify -> admit -> spawn -> collect
 *
 * Everything up to admission is synchronous, so concurrent run() calls are
 * admitted in call order. Operational faults come back as a FailureResult;
 * run() only rejects on a programming error.
 */

import { execa, ExecaError } from 'execa';
import { v4 as uuidv4 } from 'uuid';
import type { Logger, LogLevel } from '../shared/utils/logger.js';
import type { FifoCacheStats } from '../shared/utils/cache.js';
import {
  BlockedCommandError,
  CancelledError,
  CommandExecutionError,
  InvalidCommandError,
  NonZeroExitError,
  ProcessSpawnError,
  ResourceExhaustedError,
  TimeoutError,
} from '../shared/utils/errors.js';
import type { Command, CommandResult, ExecutionOptions, PerformanceMetrics, ShellPlan } from './types.js';
import type { CommandGuard } from './CommandGuard.js';
import type { CommandNormalizer } from './CommandNormalizer.js';
import type { PoolSlot, PoolStats, ProcessPool } from './ProcessPool.js';
import { planArguments, withDistribution, type ShellClassifier } from './ShellClassifier.js';
import { describeInvalidCommand } from './command.js';
import { OutputCollector } from './OutputCollector.js';
import { SPAWN_AS_GROUP, Termination, processTreeOf } from './termination.js';
import { PerformanceTracker } from './PerformanceTracker.js';
import { buildFailure, buildSuccess, type ResultContext } from './results.js';

const COMPONENT = 'Executor';
const DISTRIBUTION_NAME = /^[\w.-]+$/;

export interface ExecutorDependencies {
  classifier: ShellClassifier;
  normalizer: CommandNormalizer;
  guard: CommandGuard;
  pool: ProcessPool;
  logger: Logger;
  metrics?: PerformanceTracker;
}

export interface ExecutorSettings {
  defaultTimeoutMs: number;
  /**
   * Delay between SIGTERM and SIGKILL on timeout or cancellation
   */
  killGraceMs: number;
  /**
   * Per-stream capture limit
   */
  maxOutputBytes: number;
  encoding: BufferEncoding;
}

export interface ExecutorStats {
  pool: PoolStats;
  metrics: PerformanceMetrics;
  classifierCache: FifoCacheStats;
  normalizerCache: FifoCacheStats;
}

const DEFAULT_SETTINGS: ExecutorSettings = {
  defaultTimeoutMs: 120_000,
  killGraceMs: 5_000,
  maxOutputBytes: 10 * 1024 * 1024,
  encoding: 'utf8',
};

interface RunRecord {
  plan?: ShellPlan;
  description?: string;
}

export class Executor {
  private readonly settings: ExecutorSettings;
  private readonly metrics: PerformanceTracker;

  constructor(
    private readonly deps: ExecutorDependencies,
    settings: Partial<ExecutorSettings> = {}
  ) {
    this.settings = { ...DEFAULT_SETTINGS, ...settings };
    this.metrics = deps.metrics ?? new PerformanceTracker();
  }

  async run(raw: string, options: ExecutionOptions = {}): Promise<CommandResult> {
    const started = performance.now();
    const correlationId = options.correlationId ?? uuidv4();
    const record: RunRecord = { description: options.description };
    const original = typeof raw === 'string' ? raw : '';
    const context = (overrides: Partial<ResultContext> = {}): ResultContext => ({
      command: original,
      originalCommand: original,
      correlationId,
      duration: performance.now() - started,
      ...overrides,
    });

    const invalid = describeInvalidCommand(raw) ?? this.describeInvalidOptions(options);
    if (invalid !== undefined) {
      const error = new InvalidCommandError(invalid, original);
      return this.complete(buildFailure(context(), error), record);
    }

    const rawFinding = this.deps.guard.inspect(raw);
    if (rawFinding.blocked) {
      return this.complete(
        buildFailure(context(), new BlockedCommandError(raw, rawFinding.reasons)),
        record
      );
    }

    if (options.signal?.aborted) {
      return this.complete(buildFailure(context(), new CancelledError(raw)), record);
    }

    let command: Command;
    try {
      command = this.deps.normalizer.normalize(raw);
    } catch (error) {
      if (error instanceof InvalidCommandError) {
        return this.complete(buildFailure(context(), error), record);
      }
      throw error;
    }

    // Rewritten drive paths can turn a harmless-looking command into a blocked one
    if (command !== raw) {
      const finding = this.deps.guard.inspect(command);
      if (finding.blocked) {
        return this.complete(
          buildFailure(context({ command }), new BlockedCommandError(command, finding.reasons)),
          record
        );
      }
    }

    const plan = withDistribution(
      this.deps.classifier.classify(command, options.shell),
      options.distribution
    );
    record.plan = plan;

    const slot = this.deps.pool.tryAdmit();
    if (!slot) {
      const error = new ResourceExhaustedError(command, this.deps.pool.max);
      return this.complete(
        buildFailure(context({ command, backend: plan.backend }), error),
        record
      );
    }

    try {
      const outcome = await this.spawn(plan, slot, options);
      const ctx = context({
        command,
        backend: plan.backend,
        stdout: outcome.stdout,
        stderr: outcome.stderr,
        truncated: outcome.truncated,
      });
      const result = outcome.error
        ? buildFailure(ctx, outcome.error, outcome.exitCode)
        : buildSuccess(ctx);
      return this.complete(result, record);
    } finally {
      this.deps.pool.release(slot);
    }
  }

  getMetrics(): PerformanceMetrics {
    return this.metrics.snapshot();
  }

  resetMetrics(): void {
    this.metrics.reset();
  }

  getStats(): ExecutorStats {
    return {
      pool: this.deps.pool.getStats(),
      metrics: this.metrics.snapshot(),
      classifierCache: this.deps.classifier.getCacheStats(),
      normalizerCache: this.deps.normalizer.getCacheStats(),
    };
  }

  private describeInvalidOptions(options: ExecutionOptions): string | undefined {
    if (
      options.timeoutMs !== undefined &&
      (!Number.isInteger(options.timeoutMs) || options.timeoutMs <= 0)
    ) {
      return `Timeout must be a positive integer, got ${options.timeoutMs}`;
    }
    if (options.distribution !== undefined && !DISTRIBUTION_NAME.test(options.distribution)) {
      return `Invalid distribution name: ${JSON.stringify(options.distribution)}`;
    }
    return undefined;
  }

  private async spawn(
    plan: ShellPlan,
    slot: PoolSlot,
    options: ExecutionOptions
  ): Promise<SpawnOutcome> {
    const stdout = new OutputCollector(this.settings.maxOutputBytes);
    const stderr = new OutputCollector(this.settings.maxOutputBytes);
    const encoding = options.encoding ?? this.settings.encoding;
    const timeoutMs = options.timeoutMs ?? this.settings.defaultTimeoutMs;

    const collected = (error?: CommandExecutionError, exitCode = 0): SpawnOutcome => ({
      stdout: stdout.toString(encoding),
      stderr: stderr.toString(encoding),
      truncated: stdout.truncated || stderr.truncated,
      error,
      exitCode,
    });

    const subprocess = execa(plan.executable, planArguments(plan), {
      cwd: options.cwd,
      env: options.env,
      extendEnv: true,
      stdin: 'ignore',
      buffer: false,
      detached: SPAWN_AS_GROUP,
      forceKillAfterDelay: false,
      windowsHide: true,
      windowsVerbatimArguments: plan.argumentMode === 'verbatim',
    });
    const tree = processTreeOf(subprocess);
    slot.bind(tree);

    // Timeout and cancellation signal the whole tree, not just the shell
    const termination = new Termination(tree, this.settings.killGraceMs);
    const timer = setTimeout(() => termination.begin('timeout'), timeoutMs);
    const onAbort = (): void => termination.begin('cancelled');
    options.signal?.addEventListener('abort', onAbort, { once: true });

    subprocess.stdout?.on('data', (chunk: Buffer | string) => stdout.push(chunk));
    subprocess.stderr?.on('data', (chunk: Buffer | string) => stderr.push(chunk));

    const command = plan.commandText;
    const terminated = (exitCode: number): SpawnOutcome | null => {
      switch (termination.reason) {
        case 'cancelled':
          return collected(new CancelledError(command), exitCode);
        case 'timeout':
          return collected(new TimeoutError(command, timeoutMs), exitCode);
        default:
          return null;
      }
    };

    try {
      await subprocess;
      return terminated(0) ?? collected();
    } catch (error) {
      if (!(error instanceof ExecaError)) {
        throw error;
      }

      const stopped = terminated(error.exitCode ?? -1);
      if (stopped) {
        return stopped;
      }
      if (error.code !== undefined && error.exitCode === undefined && error.signal === undefined) {
        const exitCode = error.code === 'ENOENT' ? 127 : -1;
        return collected(new ProcessSpawnError(command, error.code, error), exitCode);
      }
      return collected(
        new NonZeroExitError(command, error.exitCode, error.signal),
        error.exitCode ?? -1
      );
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      termination.settle();
    }
  }

  private complete(result: CommandResult, record: RunRecord): CommandResult {
    this.metrics.record(result.duration, result.success);

    const payload: Record<string, unknown> = {
      command: result.command,
      originalCommand: result.originalCommand,
      backend: result.backend,
      executable: record.plan?.executable,
      detector: record.plan?.detector,
      duration: Math.round(result.duration),
      exitCode: result.exitCode,
      outcome: result.success ? 'success' : result.error.category,
      truncated: result.truncated || undefined,
      description: record.description,
    };

    if (result.success) {
      this.deps.logger.record('info', 'Command completed', payload, COMPONENT, result.correlationId);
      return result;
    }

    payload.errorCode = result.error.code;
    payload.error = result.error.message;
    this.deps.logger.record(
      levelFor(result.error),
      'Command failed',
      payload,
      COMPONENT,
      result.correlationId
    );
    return result;
  }
}

interface SpawnOutcome {
  stdout: string;
  stderr: string;
  truncated: boolean;
  error?: CommandExecutionError;
  exitCode: number;
}

function levelFor(error: CommandExecutionError): LogLevel {
  switch (error.category) {
    case 'spawn-failure':
    case 'timeout':
    case 'internal':
      return 'error';
    default:
      return 'warn';
  }
}
