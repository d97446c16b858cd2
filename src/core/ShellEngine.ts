/**
 * ShellEngine - wires configuration into a ready-to-use executor
 *
 * The engine installs no process-wide listeners. Hosts that want signal
 * handling call installSignalHandlers({ onCleanup: () => engine.shutdown() }).
 */

import { ConfigLoader, type ConfigLoadOptions } from '../config/ConfigLoader.js';
import type { EngineConfig } from '../config/schemas.js';
import type { IFileSystem } from '../platform/IFileSystem.js';
import { Logger, type LoggerStats } from '../shared/utils/logger.js';
import { BatchRunner, type BatchOptions } from './BatchRunner.js';
import { CommandGuard } from './CommandGuard.js';
import { CommandNormalizer } from './CommandNormalizer.js';
import { Executor, type ExecutorStats } from './Executor.js';
import { PerformanceTracker } from './PerformanceTracker.js';
import { ProcessPool } from './ProcessPool.js';
import { ShellClassifier } from './ShellClassifier.js';
import type { CommandResult, ExecutionOptions } from './types.js';

export interface EngineStats extends ExecutorStats {
  logging: LoggerStats;
}

export class ShellEngine {
  readonly executor: Executor;
  readonly batchRunner: BatchRunner;
  readonly pool: ProcessPool;
  readonly logger: Logger;
  private shutdownPromise: Promise<void> | null = null;

  constructor(readonly config: EngineConfig) {
    this.logger = new Logger({
      file: config.logging.file ?? undefined,
      level: config.logging.level,
      console: config.logging.console,
      bufferBytes: config.logging.bufferBytes,
      flushIntervalMs: config.logging.flushIntervalMs,
      maxFileBytes: config.logging.maxFileBytes,
      maxBackups: config.logging.maxBackups,
    });
    this.pool = new ProcessPool(config.pool.maxConcurrent);

    this.executor = new Executor(
      {
        classifier: new ShellClassifier(config.shells, config.classifier),
        normalizer: new CommandNormalizer(config.normalizer),
        guard: new CommandGuard(config.guard),
        pool: this.pool,
        logger: this.logger,
        metrics: new PerformanceTracker(),
      },
      config.execution
    );
    this.batchRunner = new BatchRunner(this.executor, this.pool.max, this.logger);

    this.logger.debug('Engine started', {
      maxConcurrent: config.pool.maxConcurrent,
      shells: Object.fromEntries(
        Object.entries(config.shells).map(([backend, shell]) => [backend, shell.executable])
      ),
    });
  }

  /**
   * Load configuration (defaults, global, project, env, overrides) and build an engine
   */
  static async create(
    options: ConfigLoadOptions = {},
    fs?: IFileSystem
  ): Promise<ShellEngine> {
    const config = await new ConfigLoader(fs).load(options);
    return new ShellEngine(config);
  }

  run(command: string, options?: ExecutionOptions): Promise<CommandResult> {
    return this.executor.run(command, options);
  }

  runBatch(commands: readonly string[], options?: BatchOptions): Promise<readonly CommandResult[]> {
    return this.batchRunner.runBatch(commands, options);
  }

  getStats(): EngineStats {
    return { ...this.executor.getStats(), logging: this.logger.getStats() };
  }

  /**
   * Kill tracked children, then flush and close the audit log. Runs once.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      const killed = this.pool.killAll('SIGTERM');
      this.logger.info('Engine shutting down', { killed });
      this.shutdownPromise = this.logger.flush().finally(() => this.logger.dispose());
    }
    return this.shutdownPromise;
  }
}
