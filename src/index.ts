/**
 * Main entry point
 * Exports public API
 */

export * from './core/types.js';
export { isValidCommand, toCommand, describeInvalidCommand } from './core/command.js';
export { ShellClassifier, planArguments, withDistribution } from './core/ShellClassifier.js';
export type { ShellClassifierOptions, Detection } from './core/ShellClassifier.js';
export { CommandNormalizer } from './core/CommandNormalizer.js';
export type { CommandNormalizerOptions } from './core/CommandNormalizer.js';
export { CommandGuard } from './core/CommandGuard.js';
export type { CommandGuardOptions, GuardFinding } from './core/CommandGuard.js';
export { ProcessPool } from './core/ProcessPool.js';
export type { PoolSlot, PoolStats } from './core/ProcessPool.js';
export { OutputCollector } from './core/OutputCollector.js';
export { Termination, processTreeOf } from './core/termination.js';
export type { TerminationReason } from './core/termination.js';
export { PerformanceTracker } from './core/PerformanceTracker.js';
export { Executor } from './core/Executor.js';
export type { ExecutorDependencies, ExecutorSettings, ExecutorStats } from './core/Executor.js';
export { BatchRunner } from './core/BatchRunner.js';
export type { BatchOptions } from './core/BatchRunner.js';
export { ShellEngine } from './core/ShellEngine.js';
export type { EngineStats } from './core/ShellEngine.js';
export * from './core/results.js';

export * from './config/schemas.js';
export * from './config/defaults.js';
export * from './config/ConfigLoader.js';
export * from './platform/index.js';

export * from './shared/utils/logger.js';
export { AuditFileSink } from './shared/utils/AuditFileSink.js';
export type { AuditFileSinkOptions, AuditFileSinkStats } from './shared/utils/AuditFileSink.js';
export * from './shared/utils/errors.js';
export * from './shared/utils/signalHandler.js';
export { FifoCache } from './shared/utils/cache.js';
export type { FifoCacheOptions, FifoCacheStats } from './shared/utils/cache.js';
