/**
 * Rolling execution metrics
 */

import type { PerformanceMetrics } from './types.js';

type Counters = Omit<PerformanceMetrics, 'memoryUsage'>;

export class PerformanceTracker {
  private metrics: Counters = PerformanceTracker.empty();
  private successes = 0;

  /**
   * Record one completed run
   */
  record(durationMs: number, success: boolean): void {
    this.metrics.commandsExecuted++;
    this.metrics.totalDuration += durationMs;
    this.metrics.averageDuration = this.metrics.totalDuration / this.metrics.commandsExecuted;
    if (success) {
      this.successes++;
    }
    this.metrics.successRate = this.successes / this.metrics.commandsExecuted;
  }

  snapshot(): PerformanceMetrics {
    return { ...this.metrics, memoryUsage: process.memoryUsage() };
  }

  reset(): void {
    this.metrics = PerformanceTracker.empty();
    this.successes = 0;
  }

  private static empty(): Counters {
    return {
      commandsExecuted: 0,
      totalDuration: 0,
      averageDuration: 0,
      successRate: 1,
      lastReset: new Date().toISOString(),
    };
  }
}
