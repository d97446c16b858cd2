/**
 * Unit tests for PerformanceTracker
 */

import { describe, it, expect, vi } from 'vitest';
import { PerformanceTracker } from '../../../src/core/PerformanceTracker.js';

describe('PerformanceTracker', () => {
  it('should start empty with a perfect success rate', () => {
    const tracker = new PerformanceTracker();
    expect(tracker.snapshot()).toMatchObject({
      commandsExecuted: 0,
      totalDuration: 0,
      averageDuration: 0,
      successRate: 1,
    });
  });

  it('should aggregate durations and outcomes', () => {
    const tracker = new PerformanceTracker();
    tracker.record(100, true);
    tracker.record(300, false);

    expect(tracker.snapshot()).toMatchObject({
      commandsExecuted: 2,
      totalDuration: 400,
      averageDuration: 200,
      successRate: 0.5,
    });
  });

  it('should return copies from snapshot', () => {
    const tracker = new PerformanceTracker();
    const snapshot = tracker.snapshot();
    snapshot.commandsExecuted = 99;

    expect(tracker.snapshot().commandsExecuted).toBe(0);
  });

  it('should report host memory with each snapshot', () => {
    const memory = process.memoryUsage();
    vi.spyOn(process, 'memoryUsage').mockReturnValue(memory);

    expect(new PerformanceTracker().snapshot().memoryUsage).toBe(memory);
  });

  it('should clear everything on reset', () => {
    const tracker = new PerformanceTracker();
    tracker.record(50, false);
    tracker.reset();

    const snapshot = tracker.snapshot();
    expect(snapshot.commandsExecuted).toBe(0);
    expect(snapshot.successRate).toBe(1);
    expect(Number.isNaN(Date.parse(snapshot.lastReset))).toBe(false);
  });
});
