/**
 * ProcessPool - admission control for child processes
 *
 * Admission is refused, never queued, once the limit is reached. Slots are
 * released exactly once; later releases (exit racing a timeout kill, or a
 * pool-wide kill) are no-ops.
 */

import type { KillableProcess, TerminationSignal } from './types.js';

export interface PoolSlot {
  readonly id: number;
  readonly released: boolean;
  readonly process: KillableProcess | null;
  /**
   * Attach the spawned child so killAll() can reach it
   */
  bind(process: KillableProcess): void;
  release(): void;
}

export interface PoolStats {
  active: number;
  max: number;
  peak: number;
  admitted: number;
  refused: number;
}

class Slot implements PoolSlot {
  private child: KillableProcess | null = null;
  private isReleased = false;

  constructor(
    readonly id: number,
    private readonly onRelease: (slot: Slot) => void
  ) {}

  get released(): boolean {
    return this.isReleased;
  }

  get process(): KillableProcess | null {
    return this.child;
  }

  bind(process: KillableProcess): void {
    if (!this.isReleased) {
      this.child = process;
    }
  }

  release(): void {
    if (this.isReleased) {
      return;
    }
    this.isReleased = true;
    this.child = null;
    this.onRelease(this);
  }
}

export class ProcessPool {
  private slots = new Set<Slot>();
  private nextId = 1;
  private peak = 0;
  private admitted = 0;
  private refused = 0;

  constructor(private readonly maxConcurrent = 10) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  get max(): number {
    return this.maxConcurrent;
  }

  /**
   * Reserve a slot, or return null when the pool is full
   */
  tryAdmit(): PoolSlot | null {
    if (this.slots.size >= this.maxConcurrent) {
      this.refused++;
      return null;
    }

    const slot = new Slot(this.nextId++, (released) => {
      this.slots.delete(released);
    });
    this.slots.add(slot);
    this.admitted++;
    this.peak = Math.max(this.peak, this.slots.size);
    return slot;
  }

  release(slot: PoolSlot): void {
    slot.release();
  }

  /**
   * Signal every tracked child and forget them. Does not wait for exit.
   * Returns the number of processes signalled.
   */
  killAll(signal: TerminationSignal = 'SIGTERM'): number {
    const tracked = Array.from(this.slots);
    let signalled = 0;

    for (const slot of tracked) {
      const child = slot.process;
      if (child) {
        child.kill(signal);
        signalled++;
      }
      slot.release();
    }

    this.slots.clear();
    return signalled;
  }

  getStats(): PoolStats {
    return {
      active: this.slots.size,
      max: this.maxConcurrent,
      peak: this.peak,
      admitted: this.admitted,
      refused: this.refused,
    };
  }
}
