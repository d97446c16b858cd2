/**
 * Two-stage termination of a shell and everything it started
 *
 * On POSIX the shell is spawned as its own process group leader, so a signal
 * sent to `-pid` also reaches the commands it forked (pipelines, `a ; b`,
 * subshells). On Windows the hard stage runs `taskkill /T /F` on the tree.
 */

import { execa } from 'execa';
import type { KillableProcess, TerminationSignal } from './types.js';

export type TerminationReason = 'timeout' | 'cancelled';

/**
 * Spawn the shell detached so it leads a process group of its own
 */
export const SPAWN_AS_GROUP = process.platform !== 'win32';

/**
 * Wrap a spawned shell so kill() signals its whole process tree
 */
export function processTreeOf(child: KillableProcess): KillableProcess {
  return {
    pid: child.pid,
    kill(signal: TerminationSignal = 'SIGTERM'): boolean {
      const pid = child.pid;
      if (pid === undefined) {
        return child.kill(signal);
      }

      if (SPAWN_AS_GROUP) {
        try {
          process.kill(-pid, signal);
          return true;
        } catch {
          // Group already gone (ESRCH); the leader may still await reaping
          return child.kill(signal);
        }
      }

      if (signal === 'SIGKILL') {
        void execa('taskkill', ['/PID', String(pid), '/T', '/F'], {
          reject: false,
          windowsHide: true,
        });
      }
      return child.kill(signal);
    },
  };
}

/**
 * SIGTERM now, SIGKILL after the grace period. The first reason wins.
 */
export class Termination {
  private stage: TerminationReason | null = null;
  private forceTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly target: KillableProcess,
    private readonly graceMs: number
  ) {}

  get reason(): TerminationReason | null {
    return this.stage;
  }

  begin(reason: TerminationReason): void {
    if (this.stage) {
      return;
    }
    this.stage = reason;
    this.target.kill('SIGTERM');
    this.forceTimer = setTimeout(() => {
      this.forceTimer = null;
      this.target.kill('SIGKILL');
    }, this.graceMs);
    this.forceTimer.unref();
  }

  /**
   * Called once the shell has settled. Anything left of a terminated tree is killed outright.
   */
  settle(): void {
    if (this.forceTimer) {
      clearTimeout(this.forceTimer);
      this.forceTimer = null;
      this.target.kill('SIGKILL');
    }
  }
}
