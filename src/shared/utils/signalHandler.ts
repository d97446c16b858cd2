/**
 * Graceful signal handling (SIGINT, SIGTERM)
 *
 * Opt-in for hosts embedding the engine. Typical use:
 *   installSignalHandlers({ onCleanup: () => engine.shutdown() })
 */

import type { Logger } from './logger.js';

export interface SignalHandlerOptions {
  /**
   * Callback to run before exit, e.g. kill children and flush the audit log
   */
  onCleanup?: () => Promise<void> | void;

  /**
   * Rapid SIGINTs that exit with 130 without waiting for onCleanup.
   * Unset disables the emergency exit.
   */
  emergencyExitCount?: number;

  /**
   * Timeout in ms for cleanup; exits with code 1 when exceeded
   * Default: 5000
   */
  cleanupTimeout?: number;

  /**
   * Time window in ms for counting rapid SIGINTs
   * Default: 2000
   */
  rapidPressWindow?: number;

  logger?: Logger;

  /**
   * Process exit, replaceable in tests
   */
  exit?: (code: number) => void;
}

type Listener = () => void;

export class SignalHandler {
  private sigintCount = 0;
  private cleanupTimeout: NodeJS.Timeout | null = null;
  private rapidPressTimeout: NodeJS.Timeout | null = null;
  private isCleaningUp = false;
  private cleanupPromise: Promise<void> | null = null;
  private listeners: Array<[NodeJS.Signals, Listener]> = [];

  private readonly emergencyExitCount: number | undefined;
  private readonly cleanupTimeoutMs: number;
  private readonly rapidPressWindowMs: number;
  private readonly onCleanup?: () => Promise<void> | void;
  private readonly logger?: Logger;
  private readonly exitProcess: (code: number) => void;

  constructor(options: SignalHandlerOptions = {}) {
    this.emergencyExitCount = options.emergencyExitCount;
    this.cleanupTimeoutMs = options.cleanupTimeout ?? 5000;
    this.rapidPressWindowMs = options.rapidPressWindow ?? 2000;
    this.onCleanup = options.onCleanup;
    this.logger = options.logger;
    this.exitProcess = options.exit ?? ((code) => process.exit(code));
  }

  /**
   * Install signal handlers. Call once at host startup.
   */
  install(): void {
    this.listen('SIGINT', () => void this.handleSigint());
    this.listen('SIGTERM', () => void this.gracefulExit('SIGTERM'));

    // Ctrl+Break on Windows
    if (process.platform === 'win32') {
      this.listen('SIGBREAK', () => void this.handleSigint());
    }

    this.logger?.debug('Signal handlers installed', {
      platform: process.platform,
      emergencyExitCount: this.emergencyExitCount,
      cleanupTimeout: this.cleanupTimeoutMs,
    });
  }

  /**
   * Remove the listeners this handler added and cancel pending timers
   */
  uninstall(): void {
    for (const [signal, listener] of this.listeners) {
      process.off(signal, listener);
    }
    this.listeners = [];

    if (this.rapidPressTimeout) {
      clearTimeout(this.rapidPressTimeout);
      this.rapidPressTimeout = null;
    }
    if (this.cleanupTimeout) {
      clearTimeout(this.cleanupTimeout);
      this.cleanupTimeout = null;
    }

    this.logger?.debug('Signal handlers removed');
  }

  private listen(signal: NodeJS.Signals, listener: Listener): void {
    process.on(signal, listener);
    this.listeners.push([signal, listener]);
  }

  private async handleSigint(): Promise<void> {
    this.sigintCount++;

    if (this.rapidPressTimeout) {
      clearTimeout(this.rapidPressTimeout);
    }
    this.rapidPressTimeout = setTimeout(() => {
      this.sigintCount = 0;
    }, this.rapidPressWindowMs);
    this.rapidPressTimeout.unref();

    this.logger?.debug(`SIGINT received (${this.sigintCount})`);

    if (this.emergencyExitCount !== undefined && this.sigintCount >= this.emergencyExitCount) {
      this.logger?.warn('Emergency exit triggered');
      this.exitProcess(130);
      return;
    }

    if (this.sigintCount === 1) {
      await this.gracefulExit('SIGINT');
    }
  }

  private async gracefulExit(signal: NodeJS.Signals): Promise<void> {
    if (this.isCleaningUp) {
      if (this.cleanupPromise) {
        await this.cleanupPromise.catch(() => undefined);
      }
      return;
    }

    this.isCleaningUp = true;
    this.logger?.info(`Graceful shutdown initiated (${signal})`);

    this.cleanupTimeout = setTimeout(() => {
      this.logger?.warn('Cleanup timeout exceeded, forcing exit');
      this.exitProcess(1);
    }, this.cleanupTimeoutMs);

    this.cleanupPromise = this.runCleanup();

    try {
      await this.cleanupPromise;
      this.logger?.info('Cleanup completed successfully');
      this.exitProcess(0);
    } catch (error) {
      this.logger?.error('Error during cleanup', { error: String(error) });
      this.exitProcess(1);
    } finally {
      if (this.cleanupTimeout) {
        clearTimeout(this.cleanupTimeout);
        this.cleanupTimeout = null;
      }
    }
  }

  private async runCleanup(): Promise<void> {
    if (this.onCleanup) {
      await this.onCleanup();
    }
  }
}

/**
 * Install signal handlers with a cleanup callback
 */
export function installSignalHandlers(options: SignalHandlerOptions = {}): SignalHandler {
  const handler = new SignalHandler(options);
  handler.install();
  return handler;
}
