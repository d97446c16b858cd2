/**
 * Core types for the execution engine
 */

import type { CommandExecutionError } from '../shared/utils/errors.js';

type Brand<T, B> = T & { readonly __brand: B };

/**
 * Exact text handed to a shell backend
 */
export type Command = Brand<string, 'Command'>;

/**
 * Shell backends the engine can target
 * - console: native console shell (cmd.exe on Windows, /bin/sh elsewhere)
 * - powershell: PowerShell family (powershell.exe / pwsh)
 * - posix: POSIX subsystem shell (WSL bash on Windows, bash elsewhere)
 */
export const BACKEND_KINDS = ['console', 'powershell', 'posix'] as const;
export type BackendKind = (typeof BACKEND_KINDS)[number];

/**
 * How the command text is attached to the shell's argv
 * - append: passed as one trailing argument, quoted by the runtime
 * - verbatim: wrapped in double quotes and passed without further escaping
 */
export type ArgumentMode = 'append' | 'verbatim';

export interface ShellDefinition {
  readonly executable: string;
  readonly args: readonly string[];
  readonly argumentMode: ArgumentMode;
}

export type ShellTable = Readonly<Record<BackendKind, ShellDefinition>>;

/**
 * Which detector produced a plan
 */
export type DetectorName = 'override' | 'posix-subsystem' | 'powershell' | 'ecosystem' | 'default';

/**
 * Resolved invocation for a command
 */
export interface ShellPlan {
  readonly backend: BackendKind;
  readonly executable: string;
  readonly prefixArgs: readonly string[];
  readonly argumentMode: ArgumentMode;
  /**
   * Trailing argument text (for posix-subsystem prefixes, the remainder after the prefix)
   */
  readonly commandText: string;
  readonly detector: DetectorName;
}

export interface ExecutionOptions {
  /**
   * Timeout in milliseconds (engine default applies when unset)
   */
  readonly timeoutMs?: number;

  readonly cwd?: string;

  /**
   * Merged over the ambient environment
   */
  readonly env?: Readonly<Record<string, string>>;

  /**
   * Human readable description recorded in the audit log
   */
  readonly description?: string;

  /**
   * Forces a backend, bypassing detection
   */
  readonly shell?: BackendKind;

  /**
   * Encoding used to decode stdout/stderr
   */
  readonly encoding?: BufferEncoding;

  /**
   * Cancellation token; aborting it escalates SIGTERM then SIGKILL
   */
  readonly signal?: AbortSignal;

  /**
   * Subsystem distribution for posix plans run through wsl (`wsl -d <name>`)
   */
  readonly distribution?: string;

  readonly correlationId?: string;
}

interface ResultFields {
  readonly stdout: string;
  readonly stderr: string;
  /**
   * Normalized command text that was (or would have been) executed
   */
  readonly command: string;
  readonly originalCommand: string;
  readonly backend?: BackendKind;
  /**
   * Milliseconds
   */
  readonly duration: number;
  /**
   * ISO-8601
   */
  readonly timestamp: string;
  readonly correlationId: string;
  /**
   * Output exceeded the capture limit and was cut
   */
  readonly truncated: boolean;
}

export interface SuccessResult extends ResultFields {
  readonly success: true;
  readonly exitCode: 0;
}

export interface FailureResult extends ResultFields {
  readonly success: false;
  readonly exitCode: number;
  readonly error: CommandExecutionError;
}

export type CommandResult = SuccessResult | FailureResult;

export interface PerformanceMetrics {
  commandsExecuted: number;
  totalDuration: number;
  averageDuration: number;
  successRate: number;
  lastReset: string;
  /**
   * Host process memory at snapshot time
   */
  memoryUsage: NodeJS.MemoryUsage;
}

/**
 * Minimal handle the pool needs to terminate a child
 */
export type TerminationSignal = 'SIGTERM' | 'SIGKILL';

export interface KillableProcess {
  readonly pid?: number | undefined;
  kill(signal?: TerminationSignal): boolean;
}
