/**
 * Logging utility using winston
 *
 * Audit lines go to a buffered AuditFileSink; winston mirrors entries to the
 * console when enabled. A failed file write is reported with console.warn and
 * its lines are retried on the next flush.
 */

import winston from 'winston';
import { AuditFileSink, type AuditFileSinkStats } from './AuditFileSink.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: Record<string, unknown>;
  correlationId?: string;
  component?: string;
}

export interface LoggerOptions {
  /**
   * Audit file path; omit for console-only logging
   */
  file?: string;
  level?: LogLevel;
  console?: boolean;
  bufferBytes?: number;
  flushIntervalMs?: number;
  maxFileBytes?: number;
  maxBackups?: number;
}

export interface LoggerStats {
  level: LogLevel;
  entries: number;
  dropped: number;
  consoleEnabled: boolean;
  file: AuditFileSinkStats | null;
}

export class Logger {
  private logger: winston.Logger;
  private consoleTransport: winston.transport;
  private sink: AuditFileSink | null;
  private flushTimer: NodeJS.Timeout | null = null;
  private readonly level: LogLevel;
  private entries = 0;
  private dropped = 0;
  private disposed = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

    this.sink = options.file
      ? new AuditFileSink({
          filePath: options.file,
          bufferBytes: options.bufferBytes,
          maxFileBytes: options.maxFileBytes,
          maxBackups: options.maxBackups,
        })
      : null;

    this.consoleTransport = new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    });

    this.logger = winston.createLogger({
      level: this.level,
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      transports: options.console ? [this.consoleTransport] : [],
      // winston warns about writes with no transports attached
      silent: !options.console,
    });

    if (this.sink) {
      this.flushTimer = setInterval(() => {
        if (this.sink && !this.sink.isEmpty) {
          void this.flush();
        }
      }, options.flushIntervalMs ?? 5000);
      this.flushTimer.unref();
    }
  }

  /**
   * Record a structured entry
   */
  record(
    level: LogLevel,
    message: string,
    payload?: Record<string, unknown>,
    component?: string,
    correlationId?: string
  ): void {
    if (this.disposed || SEVERITY[level] > SEVERITY[this.level]) {
      this.dropped++;
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      payload,
      component,
      correlationId,
    };
    this.entries++;

    this.logger.log(level, message, { ...payload, component, correlationId });

    if (this.sink) {
      const full = this.sink.append(formatLogLine(entry));
      if (full || level === 'error') {
        void this.flush();
      }
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.record('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.record('warn', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.record('info', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.record('debug', message, meta);
  }

  /**
   * Write buffered audit lines. Sink failures are reported and retried on the next flush.
   */
  flush(): Promise<void> {
    return this.sink ? this.sink.flush() : Promise.resolve();
  }

  /**
   * Stop the flush timer and write what is left, synchronously. Safe to call twice.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    this.sink?.flushSync();
    this.logger.close();
  }

  getStats(): LoggerStats {
    return {
      level: this.level,
      entries: this.entries,
      dropped: this.dropped,
      consoleEnabled: this.logger.transports.includes(this.consoleTransport),
      file: this.sink ? this.sink.getStats() : null,
    };
  }

  /**
   * Stop mirroring entries to the console
   */
  disableConsole(): void {
    this.logger.remove(this.consoleTransport);
    this.logger.silent = true;
  }

  /**
   * Mirror entries to the console
   */
  enableConsole(): void {
    if (!this.logger.transports.includes(this.consoleTransport)) {
      this.logger.add(this.consoleTransport);
    }
    this.logger.silent = false;
  }
}

/**
 * `<ISO ts> [LEVEL] [component] (correlationId) message {json}`
 */
export function formatLogLine(entry: LogEntry): string {
  let line = `${entry.timestamp} [${entry.level.toUpperCase()}]`;
  if (entry.component) {
    line += ` [${entry.component}]`;
  }
  if (entry.correlationId) {
    line += ` (${entry.correlationId})`;
  }
  line += ` ${entry.message}`;
  if (entry.payload && Object.keys(entry.payload).length > 0) {
    line += ` ${JSON.stringify(entry.payload)}`;
  }
  return `${line}\n`;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

// Console-only logger for code that runs before an engine exists
export const logger = new Logger({ console: true });
