/**
 * Buffered, size-rotated line sink for audit entries
 *
 * Lines accumulate in memory and are appended in bulk. Writes are chained so
 * at most one append or rotation touches the file at a time, and each append
 * is a single synchronous call, so flushSync() can take over any batch that
 * is queued but not yet written. Before every append the file is rotated if
 * it has grown past maxFileBytes:
 * audit.log -> audit.log.1 -> audit.log.2 ... up to maxBackups.
 */

import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';

export interface AuditFileSinkOptions {
  filePath: string;
  /**
   * Buffered bytes that trigger a flush (default: 16 KiB)
   */
  bufferBytes?: number;
  /**
   * Size above which the file is rotated before the next append (default: 50 MiB)
   */
  maxFileBytes?: number;
  /**
   * Rotated files kept (default: 5)
   */
  maxBackups?: number;
}

export interface AuditFileSinkStats {
  bufferedLines: number;
  bufferedBytes: number;
  flushes: number;
  rotations: number;
  lastFlush: number | null;
  filePath: string;
}

interface PendingBatch {
  lines: string[];
  settled: boolean;
}

export class AuditFileSink {
  readonly filePath: string;
  private readonly bufferBytes: number;
  private readonly maxFileBytes: number;
  private readonly maxBackups: number;

  private lines: string[] = [];
  private pendingBytes = 0;
  private inFlight: PendingBatch[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private flushes = 0;
  private rotations = 0;
  private lastFlush: number | null = null;
  private directoryReady = false;

  constructor(options: AuditFileSinkOptions) {
    this.filePath = path.resolve(options.filePath);
    this.bufferBytes = options.bufferBytes ?? 16 * 1024;
    this.maxFileBytes = options.maxFileBytes ?? 50 * 1024 * 1024;
    this.maxBackups = options.maxBackups ?? 5;
  }

  /**
   * Buffer one line. Returns true when the buffer has reached its flush threshold.
   */
  append(line: string): boolean {
    this.lines.push(line);
    this.pendingBytes += Buffer.byteLength(line);
    return this.pendingBytes >= this.bufferBytes;
  }

  get isEmpty(): boolean {
    return this.lines.length === 0;
  }

  /**
   * Write everything buffered so far. Resolves once this batch is on disk.
   */
  flush(): Promise<void> {
    if (this.lines.length === 0) {
      return this.writeChain;
    }

    const batch: PendingBatch = { lines: this.takeBatch(), settled: false };
    this.inFlight.push(batch);
    this.writeChain = this.writeChain.then(() => this.write(batch));
    return this.writeChain;
  }

  /**
   * Synchronous final flush for shutdown paths. Batches handed to flush() but
   * not yet written go first, then the buffer; their queued writes become no-ops.
   */
  flushSync(): void {
    const queued = this.inFlight.flatMap((batch) => {
      batch.settled = true;
      return batch.lines;
    });
    this.inFlight = [];

    const lines = [...queued, ...this.takeBatch()];
    if (lines.length === 0) {
      return;
    }

    try {
      this.ensureDirectorySync();
      this.rotateIfNeededSync();
      fs.appendFileSync(this.filePath, lines.join(''), 'utf8');
      this.recordFlush();
    } catch (error) {
      this.requeue(lines);
      console.warn(`[AuditFileSink] Final flush to ${this.filePath} failed: ${String(error)}`);
    }
  }

  getStats(): AuditFileSinkStats {
    return {
      bufferedLines: this.lines.length,
      bufferedBytes: this.pendingBytes,
      flushes: this.flushes,
      rotations: this.rotations,
      lastFlush: this.lastFlush,
      filePath: this.filePath,
    };
  }

  private takeBatch(): string[] {
    const batch = this.lines;
    this.lines = [];
    this.pendingBytes = 0;
    return batch;
  }

  private async write(batch: PendingBatch): Promise<void> {
    if (batch.settled) {
      return;
    }

    try {
      await this.ensureDirectory();
      await this.rotateIfNeeded();
      if (batch.settled) {
        return;
      }
      fs.appendFileSync(this.filePath, batch.lines.join(''), 'utf8');
      batch.settled = true;
      this.recordFlush();
    } catch (error) {
      if (batch.settled) {
        return;
      }
      batch.settled = true;
      // Back in front of anything buffered since, so nothing is lost
      this.requeue(batch.lines);
      console.warn(`[AuditFileSink] Flush to ${this.filePath} failed: ${String(error)}`);
    } finally {
      this.inFlight = this.inFlight.filter((pending) => pending !== batch);
    }
  }

  private requeue(lines: string[]): void {
    this.lines = [...lines, ...this.lines];
    this.pendingBytes = this.lines.reduce((total, line) => total + Buffer.byteLength(line), 0);
  }

  private recordFlush(): void {
    this.flushes++;
    this.lastFlush = Date.now();
  }

  private async ensureDirectory(): Promise<void> {
    if (this.directoryReady) {
      return;
    }
    await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
    this.directoryReady = true;
  }

  private ensureDirectorySync(): void {
    if (this.directoryReady) {
      return;
    }
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    this.directoryReady = true;
  }

  private async rotateIfNeeded(): Promise<void> {
    const size = await fsp.stat(this.filePath).then(
      (stats) => stats.size,
      () => 0
    );
    if (size <= this.maxFileBytes) {
      return;
    }

    await fsp.rm(this.backupPath(this.maxBackups), { force: true });
    for (let i = this.maxBackups - 1; i >= 1; i--) {
      await fsp.rename(this.backupPath(i), this.backupPath(i + 1)).catch(ignoreMissing);
    }
    await fsp.rename(this.filePath, this.backupPath(1));
    this.rotations++;
  }

  private rotateIfNeededSync(): void {
    const size = fs.existsSync(this.filePath) ? fs.statSync(this.filePath).size : 0;
    if (size <= this.maxFileBytes) {
      return;
    }

    fs.rmSync(this.backupPath(this.maxBackups), { force: true });
    for (let i = this.maxBackups - 1; i >= 1; i--) {
      if (fs.existsSync(this.backupPath(i))) {
        fs.renameSync(this.backupPath(i), this.backupPath(i + 1));
      }
    }
    fs.renameSync(this.filePath, this.backupPath(1));
    this.rotations++;
  }

  private backupPath(index: number): string {
    return `${this.filePath}.${index}`;
  }
}

function ignoreMissing(error: unknown): void {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return;
  }
  throw error;
}
