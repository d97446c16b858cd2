/**
 * Collects stream chunks and decodes them once at the end
 */

export class OutputCollector {
  private chunks: Buffer[] = [];
  private length = 0;
  private cut = false;

  constructor(private readonly maxBytes: number) {}

  push(chunk: Buffer | Uint8Array | string): void {
    const buffer = toBuffer(chunk);
    const room = this.maxBytes - this.length;

    if (room <= 0) {
      this.cut = this.cut || buffer.length > 0;
      return;
    }

    if (buffer.length > room) {
      this.chunks.push(buffer.subarray(0, room));
      this.length += room;
      this.cut = true;
      return;
    }

    this.chunks.push(buffer);
    this.length += buffer.length;
  }

  get byteLength(): number {
    return this.length;
  }

  get truncated(): boolean {
    return this.cut;
  }

  toString(encoding: BufferEncoding = 'utf8'): string {
    return Buffer.concat(this.chunks, this.length).toString(encoding);
  }
}

function toBuffer(chunk: Buffer | Uint8Array | string): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk);
  }
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
}
