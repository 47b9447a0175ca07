/**
 * Pooled byte buffers for response serialization.
 *
 * - PooledBuffer grows by doubling and keeps its storage across resets
 * - bytes() returns a view of the written region (no copy)
 * - BufferPool hands buffers out and takes them back between requests
 *
 * A view returned by bytes() is only valid until the buffer is reset or
 * released.
 */

import { Pool } from "./pool.js";

export class PooledBuffer {
  private buf: Buffer;
  private offset = 0;

  constructor(initialSize = 2048) {
    this.buf = Buffer.allocUnsafe(Math.max(1, initialSize));
  }

  write(chunk: Uint8Array): void {
    this.ensure(chunk.length);
    this.buf.set(chunk, this.offset);
    this.offset += chunk.length;
  }

  writeString(text: string): void {
    this.ensure(Buffer.byteLength(text, "utf8"));
    this.offset += this.buf.write(text, this.offset, "utf8");
  }

  bytes(): Buffer {
    return this.buf.subarray(0, this.offset);
  }

  toString(): string {
    return this.buf.toString("utf8", 0, this.offset);
  }

  reset(): void {
    this.offset = 0;
  }

  get length(): number {
    return this.offset;
  }

  get capacity(): number {
    return this.buf.length;
  }

  private ensure(extra: number): void {
    const needed = this.offset + extra;
    if (needed <= this.buf.length) return;
    let size = this.buf.length * 2;
    while (size < needed) size *= 2;
    const next = Buffer.allocUnsafe(size);
    this.buf.copy(next, 0, 0, this.offset);
    this.buf = next;
  }
}

export class BufferPool extends Pool<PooledBuffer> {
  constructor(params?: { bufferSize?: number; maxSize?: number }) {
    const bufferSize = params?.bufferSize ?? 2048;
    super({
      create: () => new PooledBuffer(bufferSize),
      reset: (b) => b.reset(),
      maxSize: params?.maxSize,
    });
  }
}
