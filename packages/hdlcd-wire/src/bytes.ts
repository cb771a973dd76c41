// Byte sources the packet codec reads from.

import { HdlcdError } from "./errors.ts";

/**
 * A stream of bytes that can be read a piece at a time.
 *
 * Both reads fail with an `eof` {@link HdlcdError} when the stream ends before
 * the requested bytes are available. The optional signal only interrupts the
 * wait for data: an aborted read consumes nothing.
 */
export interface ByteSource {
  readByte(signal?: AbortSignal): Promise<number>;
  readExactly(length: number, signal?: AbortSignal): Promise<Uint8Array>;
}

/**
 * Reads from a fixed buffer, e.g. bytes captured from a daemon.
 */
export class BufferSource implements ByteSource {
  private offset = 0;

  constructor(private readonly buf: Uint8Array) {}

  /** Bytes not yet consumed. */
  get remaining(): number {
    return this.buf.length - this.offset;
  }

  async readByte(signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    if (this.offset >= this.buf.length) {
      throw HdlcdError.eof("byte");
    }
    return this.buf[this.offset++];
  }

  async readExactly(length: number, signal?: AbortSignal): Promise<Uint8Array> {
    signal?.throwIfAborted();
    if (this.remaining < length) {
      throw HdlcdError.eof(`${length} bytes (${this.remaining} available)`);
    }
    const out = this.buf.slice(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}
