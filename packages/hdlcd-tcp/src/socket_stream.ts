// Byte-stream view of a TCP socket connected to the daemon.

import { type ByteSource, HdlcdError } from "@hdlcd/wire";

/**
 * The part of `net.Socket` the client uses.
 */
export interface ByteSocket {
  write(data: Uint8Array, cb?: (err?: Error | null) => void): boolean;
  destroy(): void;
  on(event: "data", listener: (chunk: Buffer) => void): this;
  on(event: "error", listener: (err: Error) => void): this;
  on(event: "close", listener: () => void): this;
}

/**
 * A socket connection read as a byte stream.
 *
 * Incoming chunks are buffered until a reader asks for them. Once the socket
 * closes or fails, every pending and later read fails; bytes that were already
 * buffered can still be read.
 *
 * Only one read may wait at a time.
 */
export class SocketStream implements ByteSource {
  private socket: ByteSocket;
  private buf: Buffer = Buffer.alloc(0);
  private waiting: (() => void) | null = null;
  private closed = false;
  private error: Error | null = null;

  constructor(socket: ByteSocket) {
    this.socket = socket;

    socket.on("data", (chunk: Buffer) => {
      this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);
      this.wake();
    });

    socket.on("error", (err: Error) => {
      this.error = err;
      this.closed = true;
      this.wake();
    });

    socket.on("close", () => {
      this.closed = true;
      this.wake();
    });
  }

  /** Whether the socket has closed or failed. */
  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of received bytes not yet read. */
  get buffered(): number {
    return this.buf.length;
  }

  private wake(): void {
    const waiting = this.waiting;
    this.waiting = null;
    waiting?.();
  }

  private wait(signal?: AbortSignal): Promise<void> {
    if (this.waiting) {
      return Promise.reject(HdlcdError.invalidArgument("Another read is already waiting on this socket"));
    }
    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        this.waiting = null;
        reject(signal?.reason);
      };
      this.waiting = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private async fill(length: number, signal?: AbortSignal): Promise<void> {
    while (this.buf.length < length) {
      signal?.throwIfAborted();
      if (this.error) {
        throw HdlcdError.io(`Socket failed: ${this.error.message}`, this.error);
      }
      if (this.closed) {
        throw HdlcdError.eof(`${length} bytes (${this.buf.length} buffered, socket closed)`);
      }
      await this.wait(signal);
    }
  }

  async readByte(signal?: AbortSignal): Promise<number> {
    await this.fill(1, signal);
    const byte = this.buf[0];
    this.buf = this.buf.subarray(1);
    return byte;
  }

  async readExactly(length: number, signal?: AbortSignal): Promise<Uint8Array> {
    await this.fill(length, signal);
    const out = new Uint8Array(this.buf.subarray(0, length));
    this.buf = this.buf.subarray(length);
    return out;
  }

  /**
   * Write bytes to the socket.
   */
  send(payload: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.closed) {
        reject(HdlcdError.io("Cannot write to a closed socket"));
        return;
      }
      this.socket.write(payload, (err) => {
        if (err) reject(HdlcdError.io(`Socket write failed: ${err.message}`, err));
        else resolve();
      });
    });
  }

  /** Close the connection. Pending reads fail. */
  close(): void {
    this.socket.destroy();
    this.closed = true;
    this.wake();
  }
}
