// In-process socket stand-in for tests.

import { EventEmitter } from "node:events";
import { setImmediate } from "node:timers/promises";
import { concat } from "@hdlcd/wire";
import type { ByteSocket } from "./socket_stream.ts";
import type { Dialer } from "./transport.ts";

export class MockSocket extends EventEmitter implements ByteSocket {
  written: Uint8Array[] = [];
  destroyed = false;

  constructor(
    public host: string,
    public port: number,
  ) {
    super();
  }

  write(data: Uint8Array, cb?: (err?: Error | null) => void): boolean {
    if (this.destroyed) {
      cb?.(new Error("write after destroy"));
      return false;
    }
    this.written.push(Uint8Array.from(data));
    cb?.(null);
    return true;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.emit("close");
  }

  // Test helpers
  receive(...bytes: number[]): void {
    this.emit("data", Buffer.from(bytes));
  }

  simulateError(message: string): void {
    this.emit("error", new Error(message));
    this.destroy();
  }

  /** Everything written so far, as one array of numbers. */
  writtenBytes(): number[] {
    return Array.from(concat(...this.written));
  }

  /** SAP byte of the session header this socket was opened with. */
  sap(): number | undefined {
    return this.written[0]?.[1];
  }
}

/** A dialer that hands out mock sockets and remembers them. */
export function mockDialer(): { dialer: Dialer; sockets: MockSocket[] } {
  const sockets: MockSocket[] = [];
  const dialer: Dialer = async (host, port) => {
    const socket = new MockSocket(host, port);
    sockets.push(socket);
    return socket;
  };
  return { dialer, sockets };
}

/** Let every pending promise callback run. */
export async function flush(): Promise<void> {
  await setImmediate();
}
