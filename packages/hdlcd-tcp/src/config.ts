// Device session configuration.

import type { PacketObserver } from "@hdlcd/core";
import { HdlcdError, type SessionHeaderOptions } from "@hdlcd/wire";
import { type Dialer, dialTcp } from "./transport.ts";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 36962;

/** Options for a device session. */
export interface DeviceOptions {
  /** Daemon host. Default: $HDLCD_HOST, then "localhost" */
  host?: string;

  /** Daemon TCP port. Default: $HDLCD_PORT, then 36962 */
  port?: number;

  /** Opens sockets. Default: TCP via node:net */
  dialer?: Dialer;

  /** Notified of every packet sent or received. */
  observers?: PacketObserver[];

  /**
   * Fail on content ids without a known variant instead of reading them as
   * bodiless packets. Default: false
   */
  strictContentIds?: boolean;

  /** Session header overrides for the data channel, e.g. `{ typeOfData: "hdlc_raw" }`. */
  dataHeader?: Partial<Omit<SessionHeaderOptions, "version">>;
}

export interface ResolvedDeviceOptions {
  host: string;
  port: number;
  dialer: Dialer;
  observers: PacketObserver[];
  strictContentIds: boolean;
  dataHeader: Partial<Omit<SessionHeaderOptions, "version">>;
}

function parsePort(value: number | string): number {
  const port = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 0xffff) {
    throw HdlcdError.invalidArgument(`Invalid daemon port: ${value}`);
  }
  return port;
}

/**
 * Fill in defaults, taking host and port from the environment when they are
 * not given.
 */
export function resolveDeviceOptions(
  options: DeviceOptions = {},
  env: Record<string, string | undefined> = process.env,
): ResolvedDeviceOptions {
  const envPort = env.HDLCD_PORT || undefined;
  return {
    host: options.host ?? (env.HDLCD_HOST || DEFAULT_HOST),
    port: parsePort(options.port ?? envPort ?? DEFAULT_PORT),
    dialer: options.dialer ?? dialTcp,
    observers: options.observers ?? [],
    strictContentIds: options.strictContentIds ?? false,
    dataHeader: options.dataHeader ?? {},
  };
}
