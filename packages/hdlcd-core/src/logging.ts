// Debug logging for hdlcd sessions.
//
// Logging is switched on per namespace through the DEBUG environment
// variable, the way npm's debug package does it:
//
//   DEBUG=hdlcd:*          all hdlcd logging
//   DEBUG=hdlcd:packets    packets only
//   DEBUG=*,-hdlcd:session everything but session lifecycle

import { type Packet, toHex } from "@hdlcd/wire";

export const PACKETS_NAMESPACE = "hdlcd:packets";
export const SESSION_NAMESPACE = "hdlcd:session";

/**
 * Sees every packet a device session writes or reads.
 */
export interface PacketObserver {
  sent?(packet: Packet): void;
  received?(packet: Packet): void;
}

export interface PacketLoggerOptions {
  /**
   * Namespace for debug matching. Defaults to "hdlcd:packets".
   */
  namespace?: string;

  /**
   * Include data packet payloads as hex. Defaults to true.
   */
  logPayload?: boolean;

  /**
   * Which direction to log. Defaults to "both".
   */
  direction?: "both" | "sent" | "received";
}

/**
 * Check if a namespace is enabled by the DEBUG environment variable.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug: string | undefined = process.env.DEBUG): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Log a message under `namespace` if it is enabled.
 */
export function debugLog(namespace: string, message: string, data?: Record<string, unknown>): void {
  if (!isEnabled(namespace)) return;
  if (data === undefined) {
    console.log(`${namespace} ${message}`);
  } else {
    console.log(`${namespace} ${message}`, data);
  }
}

function packetName(packet: Packet): string {
  return packet.tag === "Control" ? packet.command : packet.tag.toLowerCase();
}

function packetLogObject(packet: Packet, logPayload: boolean): Record<string, unknown> {
  const logObj: Record<string, unknown> = {
    type: packet.tag,
    reliable: packet.reliable,
    invalid: packet.invalid,
    wasSent: packet.wasSent,
  };

  switch (packet.tag) {
    case "Data":
      logObj.length = packet.payload.length;
      if (logPayload && packet.payload.length > 0) {
        logObj.payload = toHex(packet.payload);
      }
      break;
    case "Control":
      if (packet.information) {
        logObj.information = packet.information;
      }
      break;
    case "Unknown":
      logObj.contentId = packet.contentId;
      break;
  }
  return logObj;
}

/**
 * Create an observer that logs packets as structured objects.
 *
 * - Sent: `→ lock`, { type, reliable, invalid, wasSent }
 * - Received: `← port_status`, { ..., information }
 *
 * @example
 * ```typescript
 * // DEBUG=hdlcd:packets
 * const session = new DeviceSession("/dev/ttyUSB0", { observers: [packetLogger()] });
 * ```
 */
export function packetLogger(options: PacketLoggerOptions = {}): PacketObserver {
  const namespace = options.namespace ?? PACKETS_NAMESPACE;
  const logPayload = options.logPayload ?? true;
  const direction = options.direction ?? "both";

  return {
    sent(packet: Packet): void {
      if (direction === "received" || !isEnabled(namespace)) return;
      console.log(`→ ${packetName(packet)}`, packetLogObject(packet, logPayload));
    },

    received(packet: Packet): void {
      if (direction === "sent" || !isEnabled(namespace)) return;
      console.log(`← ${packetName(packet)}`, packetLogObject(packet, logPayload));
    },
  };
}
