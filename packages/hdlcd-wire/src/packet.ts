// Packet types exchanged with the daemon.
//
// Every packet starts with a type/flags byte:
//   bits 4-7  content id (selects the variant)
//   bit 2     reliable (was or should be sent reliably over HDLC)
//   bit 1     invalid (the frame was damaged)
//   bit 0     was sent (the packet went to the serial device; always 0 outbound)

import { HdlcdError } from "./errors.ts";

export const ContentId = {
  DATA: 0,
  CONTROL: 1,
} as const;

export const TypeFlags = {
  WAS_SENT: 0b0001,
  INVALID: 0b0010,
  RELIABLE: 0b0100,
} as const;

/** Flags carried by every packet. */
export interface PacketFlags {
  contentId: number;
  reliable: boolean;
  invalid: boolean;
  wasSent: boolean;
}

// ============================================================================
// Control vocabulary
// ============================================================================

/** Commands a client may send on the control channel. */
export const ControlCommand = {
  release: 0x00,
  lock: 0x01,
  echo: 0x10,
  keep_alive: 0x20,
  port_kill_request: 0x30,
} as const;

export type ControlCommand = keyof typeof ControlCommand;

/** Indications and confirmations the daemon sends on the control channel. */
export const ControlIndication = {
  port_status: 0x00,
  echo: 0x10,
  keep_alive: 0x20,
} as const;

export type ControlIndication = keyof typeof ControlIndication;

export const PortStatusFlags = {
  LOCKED_BY_ME: 0b0001,
  LOCKED_BY_OTHERS: 0b0010,
  ALIVE: 0b0100,
} as const;

/** Port availability and lock ownership as reported by the daemon. */
export interface PortStatus {
  alive: boolean;
  lockedByOthers: boolean;
  lockedByMe: boolean;
}

export function isControlCommand(name: string): name is ControlCommand {
  return Object.hasOwn(ControlCommand, name);
}

export function isControlIndication(name: string): name is ControlIndication {
  return Object.hasOwn(ControlIndication, name);
}

// ============================================================================
// Packet variants
// ============================================================================

/** Payload bytes relayed to or from the serial device (content id 0). */
export interface DataPacket extends PacketFlags {
  tag: "Data";
  payload: Uint8Array;
}

/**
 * Control channel message (content id 1).
 *
 * `information` is set only on decoded `port_status` indications.
 */
export interface ControlPacket extends PacketFlags {
  tag: "Control";
  command: ControlCommand | ControlIndication | "unknown";
  information: PortStatus | null;
}

/** A packet whose content id has no known variant; carries no body. */
export interface UnknownPacket extends PacketFlags {
  tag: "Unknown";
}

export type Packet = DataPacket | ControlPacket | UnknownPacket;

export type PacketTag = Packet["tag"];

const NO_FLAGS = { reliable: false, invalid: false, wasSent: false } as const;

/**
 * Create a data packet.
 */
export function dataPacket(
  payload: Uint8Array,
  flags: Partial<Omit<PacketFlags, "contentId">> = {},
): DataPacket {
  return { tag: "Data", contentId: ContentId.DATA, ...NO_FLAGS, ...flags, payload };
}

/**
 * Create an outbound control packet. Its flags are always zero.
 *
 * Throws `invalid_argument` for a command outside the outbound vocabulary.
 */
export function controlPacket(command: ControlCommand): ControlPacket {
  if (typeof command !== "string" || !isControlCommand(command)) {
    throw HdlcdError.invalidArgument(`Invalid command: ${JSON.stringify(command)}`);
  }
  return { tag: "Control", contentId: ContentId.CONTROL, ...NO_FLAGS, command, information: null };
}

export function isDataPacket(packet: Packet): packet is DataPacket {
  return packet.tag === "Data";
}

export function isControlPacket(packet: Packet): packet is ControlPacket {
  return packet.tag === "Control";
}

/** True iff the packet is a data packet with a non-empty payload. */
export function containsData(packet: Packet): boolean {
  return packet.tag === "Data" && packet.payload.length > 0;
}

/**
 * Compute the type/flags byte for a packet.
 */
export function typeFlagsByte(flags: PacketFlags): number {
  let byte = (flags.contentId & 0x0f) << 4;
  if (flags.reliable) byte |= TypeFlags.RELIABLE;
  if (flags.invalid) byte |= TypeFlags.INVALID;
  if (flags.wasSent) byte |= TypeFlags.WAS_SENT;
  return byte;
}

/**
 * Split a type/flags byte into its fields.
 */
export function parseTypeFlags(byte: number): PacketFlags {
  return {
    contentId: byte >> 4,
    reliable: (byte & TypeFlags.RELIABLE) !== 0,
    invalid: (byte & TypeFlags.INVALID) !== 0,
    wasSent: (byte & TypeFlags.WAS_SENT) !== 0,
  };
}
