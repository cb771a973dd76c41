// Packet encoding/decoding.
//
// Decoding reads the type/flags byte, then hands the rest of the packet to the
// body decoder for its content id. Only control packets are ever encoded: this
// client never sends payload on its own.

import type { ByteSource } from "./bytes.ts";
import { HdlcdError } from "./errors.ts";
import {
  type ControlPacket,
  type DataPacket,
  type Packet,
  type PacketFlags,
  type PortStatus,
  ContentId,
  ControlCommand,
  ControlIndication,
  PortStatusFlags,
  isControlCommand,
  isControlIndication,
  parseTypeFlags,
  typeFlagsByte,
} from "./packet.ts";

export interface DecodeOptions {
  /**
   * Fail with `unknown_content_id` instead of returning a bodiless
   * `Unknown` packet when the content id has no variant.
   */
  strictContentIds?: boolean;
  /** Interrupts only the wait for the type/flags byte. */
  signal?: AbortSignal;
}

/**
 * Reads a variant's body. The type/flags byte has already been consumed and
 * its flags are applied by the caller.
 */
type BodyDecoder = (source: ByteSource, flags: PacketFlags) => Promise<Packet>;

// ============================================================================
// Body decoders
// ============================================================================

async function decodeDataBody(source: ByteSource, flags: PacketFlags): Promise<DataPacket> {
  // 16-bit big-endian length
  const lengthRaw = await source.readExactly(2).catch(rethrowEof("DataPacket length"));
  const length = (lengthRaw[0] << 8) | lengthRaw[1];
  const payload = await source.readExactly(length).catch(rethrowEof("DataPacket payload"));
  return { tag: "Data", ...flags, payload };
}

function indicationFromCode(code: number): ControlPacket["command"] {
  for (const name of Object.keys(ControlIndication)) {
    if (isControlIndication(name) && ControlIndication[name] === code) return name;
  }
  return "unknown";
}

async function decodeControlBody(source: ByteSource, flags: PacketFlags): Promise<ControlPacket> {
  const data = await source.readByte().catch(rethrowEof("ControlPacket command"));
  const command = indicationFromCode(data & 0xf0);

  let information: PortStatus | null = null;
  if (command === "port_status") {
    information = {
      alive: (data & PortStatusFlags.ALIVE) !== 0,
      lockedByOthers: (data & PortStatusFlags.LOCKED_BY_OTHERS) !== 0,
      lockedByMe: (data & PortStatusFlags.LOCKED_BY_ME) !== 0,
    };
  }
  return { tag: "Control", ...flags, command, information };
}

const BODY_DECODERS: ReadonlyMap<number, BodyDecoder> = new Map<number, BodyDecoder>([
  [ContentId.DATA, decodeDataBody],
  [ContentId.CONTROL, decodeControlBody],
]);

function rethrowEof(context: string): (err: unknown) => never {
  return (err) => {
    if (err instanceof HdlcdError && err.kind === "eof") {
      throw HdlcdError.eof(context);
    }
    throw err;
  };
}

// ============================================================================
// Packet decoding
// ============================================================================

/**
 * Read one packet from a byte source.
 *
 * A content id without a variant yields an `Unknown` packet that consumed only
 * the type/flags byte. That is correct only if such a packet has no body;
 * otherwise every later packet on the stream is misread. Pass
 * `strictContentIds` to fail instead.
 */
export async function decodePacket(source: ByteSource, options: DecodeOptions = {}): Promise<Packet> {
  const typeField = await source.readByte(options.signal).catch(rethrowEof("packet type"));
  const flags = parseTypeFlags(typeField);

  const decodeBody = BODY_DECODERS.get(flags.contentId);
  if (decodeBody) {
    return decodeBody(source, flags);
  }
  if (options.strictContentIds) {
    throw HdlcdError.unknownContentId(flags.contentId);
  }
  return { tag: "Unknown", ...flags };
}

// ============================================================================
// Packet encoding
// ============================================================================

/**
 * Serialize a control packet: the type/flags byte followed by the command.
 *
 * Data packets and unknown packets cannot be serialized, nor can decoded
 * control packets whose command has no outbound code (e.g. `port_status`).
 */
export function encodePacket(packet: Packet): Uint8Array {
  switch (packet.tag) {
    case "Control": {
      const { command } = packet;
      if (!isControlCommand(command)) {
        throw HdlcdError.unsupported(`Control packet with command ${command} cannot be sent`);
      }
      return Uint8Array.of(typeFlagsByte(packet), ControlCommand[command]);
    }
    case "Data":
      throw HdlcdError.unsupported("DataPacket does not support serialization");
    case "Unknown":
      throw HdlcdError.unsupported(`Packet with content id ${packet.contentId} does not support serialization`);
  }
}
