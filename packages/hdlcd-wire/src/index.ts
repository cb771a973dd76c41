// @hdlcd/wire - packet formats spoken with the hdlcd daemon
//
// Session header handshake, packet model, packet codec and the byte source
// abstraction the codec reads from.

export { HdlcdError, isHdlcdError, type HdlcdErrorKind } from "./errors.ts";

export { type ByteSource, BufferSource, concat, toHex } from "./bytes.ts";

export {
  type SessionHeader,
  type SessionHeaderOptions,
  TypeOfData,
  SapFlags,
  SESSION_HEADER_VERSION,
  MAX_PORT_NAME_LENGTH,
  DEFAULT_SESSION_HEADER_OPTIONS,
  sessionHeader,
  encodeSessionHeader,
  decodeSessionHeader,
} from "./session_header.ts";

export {
  type Packet,
  type PacketTag,
  type PacketFlags,
  type DataPacket,
  type ControlPacket,
  type UnknownPacket,
  type PortStatus,
  ContentId,
  TypeFlags,
  ControlCommand,
  ControlIndication,
  PortStatusFlags,
  dataPacket,
  controlPacket,
  isDataPacket,
  isControlPacket,
  isControlCommand,
  isControlIndication,
  containsData,
  typeFlagsByte,
  parseTypeFlags,
} from "./packet.ts";

export { type DecodeOptions, decodePacket, encodePacket } from "./codec.ts";

export { describePacket } from "./describe.ts";
