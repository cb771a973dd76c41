// @hdlcd/tcp - hdlcd device sessions over TCP (Node.js only)
//
// Provides TCP-specific I/O: socket byte stream, dialer, device session.

export { type ByteSocket, SocketStream } from "./socket_stream.ts";
export { type Dialer, dialTcp, connectChannel } from "./transport.ts";
export {
  type DeviceOptions,
  type ResolvedDeviceOptions,
  DEFAULT_HOST,
  DEFAULT_PORT,
  resolveDeviceOptions,
} from "./config.ts";
export { type ChannelName, type PacketCallback, DeviceSession, openDevice } from "./device.ts";

// Re-export packet types and logging for convenience
export {
  type Packet,
  type DataPacket,
  type ControlPacket,
  type PortStatus,
  HdlcdError,
  describePacket,
} from "@hdlcd/wire";

export { type PacketObserver, type PortStatusSnapshot, packetLogger } from "@hdlcd/core";
