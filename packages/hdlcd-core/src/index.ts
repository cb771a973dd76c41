// @hdlcd/core - transport-independent pieces of the hdlcd client
//
// Packet stream reading, the port status snapshot and debug logging.

export {
  type PacketFilter,
  type ReadPacketsOptions,
  allPackets,
  dataPackets,
  controlPackets,
  readPackets,
} from "./stream.ts";

export { type PortStatusSnapshot, PortStatusCache, portStatusEquals } from "./status.ts";

export {
  type PacketObserver,
  type PacketLoggerOptions,
  PACKETS_NAMESPACE,
  SESSION_NAMESPACE,
  isEnabled,
  debugLog,
  packetLogger,
} from "./logging.ts";
