// One-line rendering of packets for debugging.

import { toHex } from "./bytes.ts";
import type { Packet } from "./packet.ts";

/**
 * Render a packet as e.g. `<- Data [reliable, valid] 3 bytes: 01 02 03`.
 *
 * The arrow points right for packets sent to the serial device.
 */
export function describePacket(packet: Packet): string {
  const direction = packet.wasSent ? "-> " : "<- ";
  const flags = `[${packet.reliable ? "reliable" : "unreliable"}, ${packet.invalid ? "invalid" : "valid"}]`;
  return `${direction}${packet.tag} ${flags} ${describeBody(packet)}`;
}

function describeBody(packet: Packet): string {
  switch (packet.tag) {
    case "Data":
      if (packet.payload.length === 0) return "0 bytes";
      return `${packet.payload.length} bytes: ${toHex(packet.payload)}`;
    case "Control": {
      const info = packet.information;
      if (!info) return packet.command;
      return `${packet.command} (alive=${info.alive}, lockedByOthers=${info.lockedByOthers}, lockedByMe=${info.lockedByMe})`;
    }
    case "Unknown":
      return `content id ${packet.contentId}`;
  }
}
