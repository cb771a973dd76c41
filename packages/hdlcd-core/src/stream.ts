// Packet stream reader.
//
// Turns a byte source into an endless sequence of decoded packets. The
// sequence only ends when the source fails (the error reaches the consumer),
// when the consumer stops pulling, or when the abort signal fires between
// packets.

import {
  type ByteSource,
  type ControlPacket,
  type DataPacket,
  type DecodeOptions,
  type Packet,
  decodePacket,
  isControlPacket,
  isDataPacket,
} from "@hdlcd/wire";

/** Selects which decoded packets a reader yields. */
export type PacketFilter<P extends Packet = Packet> = (packet: Packet) => packet is P;

export const allPackets: PacketFilter = (packet): packet is Packet => true;
export const dataPackets: PacketFilter<DataPacket> = isDataPacket;
export const controlPackets: PacketFilter<ControlPacket> = isControlPacket;

export interface ReadPacketsOptions extends Omit<DecodeOptions, "signal"> {
  /**
   * Stops the reader. Only the wait for the next packet is interrupted; a
   * packet already being read is finished first so the stream stays aligned.
   */
  signal?: AbortSignal;

  /** Called for every decoded packet, including ones the filter drops. */
  onPacket?: (packet: Packet) => void;
}

/**
 * Read packets from `source`, yielding those that match `filter` (all of them
 * when no filter is given).
 *
 * Filtered-out packets are still consumed in full.
 */
export function readPackets(
  source: ByteSource,
  filter?: undefined,
  options?: ReadPacketsOptions,
): AsyncGenerator<Packet, void, undefined>;
export function readPackets<P extends Packet>(
  source: ByteSource,
  filter: PacketFilter<P>,
  options?: ReadPacketsOptions,
): AsyncGenerator<P, void, undefined>;
export async function* readPackets(
  source: ByteSource,
  filter: PacketFilter = allPackets,
  options: ReadPacketsOptions = {},
): AsyncGenerator<Packet, void, undefined> {
  const { signal, onPacket, ...decodeOptions } = options;

  while (!signal?.aborted) {
    let packet: Packet;
    try {
      packet = await decodePacket(source, { ...decodeOptions, signal });
    } catch (err) {
      if (signal?.aborted && err === signal.reason) return;
      throw err;
    }

    onPacket?.(packet);
    if (filter(packet)) yield packet;
  }
}
