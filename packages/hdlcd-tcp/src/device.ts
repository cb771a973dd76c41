// Device session: one serial port on the daemon, reached over two channels.
//
// - data channel: payload packets, read only when the caller iterates
// - control channel: lock/release/... commands out, port status in
//
// Each channel is connected on first use and never reconnected. The control
// channel has at most one reader at a time: either the caller, or a
// background task that keeps the port status snapshot current.

import {
  type PacketFilter,
  type PortStatusSnapshot,
  type ReadPacketsOptions,
  PortStatusCache,
  SESSION_NAMESPACE,
  allPackets,
  controlPackets,
  dataPackets,
  debugLog,
  portStatusEquals,
  readPackets,
} from "@hdlcd/core";
import {
  type ControlCommand,
  type ControlPacket,
  type DataPacket,
  type Packet,
  type PortStatus,
  type SessionHeaderOptions,
  HdlcdError,
  controlPacket,
  encodePacket,
} from "@hdlcd/wire";
import { type DeviceOptions, type ResolvedDeviceOptions, resolveDeviceOptions } from "./config.ts";
import type { SocketStream } from "./socket_stream.ts";
import { connectChannel } from "./transport.ts";

export type ChannelName = "data" | "control";

/** Receives packets; a returned promise is awaited before the next packet. */
export type PacketCallback<P> = (packet: P) => void | Promise<void>;

const CONTROL_HEADER: Partial<SessionHeaderOptions> = {
  typeOfData: "port_status_only",
  wantRxData: false,
};

/** Handle on the background status reader. */
interface BackgroundReader {
  controller: AbortController;
  done: Promise<void>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * A session with one serial port on the daemon.
 *
 * @example
 * ```typescript
 * const device = new DeviceSession("/dev/ttyUSB0", { host: "localhost" });
 * await device.lock();
 * console.log(device.portStatus());
 * await device.close();
 * ```
 */
export class DeviceSession {
  readonly portName: string;
  private readonly options: ResolvedDeviceOptions;

  private channels = new Map<ChannelName, Promise<SocketStream>>();
  private streams = new Set<SocketStream>();
  private readers = new Set<ChannelName>();
  private background: BackgroundReader | null = null;
  private status = new PortStatusCache();
  private closed = false;

  constructor(portName: string, options: DeviceOptions = {}) {
    this.portName = portName;
    this.options = resolveDeviceOptions(options);
  }

  /** Whether `close()` has been called. */
  isClosed(): boolean {
    return this.closed;
  }

  /** Whether the background status reader is running. */
  hasBackgroundReader(): boolean {
    return this.background !== null;
  }

  // ==========================================================================
  // Control commands
  // ==========================================================================

  /** Ask the daemon to lock the port for this client. No reply is awaited. */
  lock(): Promise<void> {
    return this.sendCommand("lock");
  }

  /** Release a lock held by this client. */
  release(): Promise<void> {
    return this.sendCommand("release");
  }

  echo(): Promise<void> {
    return this.sendCommand("echo");
  }

  keepAlive(): Promise<void> {
    return this.sendCommand("keep_alive");
  }

  /** Ask the daemon to close the serial port. */
  requestPortKill(): Promise<void> {
    return this.sendCommand("port_kill_request");
  }

  private async sendCommand(command: ControlCommand): Promise<void> {
    const packet = controlPacket(command);
    const stream = await this.channel("control");
    this.ensureOpen();
    await stream.send(encodePacket(packet));
    for (const observer of this.options.observers) observer.sent?.(packet);

    // A control channel nobody reads would never update the port status.
    if (!this.readers.has("control") && this.background === null && !stream.isClosed) {
      this.startBackground(stream);
    }
  }

  // ==========================================================================
  // Packet iteration
  // ==========================================================================

  /** Data packets from the data channel. */
  dataPackets(): AsyncGenerator<DataPacket, void, undefined> {
    return this.read("data", dataPackets);
  }

  /** Every packet from the data channel. */
  packets(): AsyncGenerator<Packet, void, undefined> {
    return this.read("data", allPackets);
  }

  /**
   * Control packets from the control channel.
   *
   * Takes the channel over from the background status reader, which is
   * stopped before the first read. Port status packets still update
   * `portStatus()`.
   */
  controlPackets(): AsyncGenerator<ControlPacket, void, undefined> {
    return this.read("control", controlPackets);
  }

  async eachDataPacket(callback: PacketCallback<DataPacket>): Promise<void> {
    for await (const packet of this.dataPackets()) await callback(packet);
  }

  async eachPacket(callback: PacketCallback<Packet>): Promise<void> {
    for await (const packet of this.packets()) await callback(packet);
  }

  async eachControlPacket(callback: PacketCallback<ControlPacket>): Promise<void> {
    for await (const packet of this.controlPackets()) await callback(packet);
  }

  /**
   * Call `callback` whenever the reported port status differs from the last
   * one delivered. The first report is always delivered.
   */
  async portStatusChanged(callback: PacketCallback<PortStatus>): Promise<void> {
    let last: PortStatus | null = null;
    for await (const packet of this.controlPackets()) {
      const info = packet.information;
      if (packet.command !== "port_status" || info === null) continue;
      if (last !== null && portStatusEquals(last, info)) continue;
      last = { ...info };
      await callback({ ...info });
    }
  }

  /** Latest port status seen on the control channel; `{}` before the first one. */
  portStatus(): PortStatusSnapshot {
    return this.status.get();
  }

  private async *read<P extends Packet>(
    name: ChannelName,
    filter: PacketFilter<P>,
  ): AsyncGenerator<P, void, undefined> {
    this.ensureOpen();
    if (this.readers.has(name)) {
      throw HdlcdError.invalidArgument(`The ${name} channel already has a reader`);
    }
    this.readers.add(name);

    try {
      if (name === "control") await this.stopBackground();
      const stream = await this.channel(name);
      for await (const packet of readPackets(stream, filter, this.readOptions())) {
        // Packets still buffered when the session closed are not handed out.
        this.ensureOpen();
        if (name === "control") this.recordStatus(packet);
        yield packet;
      }
    } catch (err) {
      if (this.closed && err instanceof HdlcdError && err.isStreamError()) {
        throw new HdlcdError("closed", "device session closed", { cause: err });
      }
      throw err;
    } finally {
      this.readers.delete(name);
    }
  }

  private readOptions(signal?: AbortSignal): ReadPacketsOptions {
    return {
      signal,
      strictContentIds: this.options.strictContentIds,
      onPacket: (packet) => {
        for (const observer of this.options.observers) observer.received?.(packet);
      },
    };
  }

  private recordStatus(packet: Packet): void {
    if (packet.tag === "Control" && packet.command === "port_status" && packet.information) {
      this.status.set(packet.information);
    }
  }

  // ==========================================================================
  // Background status reader
  // ==========================================================================

  private startBackground(stream: SocketStream): void {
    const controller = new AbortController();
    const done = this.runBackground(stream, controller.signal);
    this.background = { controller, done };
  }

  private async runBackground(stream: SocketStream, signal: AbortSignal): Promise<void> {
    debugLog(SESSION_NAMESPACE, "background status reader started", { portName: this.portName });
    try {
      for await (const packet of readPackets(stream, controlPackets, this.readOptions(signal))) {
        this.recordStatus(packet);
      }
      debugLog(SESSION_NAMESPACE, "background status reader stopped", { portName: this.portName });
    } catch (err) {
      debugLog(SESSION_NAMESPACE, "background status reader failed", {
        portName: this.portName,
        error: errorMessage(err),
      });
    } finally {
      if (this.background?.controller.signal === signal) this.background = null;
    }
  }

  /** Cancel the background reader and wait for it to let go of the socket. */
  private async stopBackground(): Promise<void> {
    const background = this.background;
    if (background === null) return;
    this.background = null;
    background.controller.abort();
    await background.done;
  }

  // ==========================================================================
  // Connections
  // ==========================================================================

  private channel(name: ChannelName): Promise<SocketStream> {
    this.ensureOpen();
    let channel = this.channels.get(name);
    if (channel === undefined) {
      channel = this.connect(name);
      this.channels.set(name, channel);
    }
    return channel;
  }

  private async connect(name: ChannelName): Promise<SocketStream> {
    const { dialer, host, port, dataHeader } = this.options;
    debugLog(SESSION_NAMESPACE, `connecting ${name} channel`, { host, port, portName: this.portName });

    const header = name === "control" ? CONTROL_HEADER : dataHeader;
    const stream = await connectChannel(dialer, host, port, this.portName, header);
    if (this.closed) {
      stream.close();
      throw HdlcdError.closed();
    }
    this.streams.add(stream);
    return stream;
  }

  private ensureOpen(): void {
    if (this.closed) throw HdlcdError.closed();
  }

  /**
   * Close both channels and stop the background reader. Blocked reads fail
   * with a `closed` error. Calling it again does nothing.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const background = this.background;
    this.background = null;
    background?.controller.abort();

    for (const stream of this.streams) stream.close();
    this.streams.clear();

    await background?.done;
    debugLog(SESSION_NAMESPACE, "closed", { portName: this.portName });
  }
}

/**
 * Open a session for `portName`, run `body` with it and close it afterwards,
 * whether `body` succeeds or throws.
 */
export async function openDevice<T>(
  portName: string,
  options: DeviceOptions,
  body: (device: DeviceSession) => Promise<T> | T,
): Promise<T> {
  const device = new DeviceSession(portName, options);
  try {
    return await body(device);
  } finally {
    await device.close();
  }
}
