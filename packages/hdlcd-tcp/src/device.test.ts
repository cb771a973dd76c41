import { describe, expect, it } from "vitest";

import type { PacketObserver } from "@hdlcd/core";
import type { ControlPacket, DataPacket, Packet, PortStatus } from "@hdlcd/wire";
import { DeviceSession, openDevice } from "./device.ts";
import { type MockSocket, flush, mockDialer } from "./mock_socket.ts";
import type { Dialer } from "./transport.ts";

const PORT_NAME = "/dev/ttyUSB0";
const NAME_BYTES = Array.from(new TextEncoder().encode(PORT_NAME));

const DATA_HANDSHAKE = [0x00, 0x01, NAME_BYTES.length, ...NAME_BYTES];
const CONTROL_HANDSHAKE = [0x00, 0x10, NAME_BYTES.length, ...NAME_BYTES];

function setup(options: { strictContentIds?: boolean; observers?: PacketObserver[] } = {}) {
  const { dialer, sockets } = mockDialer();
  const device = new DeviceSession(PORT_NAME, { host: "daemon.test", port: 5000, dialer, ...options });
  return { device, sockets };
}

function socketAt(sockets: MockSocket[], index: number): MockSocket {
  const socket = sockets[index];
  if (socket === undefined) throw new Error(`no socket #${index}`);
  return socket;
}

function written(socket: MockSocket): number[][] {
  return socket.written.map((chunk) => Array.from(chunk));
}

/** Settle a promise into its value or error so a rejection is never left unhandled. */
function settle<T>(promise: Promise<T>): Promise<T | unknown> {
  return promise.catch((err: unknown) => err);
}

describe("DeviceSession", () => {
  describe("control commands", () => {
    it("opens the control channel with its handshake and sends lock", async () => {
      const { device, sockets } = setup();
      await device.lock();

      expect(sockets).toHaveLength(1);
      const control = socketAt(sockets, 0);
      expect(control.host).toBe("daemon.test");
      expect(control.port).toBe(5000);
      expect(written(control)).toEqual([CONTROL_HANDSHAKE, [0x10, 0x01]]);
      await device.close();
    });

    it("sends every command on one lazily opened connection", async () => {
      const { device, sockets } = setup();
      await Promise.all([device.lock(), device.release()]);
      await device.echo();
      await device.keepAlive();
      await device.requestPortKill();

      expect(sockets).toHaveLength(1);
      expect(written(socketAt(sockets, 0))).toEqual([
        CONTROL_HANDSHAKE,
        [0x10, 0x01],
        [0x10, 0x00],
        [0x10, 0x10],
        [0x10, 0x20],
        [0x10, 0x30],
      ]);
      await device.close();
    });

    it("starts a background reader that keeps the port status current", async () => {
      const { device, sockets } = setup();
      expect(device.portStatus()).toEqual({});

      await device.lock();
      expect(device.hasBackgroundReader()).toBe(true);

      socketAt(sockets, 0).receive(0x10, 0x05);
      await flush();
      expect(device.portStatus()).toEqual({ alive: true, lockedByOthers: false, lockedByMe: true });

      socketAt(sockets, 0).receive(0x10, 0x20, 0x10, 0x06);
      await flush();
      expect(device.portStatus()).toEqual({ alive: true, lockedByOthers: true, lockedByMe: false });
      await device.close();
    });

    it("hands out copies of the port status", async () => {
      const { device, sockets } = setup();
      await device.lock();
      socketAt(sockets, 0).receive(0x10, 0x04);
      await flush();

      const first = device.portStatus();
      expect(device.portStatus()).not.toBe(first);
      expect(device.portStatus()).toEqual(first);
      await device.close();
    });

    it("stops the background reader when the socket fails", async () => {
      const { device, sockets } = setup();
      await device.lock();
      socketAt(sockets, 0).simulateError("connection reset");
      await flush();

      expect(device.hasBackgroundReader()).toBe(false);
      await expect(device.release()).rejects.toMatchObject({
        kind: "io",
        message: "Cannot write to a closed socket",
      });
      await device.close();
    });
  });

  describe("data channel", () => {
    it("yields only data packets to eachDataPacket", async () => {
      const { device, sockets } = setup();
      const received: DataPacket[] = [];
      const done = settle(device.eachDataPacket((packet) => void received.push(packet)));
      await flush();

      const data = socketAt(sockets, 0);
      expect(written(data)).toEqual([DATA_HANDSHAKE]);
      data.receive(0x00, 0x00, 0x01, 0x41, 0x10, 0x05, 0x04, 0x00, 0x00);
      await flush();

      expect(received.map((p) => Array.from(p.payload))).toEqual([[0x41], []]);
      expect(received[1].reliable).toBe(true);
      expect(device.portStatus()).toEqual({});

      await device.close();
      expect(await done).toMatchObject({ kind: "closed", message: "device session closed" });
    });

    it("stops delivering buffered packets once the session closes", async () => {
      const { device, sockets } = setup();
      const received: number[][] = [];
      const done = settle(
        device.eachDataPacket(async (packet) => {
          received.push(Array.from(packet.payload));
          await device.close();
        }),
      );
      await flush();

      socketAt(sockets, 0).receive(0x00, 0x00, 0x01, 0xaa, 0x00, 0x00, 0x01, 0xbb);
      expect(await done).toMatchObject({ kind: "closed", message: "device session closed" });
      expect(received).toEqual([[0xaa]]);
    });

    it("does not record buffered port status after close", async () => {
      const { device, sockets } = setup();
      const done = settle(
        device.eachControlPacket(async () => {
          await device.close();
        }),
      );
      await flush();

      socketAt(sockets, 0).receive(0x10, 0x04, 0x10, 0x05);
      expect(await done).toMatchObject({ kind: "closed" });
      expect(device.portStatus()).toEqual({ alive: true, lockedByOthers: false, lockedByMe: false });
    });

    it("yields every packet to eachPacket", async () => {
      const { device, sockets } = setup();
      const tags: string[] = [];
      const done = settle(device.eachPacket((packet) => void tags.push(packet.tag)));
      await flush();

      socketAt(sockets, 0).receive(0x00, 0x00, 0x00, 0x10, 0x20, 0x02, 0x00, 0x00);
      await flush();
      expect(tags).toEqual(["Data", "Control", "Data"]);

      await device.close();
      expect(await done).toMatchObject({ kind: "closed" });
    });

    it("awaits async callbacks before reading on", async () => {
      const { device, sockets } = setup();
      const order: string[] = [];
      const done = settle(
        device.eachDataPacket(async (packet) => {
          order.push(`start ${packet.payload[0]}`);
          await flush();
          order.push(`end ${packet.payload[0]}`);
        }),
      );
      await flush();

      socketAt(sockets, 0).receive(0x00, 0x00, 0x01, 0x01, 0x00, 0x00, 0x01, 0x02);
      await flush();
      await flush();
      await flush();
      expect(order).toEqual(["start 1", "end 1", "start 2", "end 2"]);

      await device.close();
      await done;
    });

    it("applies session header overrides to the data channel", async () => {
      const { dialer, sockets } = mockDialer();
      const device = new DeviceSession("p", { dialer, dataHeader: { typeOfData: "hdlc_raw", wantTxData: true } });
      const iter = device.dataPackets();
      const next = settle(iter.next());
      await flush();

      expect(written(socketAt(sockets, 0))).toEqual([[0x00, 0x33, 0x01, 0x70]]);
      await device.close();
      expect(await next).toMatchObject({ kind: "closed" });
    });

    it("rejects a second concurrent reader", async () => {
      const { device } = setup();
      const first = settle(device.dataPackets().next());
      await expect(device.dataPackets().next()).rejects.toMatchObject({
        kind: "invalid_argument",
        message: "The data channel already has a reader",
      });
      await device.close();
      await first;
    });

    it("fails on unknown content ids in strict mode", async () => {
      const { device, sockets } = setup({ strictContentIds: true });
      const done = settle(device.eachPacket(() => {}));
      await flush();

      socketAt(sockets, 0).receive(0x50);
      expect(await done).toMatchObject({ kind: "unknown_content_id" });
      await device.close();
    });

    it("fails with eof when the daemon closes mid-packet", async () => {
      const { device, sockets } = setup();
      const done = settle(device.eachDataPacket(() => {}));
      await flush();

      const data = socketAt(sockets, 0);
      data.receive(0x00, 0x00, 0x04, 0x01);
      data.destroy();
      expect(await done).toMatchObject({ kind: "eof" });
      await device.close();
    });
  });

  describe("control channel", () => {
    it("reads control packets after its handshake", async () => {
      const { device, sockets } = setup();
      const received: ControlPacket[] = [];
      const done = settle(device.eachControlPacket((packet) => void received.push(packet)));
      await flush();

      const control = socketAt(sockets, 0);
      expect(written(control)).toEqual([CONTROL_HANDSHAKE]);
      expect(device.hasBackgroundReader()).toBe(false);

      control.receive(0x00, 0x00, 0x00, 0x10, 0x03);
      await flush();
      expect(received.map((p) => p.command)).toEqual(["port_status"]);
      expect(device.portStatus()).toEqual({ alive: false, lockedByOthers: true, lockedByMe: true });

      await device.close();
      expect(await done).toMatchObject({ kind: "closed" });
    });

    it("takes the channel over from the background reader", async () => {
      const { device, sockets } = setup();
      await device.lock();
      const control = socketAt(sockets, 0);
      control.receive(0x10, 0x05);
      await flush();
      expect(device.hasBackgroundReader()).toBe(true);

      const iter = device.controlPackets();
      const next = iter.next();
      await flush();
      expect(device.hasBackgroundReader()).toBe(false);
      expect(device.portStatus()).toEqual({ alive: true, lockedByOthers: false, lockedByMe: true });

      control.receive(0x10, 0x04);
      const result = await next;
      expect(result.value).toMatchObject({
        command: "port_status",
        information: { alive: true, lockedByOthers: false, lockedByMe: false },
      });
      expect(device.portStatus()).toEqual({ alive: true, lockedByOthers: false, lockedByMe: false });
      expect(sockets).toHaveLength(1);

      await iter.return();
      await device.close();
    });

    it("does not start a background reader while the caller reads", async () => {
      const { device } = setup();
      const next = settle(device.controlPackets().next());
      await flush();
      await device.lock();
      expect(device.hasBackgroundReader()).toBe(false);
      await device.close();
      await next;
    });

    it("restarts the background reader after the caller stops reading", async () => {
      const { device, sockets } = setup();
      const iter = device.controlPackets();
      const next = iter.next();
      await flush();
      socketAt(sockets, 0).receive(0x10, 0x24);
      await next;
      await iter.return();

      await device.release();
      expect(device.hasBackgroundReader()).toBe(true);
      await device.close();
    });

    it("reports only port status changes", async () => {
      const { device, sockets } = setup();
      const changes: PortStatus[] = [];
      const done = settle(device.portStatusChanged((status) => void changes.push(status)));
      await flush();

      socketAt(sockets, 0).receive(
        0x10, 0x04, // alive
        0x10, 0x04, // repeat
        0x10, 0x10, // echo
        0x10, 0x05, // alive, locked by me
        0x10, 0x05, // repeat
        0x10, 0x04, // alive again
      );
      await flush();

      expect(changes).toEqual([
        { alive: true, lockedByOthers: false, lockedByMe: false },
        { alive: true, lockedByOthers: false, lockedByMe: true },
        { alive: true, lockedByOthers: false, lockedByMe: false },
      ]);
      await device.close();
      expect(await done).toMatchObject({ kind: "closed" });
    });
  });

  describe("observers", () => {
    it("sees sent and received packets", async () => {
      const sent: Packet[] = [];
      const received: Packet[] = [];
      const { device, sockets } = setup({
        observers: [{ sent: (p) => void sent.push(p), received: (p) => void received.push(p) }],
      });

      await device.lock();
      socketAt(sockets, 0).receive(0x10, 0x01);
      await flush();

      expect(sent.map((p) => (p.tag === "Control" ? p.command : p.tag))).toEqual(["lock"]);
      expect(received).toHaveLength(1);
      expect(received[0]).toMatchObject({ tag: "Control", command: "port_status" });
      await device.close();
    });
  });

  describe("close", () => {
    it("closes both sockets and stops the background reader", async () => {
      const { device, sockets } = setup();
      await device.lock();
      const done = settle(device.eachDataPacket(() => {}));
      await flush();
      expect(sockets).toHaveLength(2);

      await device.close();
      expect(device.isClosed()).toBe(true);
      expect(device.hasBackgroundReader()).toBe(false);
      expect(sockets.every((s) => s.destroyed)).toBe(true);
      expect(await done).toMatchObject({ kind: "closed" });
    });

    it("rejects operations afterwards", async () => {
      const { device, sockets } = setup();
      await device.close();
      await device.close();

      await expect(device.lock()).rejects.toMatchObject({ kind: "closed" });
      await expect(device.dataPackets().next()).rejects.toMatchObject({ kind: "closed" });
      await expect(device.eachControlPacket(() => {})).rejects.toMatchObject({ kind: "closed" });
      expect(sockets).toHaveLength(0);
    });
  });

  describe("connection failures", () => {
    it("surfaces the dial error and never redials", async () => {
      let dials = 0;
      const dialer: Dialer = async () => {
        dials++;
        throw new Error("ECONNREFUSED");
      };
      const device = new DeviceSession(PORT_NAME, { dialer });

      await expect(device.lock()).rejects.toThrow("ECONNREFUSED");
      await expect(device.release()).rejects.toThrow("ECONNREFUSED");
      expect(dials).toBe(1);
      await device.close();
    });

    it("rejects an oversize port name before dialing", async () => {
      const { dialer, sockets } = mockDialer();
      const device = new DeviceSession("x".repeat(300), { dialer });
      await expect(device.lock()).rejects.toMatchObject({ kind: "invalid_argument" });
      expect(sockets).toHaveLength(0);
      await device.close();
    });
  });
});

describe("openDevice", () => {
  it("returns the body's result and closes the session", async () => {
    const { dialer, sockets } = mockDialer();
    let session: DeviceSession | null = null;
    const result = await openDevice(PORT_NAME, { dialer }, async (device) => {
      session = device;
      await device.lock();
      return "done";
    });

    expect(result).toBe("done");
    expect(session).not.toBeNull();
    expect(socketAt(sockets, 0).destroyed).toBe(true);
  });

  it("closes the session when the body throws", async () => {
    const { dialer, sockets } = mockDialer();
    const err = await settle(
      openDevice(PORT_NAME, { dialer }, async (device) => {
        await device.lock();
        throw new Error("boom");
      }),
    );

    expect(err).toBeInstanceOf(Error);
    expect(err).toMatchObject({ message: "boom" });
    expect(socketAt(sockets, 0).destroyed).toBe(true);
  });
});
