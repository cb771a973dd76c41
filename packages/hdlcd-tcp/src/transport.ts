// TCP connections to the daemon.

import net from "node:net";
import { HdlcdError, encodeSessionHeader, type SessionHeaderOptions } from "@hdlcd/wire";
import { type ByteSocket, SocketStream } from "./socket_stream.ts";

/** Opens a socket to the daemon. */
export type Dialer = (host: string, port: number) => Promise<ByteSocket>;

/**
 * Connect over TCP with `node:net`.
 */
export const dialTcp: Dialer = (host, port) =>
  new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(HdlcdError.io(`Failed to connect to ${host}:${port}: ${err.message}`, err));
    };

    const socket = net.createConnection({ host, port }, () => {
      socket.off("error", onError);
      resolve(socket);
    });

    socket.once("error", onError);
  });

/**
 * Dial the daemon and send the session header for `portName`.
 *
 * The header is encoded before dialing, so invalid options never open a
 * connection.
 */
export async function connectChannel(
  dialer: Dialer,
  host: string,
  port: number,
  portName: string,
  header: Partial<SessionHeaderOptions>,
): Promise<SocketStream> {
  const handshake = encodeSessionHeader(portName, header);
  const stream = new SocketStream(await dialer(host, port));
  try {
    await stream.send(handshake);
  } catch (err) {
    stream.close();
    throw err;
  }
  return stream;
}
