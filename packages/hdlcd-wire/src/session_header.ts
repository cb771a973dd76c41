/**
 * Session header - the handshake sent once as the first bytes of every
 * connection to the daemon.
 *
 * Wire format:
 * [1 byte: version] [1 byte: SAP] [1 byte: name length] [name bytes]
 *
 * SAP (service access point) byte:
 * - bits 4-7: type of data
 * - bit 2: deliver invalid packets
 * - bit 1: deliver packets sent to the device (tx)
 * - bit 0: deliver packets received from the device (rx)
 */

import { HdlcdError } from "./errors.ts";

export const SESSION_HEADER_VERSION = 0;

/** Longest port name a session header can carry, in bytes. */
export const MAX_PORT_NAME_LENGTH = 0xff;

export const TypeOfData = {
  payload: 0,
  port_status_only: 1,
  payload_raw: 2,
  hdlc_raw: 3,
  hdlc_dissected: 4,
} as const;

export type TypeOfData = keyof typeof TypeOfData;

export const SapFlags = {
  RX_DATA: 0b0001,
  TX_DATA: 0b0010,
  INVALIDS: 0b0100,
} as const;

export interface SessionHeaderOptions {
  version: number;
  typeOfData: TypeOfData;
  wantInvalids: boolean;
  wantTxData: boolean;
  wantRxData: boolean;
}

export interface SessionHeader extends SessionHeaderOptions {
  portName: string;
}

export const DEFAULT_SESSION_HEADER_OPTIONS: Readonly<SessionHeaderOptions> = Object.freeze({
  version: SESSION_HEADER_VERSION,
  typeOfData: "payload",
  wantInvalids: false,
  wantTxData: false,
  wantRxData: true,
});

function isTypeOfData(name: string): name is TypeOfData {
  return Object.hasOwn(TypeOfData, name);
}

function typeOfDataFromCode(code: number): TypeOfData | undefined {
  for (const name of Object.keys(TypeOfData)) {
    if (isTypeOfData(name) && TypeOfData[name] === code) return name;
  }
  return undefined;
}

/**
 * Build a session header, filling unspecified options with the defaults
 * (version 0, payload, rx only).
 */
export function sessionHeader(
  portName: string,
  options: Partial<SessionHeaderOptions> = {},
): SessionHeader {
  return Object.freeze({ ...DEFAULT_SESSION_HEADER_OPTIONS, ...options, portName });
}

/**
 * Serialize a session header.
 *
 * Rejects rather than truncates a port name longer than 255 bytes.
 */
export function encodeSessionHeader(
  portName: string,
  options: Partial<SessionHeaderOptions> = {},
): Uint8Array {
  const header = sessionHeader(portName, options);

  if (!Number.isInteger(header.version) || header.version < 0 || header.version > 0xff) {
    throw HdlcdError.invalidArgument(`Invalid session header version: ${header.version}`);
  }
  if (!isTypeOfData(header.typeOfData)) {
    throw HdlcdError.invalidArgument(`Invalid type of data: ${String(header.typeOfData)}`);
  }

  const name = new TextEncoder().encode(header.portName);
  if (name.length > MAX_PORT_NAME_LENGTH) {
    throw HdlcdError.invalidArgument(
      `Port name is ${name.length} bytes long, at most ${MAX_PORT_NAME_LENGTH} fit in a session header`,
    );
  }

  let sap = TypeOfData[header.typeOfData] << 4;
  if (header.wantRxData) sap |= SapFlags.RX_DATA;
  if (header.wantTxData) sap |= SapFlags.TX_DATA;
  if (header.wantInvalids) sap |= SapFlags.INVALIDS;

  const out = new Uint8Array(3 + name.length);
  out[0] = header.version;
  out[1] = sap;
  out[2] = name.length;
  out.set(name, 3);
  return out;
}

/**
 * Parse a session header.
 *
 * @returns the header and the offset just past it
 */
export function decodeSessionHeader(
  buf: Uint8Array,
  offset = 0,
): { value: SessionHeader; next: number } {
  if (buf.length - offset < 3) {
    throw HdlcdError.eof("session header");
  }
  const version = buf[offset];
  const sap = buf[offset + 1];
  const nameLength = buf[offset + 2];
  const start = offset + 3;
  if (buf.length - start < nameLength) {
    throw HdlcdError.eof(`session header port name (${nameLength} bytes)`);
  }

  const typeOfData = typeOfDataFromCode(sap >> 4);
  if (typeOfData === undefined) {
    throw HdlcdError.invalidArgument(`Unknown type of data code ${sap >> 4}`);
  }

  const portName = new TextDecoder().decode(buf.subarray(start, start + nameLength));
  return {
    value: sessionHeader(portName, {
      version,
      typeOfData,
      wantRxData: (sap & SapFlags.RX_DATA) !== 0,
      wantTxData: (sap & SapFlags.TX_DATA) !== 0,
      wantInvalids: (sap & SapFlags.INVALIDS) !== 0,
    }),
    next: start + nameLength,
  };
}
