// Header encoders, the inverse of `pullQuicHeader`.
//
// The server never builds these packets itself (the Protocol Engine does);
// they exist for clients and test harnesses that need well-formed headers.

import { concat, encodeU32, encodeU8 } from "./bytes.ts";
import {
  MAX_CID_LENGTH,
  PACKET_FIXED_BIT,
  PacketType,
  QuicVersion,
  longHeaderFirstByte,
} from "./constants.ts";
import { encodeQuicVarint } from "./varint.ts";

export interface LongHeaderOptions {
  packetType: Exclude<PacketType, typeof PacketType.ONE_RTT | typeof PacketType.RETRY>;
  version?: number;
  destinationCid: Uint8Array;
  sourceCid: Uint8Array;
  /** Initial packets only. */
  token?: Uint8Array;
  payload?: Uint8Array;
}

function cidField(cid: Uint8Array): Uint8Array {
  if (cid.length > MAX_CID_LENGTH) {
    throw new RangeError(`connection ID too long: ${cid.length} bytes`);
  }
  return concat(encodeU8(cid.length), cid);
}

/** Encode a long header packet followed by `payload`. */
export function encodeLongHeader(options: LongHeaderOptions): Uint8Array {
  const payload = options.payload ?? new Uint8Array(0);
  const version = options.version ?? QuicVersion.VERSION_1;
  const parts = [
    encodeU8(longHeaderFirstByte(options.packetType, version)),
    encodeU32(version),
    cidField(options.destinationCid),
    cidField(options.sourceCid),
  ];
  if (options.packetType === PacketType.INITIAL) {
    const token = options.token ?? new Uint8Array(0);
    parts.push(encodeQuicVarint(token.length), token);
  }
  parts.push(encodeQuicVarint(payload.length), payload);
  return concat(...parts);
}

/** Encode a short header packet followed by `payload`. */
export function encodeShortHeader(destinationCid: Uint8Array, payload?: Uint8Array): Uint8Array {
  return concat(
    encodeU8(PACKET_FIXED_BIT),
    destinationCid,
    payload ?? new Uint8Array(0),
  );
}
