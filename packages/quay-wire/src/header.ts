// Stateless parsing of a datagram's routing header.
//
// Only the fields needed to route a datagram are read: version, connection
// IDs and packet type. Everything after them is left to the Protocol Engine.

import { ByteReader } from "./bytes.ts";
import {
  DEFAULT_HOST_CID_LENGTH,
  MAX_CID_LENGTH,
  PACKET_FIXED_BIT,
  PACKET_LONG_HEADER,
  PacketType,
  QuicVersion,
  RETRY_INTEGRITY_TAG_SIZE,
  longPacketType,
} from "./constants.ts";
import { HeaderError } from "./errors.ts";

/** Routing header of a received datagram. */
export interface QuicHeader {
  isLongHeader: boolean;
  /** Version carried by a long header, `null` for short headers. */
  version: number | null;
  /** `null` for version negotiation packets. */
  packetType: PacketType | null;
  destinationCid: Uint8Array;
  /** Empty for short headers. */
  sourceCid: Uint8Array;
  /** Initial and Retry only, empty otherwise. */
  token: Uint8Array;
  /** Retry only, empty otherwise. */
  integrityTag: Uint8Array;
  /** Bytes of the packet after the header, as declared by the header. */
  restLength: number;
}

function pullCid(reader: ByteReader, which: "destination" | "source"): Uint8Array {
  const length = reader.pullU8(`${which} connection ID length`);
  if (length > MAX_CID_LENGTH) {
    throw HeaderError.cidTooLong(which, length);
  }
  return reader.pullBytes(length, `${which} connection ID`);
}

/**
 * Parse the routing header at the start of `data`.
 *
 * Short headers do not encode the destination connection ID length, so the
 * parser assumes `hostCidLength`, the length of the IDs this host issues.
 *
 * @throws HeaderError when the header is malformed or truncated
 */
export function pullQuicHeader(
  data: Uint8Array,
  hostCidLength: number = DEFAULT_HOST_CID_LENGTH,
): QuicHeader {
  const reader = new ByteReader(data);
  const firstByte = reader.pullU8("first byte");

  if ((firstByte & PACKET_LONG_HEADER) === 0) {
    if ((firstByte & PACKET_FIXED_BIT) === 0) {
      throw HeaderError.fixedBit();
    }
    const destinationCid = reader.pullBytes(hostCidLength, "destination connection ID");
    return {
      isLongHeader: false,
      version: null,
      packetType: PacketType.ONE_RTT,
      destinationCid,
      sourceCid: new Uint8Array(0),
      token: new Uint8Array(0),
      integrityTag: new Uint8Array(0),
      restLength: reader.remaining,
    };
  }

  const version = reader.pullU32("version");
  const destinationCid = pullCid(reader, "destination");
  const sourceCid = pullCid(reader, "source");

  if (version === QuicVersion.NEGOTIATION) {
    return {
      isLongHeader: true,
      version,
      packetType: null,
      destinationCid,
      sourceCid,
      token: new Uint8Array(0),
      integrityTag: new Uint8Array(0),
      restLength: reader.remaining,
    };
  }

  if ((firstByte & PACKET_FIXED_BIT) === 0) {
    throw HeaderError.fixedBit();
  }

  const packetType = longPacketType(firstByte, version);
  let token: Uint8Array = new Uint8Array(0);
  let integrityTag: Uint8Array = new Uint8Array(0);
  let restLength: number;

  if (packetType === PacketType.RETRY) {
    const tokenLength = reader.remaining - RETRY_INTEGRITY_TAG_SIZE;
    if (tokenLength < 0) {
      throw HeaderError.truncated("retry integrity tag", RETRY_INTEGRITY_TAG_SIZE, reader.remaining);
    }
    token = reader.pullBytes(tokenLength, "retry token");
    integrityTag = reader.pullBytes(RETRY_INTEGRITY_TAG_SIZE, "retry integrity tag");
    restLength = 0;
  } else {
    if (packetType === PacketType.INITIAL) {
      const tokenLength = reader.pullVarint("token length");
      token = reader.pullBytes(tokenLength, "token");
    }
    restLength = reader.pullVarint("packet length");
  }

  return {
    isLongHeader: true,
    version,
    packetType,
    destinationCid,
    sourceCid,
    token,
    integrityTag,
    restLength,
  };
}
