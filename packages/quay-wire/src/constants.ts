// QUIC header constants.

export const PACKET_LONG_HEADER = 0x80;
export const PACKET_FIXED_BIT = 0x40;

/** Connection IDs are at most 20 bytes (RFC 9000 §17.2). */
export const MAX_CID_LENGTH = 20;

/** Length of the identifiers this server chooses for itself. */
export const DEFAULT_HOST_CID_LENGTH = 8;

/** Length of the integrity tag trailing a Retry packet. */
export const RETRY_INTEGRITY_TAG_SIZE = 16;

/** Packet types, as the masked first byte of the packet. */
export const PacketType = {
  INITIAL: 0xc0,
  ZERO_RTT: 0xd0,
  HANDSHAKE: 0xe0,
  RETRY: 0xf0,
  ONE_RTT: 0x40,
} as const;

export type PacketType = (typeof PacketType)[keyof typeof PacketType];

/** Well-known QUIC version numbers. */
export const QuicVersion = {
  NEGOTIATION: 0x0000_0000,
  VERSION_1: 0x0000_0001,
  VERSION_2: 0x6b33_43cf,
  DRAFT_29: 0xff00_001d,
} as const;

export type QuicVersion = (typeof QuicVersion)[keyof typeof QuicVersion];

type LongPacketType = Exclude<PacketType, typeof PacketType.ONE_RTT>;

// Long header type bits, indexed by `(firstByte & 0x30) >> 4`.
const V1_TYPES: readonly LongPacketType[] = [
  PacketType.INITIAL,
  PacketType.ZERO_RTT,
  PacketType.HANDSHAKE,
  PacketType.RETRY,
];

// QUIC version 2 rotates the type bits (RFC 9369 §3.2).
const V2_TYPES: readonly LongPacketType[] = [
  PacketType.RETRY,
  PacketType.INITIAL,
  PacketType.ZERO_RTT,
  PacketType.HANDSHAKE,
];

function typeTable(version: number): readonly LongPacketType[] {
  return version === QuicVersion.VERSION_2 ? V2_TYPES : V1_TYPES;
}

/** Map the type bits of a long header's first byte to its packet type. */
export function longPacketType(firstByte: number, version: number): LongPacketType {
  return typeTable(version)[(firstByte & 0x30) >> 4];
}

/** First byte of a long header of `packetType` under `version`. */
export function longHeaderFirstByte(packetType: LongPacketType, version: number): number {
  const bits = typeTable(version).indexOf(packetType);
  return PACKET_LONG_HEADER | PACKET_FIXED_BIT | (bits << 4);
}
