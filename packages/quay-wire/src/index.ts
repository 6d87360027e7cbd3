// @quay/wire - QUIC routing headers and version negotiation
//
// Everything here is stateless: it parses or encodes bytes without touching
// any connection.

export {
  PACKET_LONG_HEADER,
  PACKET_FIXED_BIT,
  MAX_CID_LENGTH,
  DEFAULT_HOST_CID_LENGTH,
  RETRY_INTEGRITY_TAG_SIZE,
  PacketType,
  QuicVersion,
  longPacketType,
  longHeaderFirstByte,
} from "./constants.ts";
export { HeaderError, type HeaderErrorKind } from "./errors.ts";
export { ByteReader, concat, encodeU8, encodeU32 } from "./bytes.ts";
export {
  MAX_QUIC_VARINT,
  quicVarintLength,
  encodeQuicVarint,
  decodeQuicVarint,
} from "./varint.ts";
export { pullQuicHeader, type QuicHeader } from "./header.ts";
export { encodeVersionNegotiation, type VersionNegotiationOptions } from "./negotiation.ts";
export { encodeLongHeader, encodeShortHeader, type LongHeaderOptions } from "./builder.ts";
