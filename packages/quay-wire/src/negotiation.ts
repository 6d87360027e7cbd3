// Version negotiation datagrams (RFC 9000 §17.2.1).

import { randomInt } from "node:crypto";
import { concat, encodeU32, encodeU8 } from "./bytes.ts";
import { MAX_CID_LENGTH, PACKET_LONG_HEADER, QuicVersion } from "./constants.ts";

export interface VersionNegotiationOptions {
  /** Placed in the packet's source connection ID field. */
  sourceCid: Uint8Array;
  /** Placed in the packet's destination connection ID field. */
  destinationCid: Uint8Array;
  supportedVersions: readonly number[];
}

function encodeCid(cid: Uint8Array): Uint8Array {
  if (cid.length > MAX_CID_LENGTH) {
    throw new RangeError(`connection ID too long: ${cid.length} bytes`);
  }
  return concat(encodeU8(cid.length), cid);
}

/**
 * Encode a version negotiation packet listing `supportedVersions`.
 *
 * The unused bits of the first byte are random; only the long header bit is
 * fixed.
 */
export function encodeVersionNegotiation(options: VersionNegotiationOptions): Uint8Array {
  return concat(
    encodeU8(randomInt(0, 0x100) | PACKET_LONG_HEADER),
    encodeU32(QuicVersion.NEGOTIATION),
    encodeCid(options.destinationCid),
    encodeCid(options.sourceCid),
    ...options.supportedVersions.map(encodeU32),
  );
}
