// QUIC variable-length integers (RFC 9000 §16).
//
// The two high bits of the first byte give the encoded length: 1, 2, 4 or 8
// bytes. The remaining bits hold the value, big-endian.

import { HeaderError } from "./errors.ts";

/** Largest value a QUIC varint can carry (2^62 - 1). */
export const MAX_QUIC_VARINT = (1n << 62n) - 1n;

export function quicVarintLength(value: number): 1 | 2 | 4 | 8 {
  if (value <= 0x3f) return 1;
  if (value <= 0x3fff) return 2;
  if (value <= 0x3fff_ffff) return 4;
  return 8;
}

export function encodeQuicVarint(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`varint out of range: ${value}`);
  }
  const length = quicVarintLength(value);
  const out = new Uint8Array(length);
  const view = new DataView(out.buffer);
  switch (length) {
    case 1:
      view.setUint8(0, value);
      break;
    case 2:
      view.setUint16(0, value | 0x4000);
      break;
    case 4:
      view.setUint32(0, (value | 0x8000_0000) >>> 0);
      break;
    case 8:
      view.setBigUint64(0, BigInt(value) | 0xc000_0000_0000_0000n);
      break;
  }
  return out;
}

export function decodeQuicVarint(
  buf: Uint8Array,
  offset: number,
  what = "varint",
): { value: number; next: number } {
  if (offset >= buf.length) throw HeaderError.truncated(what, 1, 0);
  const length = 1 << (buf[offset] >> 6);
  if (offset + length > buf.length) {
    throw HeaderError.truncated(what, length, buf.length - offset);
  }
  const view = new DataView(buf.buffer, buf.byteOffset + offset, length);
  let value: number;
  switch (length) {
    case 1:
      value = view.getUint8(0) & 0x3f;
      break;
    case 2:
      value = view.getUint16(0) & 0x3fff;
      break;
    case 4:
      value = view.getUint32(0) & 0x3fff_ffff;
      break;
    default: {
      const big = view.getBigUint64(0) & MAX_QUIC_VARINT;
      if (big > BigInt(Number.MAX_SAFE_INTEGER)) throw HeaderError.varint(what);
      value = Number(big);
    }
  }
  return { value, next: offset + length };
}
