// Byte helpers shared by the header reader and the packet encoders.

import { HeaderError } from "./errors.ts";
import { decodeQuicVarint } from "./varint.ts";

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

/** Big-endian u32, the byte order of every fixed-width QUIC field. */
export function encodeU32(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) {
    throw new RangeError(`u32 out of range: ${value}`);
  }
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value);
  return out;
}

export function encodeU8(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new RangeError(`u8 out of range: ${value}`);
  }
  return Uint8Array.of(value);
}

/**
 * Cursor over a received datagram.
 *
 * Every pull checks the remaining length first and throws
 * `HeaderError.truncated` instead of reading past the end.
 */
export class ByteReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly buf: Uint8Array) {
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  /** Current read position. */
  tell(): number {
    return this.offset;
  }

  /** Bytes left after the current position. */
  get remaining(): number {
    return this.buf.length - this.offset;
  }

  private need(n: number, what: string): void {
    if (this.remaining < n) {
      throw HeaderError.truncated(what, n, this.remaining);
    }
  }

  pullU8(what = "u8"): number {
    this.need(1, what);
    return this.view.getUint8(this.offset++);
  }

  pullU32(what = "u32"): number {
    this.need(4, what);
    const value = this.view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  /** Copy `n` bytes out of the datagram. */
  pullBytes(n: number, what = "bytes"): Uint8Array {
    this.need(n, what);
    const out = this.buf.slice(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  pullVarint(what = "varint"): number {
    const { value, next } = decodeQuicVarint(this.buf, this.offset, what);
    this.offset = next;
    return value;
  }
}
