// Errors raised while parsing a datagram's routing header.

export type HeaderErrorKind = "truncated" | "cid-too-long" | "fixed-bit" | "varint";

/**
 * A datagram whose header could not be parsed.
 *
 * Always caused by untrusted network input; callers drop the datagram.
 */
export class HeaderError extends Error {
  constructor(
    public kind: HeaderErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "HeaderError";
  }

  static truncated(what: string, needed: number, available: number): HeaderError {
    return new HeaderError(
      "truncated",
      `truncated ${what}: need ${needed} bytes, have ${available}`,
    );
  }

  static cidTooLong(which: "destination" | "source", length: number): HeaderError {
    return new HeaderError("cid-too-long", `${which} connection ID too long: ${length} bytes`);
  }

  static fixedBit(): HeaderError {
    return new HeaderError("fixed-bit", "packet fixed bit is not set");
  }

  static varint(what: string): HeaderError {
    return new HeaderError("varint", `${what} does not fit in a safe integer`);
  }
}
