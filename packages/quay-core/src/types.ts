// Transport-facing types shared by the dispatcher and its transports.

/** A UDP peer. */
export interface Address {
  host: string;
  port: number;
}

/** A datagram, inbound from the transport or outbound to it. */
export interface RawData {
  kind: "rawData";
  data: Uint8Array;
  address: Address;
}

/** The transport stopped delivering datagrams. */
export interface Closed {
  kind: "closed";
}

/** Events a transport feeds into the dispatcher. */
export type TransportEvent = RawData | Closed;

/** A datagram the Protocol Engine wants sent. */
export interface OutboundDatagram {
  data: Uint8Array;
  address: Address;
}

/** Hands an outbound datagram to the transport. */
export type SendFn = (event: RawData) => Promise<void>;
