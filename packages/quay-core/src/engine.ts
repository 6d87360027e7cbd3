/**
 * Protocol Engine interface.
 *
 * The engine owns everything about a QUIC connection: handshake, keys,
 * framing, loss recovery. The dispatcher only feeds it datagrams and time,
 * and pulls events, datagrams and deadlines back out.
 */

import type { KeyObject, X509Certificate } from "node:crypto";
import type { QuicEvent } from "./events.ts";
import type { Address, OutboundDatagram } from "./types.ts";

/** TLS material for the server side of the handshake. */
export interface Credentials {
  certificate: X509Certificate;
  privateKey: KeyObject;
}

/** Loads TLS material from disk. Failure is fatal at startup. */
export interface CredentialStore {
  load(certfile: string, keyfile: string): Promise<Credentials>;
}

/** Configuration handed to the engine for every new connection. */
export interface EngineConfiguration extends Credentials {
  /** The single application protocol the server offers. */
  alpnProtocols: [string];
  isClient: false;
  originalConnectionId: null;
  supportedVersions: readonly number[];
}

/** One connection's state inside the Protocol Engine. */
export interface QuicEngine {
  /** Connection ID this host chose for the connection. */
  readonly hostCid: Uint8Array;

  /**
   * Idle or closing deadline, `null` once the connection no longer needs
   * timer processing.
   */
  readonly closeAt: number | null;

  /** Feed a received datagram. `now` is in milliseconds. */
  receiveDatagram(data: Uint8Array, address: Address, now: number): void;

  /** Next pending event, or `null` once the queue is empty. */
  nextEvent(): QuicEvent | null;

  /** Next datagram to transmit, or `null` once nothing is queued. */
  nextDatagram(now: number): OutboundDatagram | null;

  /** Absolute time at which `handleTimer` must next be called, if any. */
  getTimer(): number | null;

  /** Run retransmission and idle processing for `now`. */
  handleTimer(now: number): void;
}

/** Creates engine connections. */
export interface QuicEngineDriver {
  readonly supportedVersions: readonly number[];
  createConnection(configuration: EngineConfiguration): QuicEngine;
}
