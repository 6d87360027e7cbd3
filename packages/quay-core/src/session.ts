// Session Layer interface: the application protocol running on a
// connection once ALPN has been negotiated.

import type { ServerConfig } from "./config.ts";
import type { QuicEngine } from "./engine.ts";
import type { QuicEvent } from "./events.ts";
import type { Address } from "./types.ts";

export interface Session {
  /** Consume one engine event, in the order the engine produced it. */
  handle(event: QuicEvent): Promise<void>;
}

export interface SessionOptions {
  config: ServerConfig;
  /** Peer that negotiated the protocol, `null` when a timer did. */
  client: Address | null;
  server: Address | null;
  connection: QuicEngine;
  /** Flush the connection's queued datagrams to the transport. */
  sendAll: () => Promise<void>;
}

export type SessionFactory = (options: SessionOptions) => Session | Promise<Session>;
