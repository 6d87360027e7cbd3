// UDP front door: binds a socket and drives a QuicDispatcher with it.

import debug from "debug";
import {
  QuicDispatcher,
  formatAddress,
  resolveServerConfig,
  type Address,
  type CredentialStore,
  type QuicEngineDriver,
  type ServerConfig,
  type SessionFactory,
} from "@quay/core";
import { pemCredentialStore } from "./credentials.ts";
import { NodeScheduler } from "./scheduler.ts";
import { NodeDatagramSocket, type DatagramSocket } from "./socket.ts";

const log = debug("quay:udp");

export interface UdpServerOptions {
  config: Partial<ServerConfig>;
  driver: QuicEngineDriver;
  sessionFactory: SessionFactory;
  /** Defaults to loading PEM files. */
  credentials?: CredentialStore;
  /** Defaults to a node:dgram socket suited to the configured host. */
  socket?: DatagramSocket;
  scheduler?: NodeScheduler;
  /**
   * Receives errors no caller can observe: dispatcher failures, socket
   * errors. Defaults to printing them with console.error.
   */
  onError?: (error: unknown) => void;
}

function reportError(error: unknown): void {
  console.error("quay: unhandled error", error);
}

/** A QUIC server's UDP endpoint. */
export class UdpServer {
  private constructor(
    readonly config: ServerConfig,
    readonly address: Address,
    readonly dispatcher: QuicDispatcher,
    private readonly socket: DatagramSocket,
    private readonly scheduler: NodeScheduler,
  ) {}

  /**
   * Validate the configuration, load credentials, then bind.
   *
   * Rejects with a StartupError before any socket is bound when the
   * configuration or the credentials are unusable.
   */
  static async listen(options: UdpServerOptions): Promise<UdpServer> {
    const config = resolveServerConfig(options.config);
    const credentials = await (options.credentials ?? pemCredentialStore).load(
      config.certfile,
      config.keyfile,
    );
    const onError = options.onError ?? reportError;
    const scheduler = options.scheduler ?? new NodeScheduler();
    const socket =
      options.socket ?? new NodeDatagramSocket(NodeDatagramSocket.typeFor(config.host));

    const address = await socket.bind(config.port, config.host);
    const dispatcher = new QuicDispatcher({
      config,
      server: address,
      driver: options.driver,
      credentials,
      sessionFactory: options.sessionFactory,
      send: (event) => socket.send(event.data, event.address),
      scheduler,
      onError,
    });

    socket.onMessage((data, from) => {
      dispatcher.handle({ kind: "rawData", data, address: from }).catch(onError);
    });
    socket.onClose(() => {
      dispatcher.handle({ kind: "closed" }).catch(onError);
    });
    socket.onError(onError);

    log("listening on %s", formatAddress(address));
    return new UdpServer(config, address, dispatcher, socket, scheduler);
  }

  /** Stop receiving and drop every pending wake-up. */
  async close(): Promise<void> {
    this.scheduler.close();
    await this.socket.close();
    log("closed %s", formatAddress(this.address));
  }
}
