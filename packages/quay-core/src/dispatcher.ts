// Connection demultiplexer and event dispatch loop.
//
// Routes each inbound datagram to its connection's Protocol Engine, reacts
// to the engine's lifecycle events, forwards every event to the connection's
// session once one exists, flushes queued datagrams and keeps the
// connection's next wake-up scheduled.
//
// All batches for one connection run one after another (see SerialQueue);
// batches for different connections interleave at their await points.

import {
  HeaderError,
  PacketType,
  encodeVersionNegotiation,
  pullQuicHeader,
  type QuicHeader,
} from "@quay/wire";
import type { ServerConfig } from "./config.ts";
import type { Credentials, EngineConfiguration, QuicEngine, QuicEngineDriver } from "./engine.ts";
import { DispatchError } from "./errors.ts";
import type { QuicEvent } from "./events.ts";
import {
  formatAddress,
  hex,
  logDispatch,
  logEgress,
  logError,
  logIngress,
  logTimer,
} from "./logging.ts";
import { ConnectionRegistry } from "./registry.ts";
import type { Scheduler } from "./scheduler.ts";
import { SerialQueue } from "./serial.ts";
import type { Session, SessionFactory } from "./session.ts";
import { TimerScheduler } from "./timer.ts";
import type { Address, SendFn, TransportEvent } from "./types.ts";

export interface DispatcherOptions {
  config: ServerConfig;
  /** Address the transport is bound to, handed to sessions. */
  server: Address | null;
  driver: QuicEngineDriver;
  credentials: Credentials;
  sessionFactory: SessionFactory;
  send: SendFn;
  scheduler: Scheduler;
  /**
   * Receives failures of batches started by a timer, which have no caller
   * to reject. Defaults to logging them on `quay:error`.
   */
  onError?: (error: unknown) => void;
}

export class QuicDispatcher {
  private readonly config: ServerConfig;
  private readonly server: Address | null;
  private readonly driver: QuicEngineDriver;
  private readonly sessionFactory: SessionFactory;
  private readonly send: SendFn;
  private readonly scheduler: Scheduler;
  private readonly onError: (error: unknown) => void;
  private readonly engineConfiguration: EngineConfiguration;

  private readonly registry = new ConnectionRegistry<QuicEngine>();
  private readonly sessions = new Map<QuicEngine, Session>();
  private readonly batches = new SerialQueue<QuicEngine>();
  private readonly timers: TimerScheduler<QuicEngine>;

  constructor(options: DispatcherOptions) {
    this.config = options.config;
    this.server = options.server;
    this.driver = options.driver;
    this.sessionFactory = options.sessionFactory;
    this.send = options.send;
    this.scheduler = options.scheduler;
    this.onError =
      options.onError ?? ((error) => logError("timer-driven batch failed: %O", error));
    this.timers = new TimerScheduler(options.scheduler);
    this.engineConfiguration = {
      alpnProtocols: [options.config.alpnProtocol],
      certificate: options.credentials.certificate,
      privateKey: options.credentials.privateKey,
      isClient: false,
      originalConnectionId: null,
      supportedVersions: options.driver.supportedVersions,
    };
  }

  /** Get the routing table. */
  getRegistry(): ConnectionRegistry<QuicEngine> {
    return this.registry;
  }

  /** Get the session of a connection, if its protocol was negotiated. */
  getSession(connection: QuicEngine): Session | undefined {
    return this.sessions.get(connection);
  }

  /**
   * Process one transport event.
   *
   * Malformed or unroutable datagrams are dropped. Rejects only when the
   * engine's events contradict the dispatcher's state, or when sending or
   * the session fails.
   */
  async handle(event: TransportEvent): Promise<void> {
    switch (event.kind) {
      case "rawData":
        await this.receive(event.data, event.address);
        return;
      case "closed":
        logDispatch("transport closed");
        return;
    }
  }

  /** Send every datagram the engine has queued for `connection`, in order. */
  async sendAll(connection: QuicEngine): Promise<void> {
    const now = this.scheduler.now();
    let sent = 0;
    for (
      let datagram = connection.nextDatagram(now);
      datagram !== null;
      datagram = connection.nextDatagram(now)
    ) {
      await this.send({ kind: "rawData", data: datagram.data, address: datagram.address });
      sent++;
    }
    if (sent > 0) {
      logEgress("%s: sent %d datagrams", hex(connection.hostCid), sent);
    }
  }

  private async receive(data: Uint8Array, address: Address): Promise<void> {
    let header: QuicHeader;
    try {
      header = pullQuicHeader(data, this.config.hostCidLength);
    } catch (e) {
      if (e instanceof HeaderError) {
        logIngress("dropping datagram from %s: %s", formatAddress(address), e.message);
        return;
      }
      throw e;
    }

    const { supportedVersions } = this.engineConfiguration;
    if (header.version !== null && !supportedVersions.includes(header.version)) {
      logIngress(
        "version 0x%s from %s not supported, sending negotiation",
        header.version.toString(16),
        formatAddress(address),
      );
      await this.send({
        kind: "rawData",
        data: encodeVersionNegotiation({
          sourceCid: header.destinationCid,
          destinationCid: header.sourceCid,
          supportedVersions,
        }),
        address,
      });
      return;
    }

    let connection = this.registry.lookup(header.destinationCid);
    if (connection === undefined && header.packetType === PacketType.INITIAL) {
      connection = this.driver.createConnection(this.engineConfiguration);
      this.registry.insert(header.destinationCid, connection);
      this.registry.insert(connection.hostCid, connection);
      logIngress(
        "new connection %s from %s (client chose %s)",
        hex(connection.hostCid),
        formatAddress(address),
        hex(header.destinationCid),
      );
    }

    if (connection === undefined) {
      logIngress(
        "no connection for %s from %s, dropping",
        hex(header.destinationCid),
        formatAddress(address),
      );
      return;
    }

    const target = connection;
    await this.batches.run(target, async () => {
      target.receiveDatagram(data, address, this.scheduler.now());
      await this.handleEvents(target, address);
    });
  }

  /**
   * Drain the engine's events for `connection`, then flush and reschedule.
   *
   * Must run inside the connection's serial queue.
   */
  private async handleEvents(connection: QuicEngine, client: Address | null): Promise<void> {
    let terminated = false;

    for (let event = connection.nextEvent(); event !== null; event = connection.nextEvent()) {
      await this.react(connection, event, client);
      if (event.kind === "connectionTerminated") terminated = true;

      const session = this.sessions.get(connection);
      if (session !== undefined) {
        await session.handle(event);
      }
    }

    await this.sendAll(connection);

    if (terminated && this.config.evictOnTerminate) {
      this.evict(connection);
      return;
    }

    const deadline = connection.getTimer();
    const fire = (generation: number) => this.onTimer(connection, generation);
    if (this.timers.schedule(connection, deadline, fire)) {
      logTimer("%s: wake-up at %d", hex(connection.hostCid), deadline);
    }
  }

  private async react(
    connection: QuicEngine,
    event: QuicEvent,
    client: Address | null,
  ): Promise<void> {
    switch (event.kind) {
      case "connectionTerminated":
        logDispatch(
          "%s: terminated (error %d) %s",
          hex(connection.hostCid),
          event.errorCode,
          event.reasonPhrase,
        );
        return;

      case "protocolNegotiated": {
        if (this.sessions.has(connection)) {
          throw DispatchError.duplicateSession(connection.hostCid);
        }
        const session = await this.sessionFactory({
          config: this.config,
          client,
          server: this.server,
          connection,
          sendAll: () => this.sendAll(connection),
        });
        this.sessions.set(connection, session);
        logDispatch("%s: negotiated %s", hex(connection.hostCid), event.alpnProtocol);
        return;
      }

      case "connectionIdIssued":
        this.registry.insert(event.connectionId, connection);
        logDispatch("%s: issued %s", hex(connection.hostCid), hex(event.connectionId));
        return;

      case "connectionIdRetired":
        this.registry.remove(event.connectionId);
        logDispatch("%s: retired %s", hex(connection.hostCid), hex(event.connectionId));
        return;

      case "handshakeCompleted":
      case "pingAcknowledged":
      case "streamDataReceived":
      case "streamReset":
      case "datagramFrameReceived":
        return;

      default: {
        const unhandled: never = event;
        throw new Error(`unhandled engine event ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private onTimer(connection: QuicEngine, generation: number): void {
    this.batches
      .run(connection, () => this.handleTimer(connection, generation))
      .catch(this.onError);
  }

  private async handleTimer(connection: QuicEngine, generation: number): Promise<void> {
    // A batch queued ahead of this one may have rescheduled.
    if (!this.timers.isCurrent(connection, generation)) {
      logTimer("%s: wake-up superseded while queued", hex(connection.hostCid));
      return;
    }
    if (connection.closeAt === null) {
      logTimer("%s: no longer timed, ignoring wake-up", hex(connection.hostCid));
      return;
    }
    connection.handleTimer(this.scheduler.now());
    await this.handleEvents(connection, null);
  }

  private evict(connection: QuicEngine): void {
    const removed = this.registry.evict(connection);
    this.sessions.delete(connection);
    this.timers.invalidate(connection);
    logDispatch("%s: evicted %d connection IDs", hex(connection.hostCid), removed);
  }
}
