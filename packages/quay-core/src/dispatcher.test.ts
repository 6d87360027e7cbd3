// Tests for the connection demultiplexer and dispatch loop

import { describe, it, expect } from "vitest";
import {
  PacketType,
  QuicVersion,
  encodeLongHeader,
  encodeShortHeader,
  pullQuicHeader,
} from "@quay/wire";
import { resolveServerConfig, type ServerConfig } from "./config.ts";
import { QuicDispatcher } from "./dispatcher.ts";
import { DispatchError } from "./errors.ts";
import type { QuicEvent } from "./events.ts";
import type { SessionFactory } from "./session.ts";
import {
  FakeDriver,
  FakeEngine,
  ManualScheduler,
  RecordingSession,
  settle,
  testCredentials,
} from "./test_support.ts";
import type { Address, RawData, SendFn } from "./types.ts";

const credentials = testCredentials();
const client: Address = { host: "192.0.2.10", port: 50000 };
const server: Address = { host: "0.0.0.0", port: 4433 };
const CLIENT_CID = Uint8Array.from([0xc1, 0xc2, 0xc3, 0xc4]);
const I1 = Uint8Array.from([0xa1, 0xa1, 0xa1, 0xa1, 0xa1, 0xa1, 0xa1, 0xa1]);
const I2 = Uint8Array.from([0xa2, 0xa2, 0xa2, 0xa2, 0xa2, 0xa2, 0xa2, 0xa2]);

interface SetupOptions {
  config?: Partial<ServerConfig>;
  sessionFactory?: SessionFactory;
  send?: SendFn;
  supportedVersions?: readonly number[];
}

function setup(options: SetupOptions = {}) {
  const driver = new FakeDriver(options.supportedVersions);
  const scheduler = new ManualScheduler();
  const sent: RawData[] = [];
  const sessions: RecordingSession[] = [];
  const errors: unknown[] = [];
  const dispatcher = new QuicDispatcher({
    config: resolveServerConfig({ certfile: "cert.pem", keyfile: "key.pem", ...options.config }),
    server,
    driver,
    credentials,
    sessionFactory:
      options.sessionFactory ??
      ((sessionOptions) => {
        const session = new RecordingSession(sessionOptions);
        sessions.push(session);
        return session;
      }),
    send:
      options.send ??
      (async (event) => {
        sent.push(event);
      }),
    scheduler,
    onError: (error) => errors.push(error),
  });
  return { dispatcher, driver, scheduler, sent, sessions, errors };
}

/** Script what every new engine does when datagram number `n` arrives. */
function onEachReceive(driver: FakeDriver, script: (engine: FakeEngine, n: number) => void) {
  driver.setup = (engine) => {
    engine.onReceive = (e) => script(e, e.received.length);
  };
}

function initial(destinationCid: Uint8Array, version: number = QuicVersion.VERSION_1): RawData {
  return {
    kind: "rawData",
    data: encodeLongHeader({
      packetType: PacketType.INITIAL,
      version,
      destinationCid,
      sourceCid: CLIENT_CID,
      payload: new Uint8Array(32),
    }),
    address: client,
  };
}

function shortPacket(destinationCid: Uint8Array): RawData {
  return {
    kind: "rawData",
    data: encodeShortHeader(destinationCid, Uint8Array.from([1, 2, 3])),
    address: client,
  };
}

function outbound(byte: number) {
  return { data: Uint8Array.of(byte), address: client };
}

describe("QuicDispatcher ingress", () => {
  it("answers an unsupported version with one negotiation datagram", async () => {
    const { dispatcher, driver, sent } = setup();

    await dispatcher.handle(initial(I1, 0x1a2a_3a4a));

    expect(sent).toHaveLength(1);
    expect(sent[0].address).toEqual(client);
    const header = pullQuicHeader(sent[0].data);
    expect(header.version).toBe(QuicVersion.NEGOTIATION);
    expect(Array.from(header.destinationCid)).toEqual(Array.from(CLIENT_CID));
    expect(Array.from(header.sourceCid)).toEqual(Array.from(I1));
    expect(Array.from(sent[0].data.subarray(sent[0].data.length - 4))).toEqual([0, 0, 0, 1]);
    expect(dispatcher.getRegistry().size).toBe(0);
    expect(driver.created).toHaveLength(0);
  });

  it("drops a datagram too short to hold a header", async () => {
    const { dispatcher, driver, sent } = setup();

    await dispatcher.handle({ kind: "rawData", data: Uint8Array.from([0xc0, 0, 0]), address: client });

    expect(sent).toHaveLength(0);
    expect(dispatcher.getRegistry().size).toBe(0);
    expect(driver.created).toHaveLength(0);
  });

  it("drops non-Initial packets for unknown connection IDs", async () => {
    const { dispatcher, driver, sent } = setup();

    await dispatcher.handle(shortPacket(I1));
    await dispatcher.handle({
      kind: "rawData",
      data: encodeLongHeader({
        packetType: PacketType.HANDSHAKE,
        destinationCid: I1,
        sourceCid: CLIENT_CID,
      }),
      address: client,
    });

    expect(driver.created).toHaveLength(0);
    expect(sent).toHaveLength(0);
    expect(dispatcher.getRegistry().size).toBe(0);
  });

  it("creates a connection for an Initial and registers both IDs", async () => {
    const { dispatcher, driver, scheduler, sent } = setup();
    onEachReceive(driver, (engine) => engine.outbound.push(outbound(1), outbound(2)));
    const datagram = initial(I1);

    await dispatcher.handle(datagram);

    expect(driver.created).toHaveLength(1);
    const engine = driver.created[0];
    const registry = dispatcher.getRegistry();
    expect(registry.size).toBe(2);
    expect(registry.lookup(I1)).toBe(engine);
    expect(registry.lookup(engine.hostCid)).toBe(engine);
    expect(engine.received).toEqual([{ data: datagram.data, address: client, now: scheduler.time }]);
    expect(sent.map((s) => Array.from(s.data))).toEqual([[1], [2]]);
  });

  it("creates a connection for a version 2 Initial", async () => {
    const { dispatcher, driver, sent } = setup({
      supportedVersions: [QuicVersion.VERSION_1, QuicVersion.VERSION_2],
    });

    await dispatcher.handle(initial(I1, QuicVersion.VERSION_2));

    expect(sent).toHaveLength(0);
    expect(driver.created).toHaveLength(1);
    expect(dispatcher.getRegistry().lookup(I1)).toBe(driver.created[0]);
  });

  it("hands the engine a server-side configuration", async () => {
    const { dispatcher, driver } = setup({ config: { alpnProtocol: "hq-interop" } });

    await dispatcher.handle(initial(I1));

    expect(driver.created[0].configuration).toMatchObject({
      alpnProtocols: ["hq-interop"],
      isClient: false,
      originalConnectionId: null,
      supportedVersions: [QuicVersion.VERSION_1],
    });
    expect(driver.created[0].configuration.certificate.subject).toBe("CN=localhost");
  });

  it("routes later datagrams through either registered ID", async () => {
    const { dispatcher, driver } = setup();

    await dispatcher.handle(initial(I1));
    const engine = driver.created[0];
    await dispatcher.handle(shortPacket(engine.hostCid));
    await dispatcher.handle(initial(I1));

    expect(driver.created).toHaveLength(1);
    expect(engine.received).toHaveLength(3);
  });

  it("ignores transport closure", async () => {
    const { dispatcher, sent } = setup();
    await expect(dispatcher.handle({ kind: "closed" })).resolves.toBeUndefined();
    expect(sent).toHaveLength(0);
  });
});

describe("QuicDispatcher events", () => {
  it("creates the session before handling the events that follow negotiation", async () => {
    let sawI2AtCreation: boolean | undefined;
    const sessions: RecordingSession[] = [];
    const holder: { dispatcher?: QuicDispatcher } = {};
    const { dispatcher, driver } = setup({
      sessionFactory: (options) => {
        sawI2AtCreation = holder.dispatcher?.getRegistry().has(I2);
        const session = new RecordingSession(options);
        sessions.push(session);
        return session;
      },
    });
    holder.dispatcher = dispatcher;
    const events: QuicEvent[] = [
      { kind: "protocolNegotiated", alpnProtocol: "h3" },
      { kind: "connectionIdIssued", connectionId: I2 },
    ];
    onEachReceive(driver, (engine) => engine.events.push(...events));

    await dispatcher.handle(initial(I1));

    const engine = driver.created[0];
    expect(sawI2AtCreation).toBe(false);
    expect(dispatcher.getRegistry().lookup(I2)).toBe(engine);
    expect(sessions).toHaveLength(1);
    expect(sessions[0].events).toEqual(events);
    expect(dispatcher.getSession(engine)).toBe(sessions[0]);
  });

  it("passes the connection, addresses and a bound flush to the session", async () => {
    const { dispatcher, driver, sessions, sent } = setup();
    onEachReceive(driver, (engine) =>
      engine.events.push({ kind: "protocolNegotiated", alpnProtocol: "h3" }),
    );

    await dispatcher.handle(initial(I1));

    const engine = driver.created[0];
    const { options } = sessions[0];
    expect(options.client).toEqual(client);
    expect(options.server).toEqual(server);
    expect(options.connection).toBe(engine);
    expect(options.config.alpnProtocol).toBe("h3");

    engine.outbound.push(outbound(7));
    await options.sendAll();
    expect(sent.map((s) => Array.from(s.data))).toEqual([[7]]);
  });

  it("forwards nothing before negotiation and everything after, in order", async () => {
    const { dispatcher, driver, sessions } = setup();
    const handshake: QuicEvent = {
      kind: "handshakeCompleted",
      alpnProtocol: "h3",
      earlyDataAccepted: false,
      sessionResumed: false,
    };
    const negotiated: QuicEvent = { kind: "protocolNegotiated", alpnProtocol: "h3" };
    const first: QuicEvent = {
      kind: "streamDataReceived",
      streamId: 0,
      data: Uint8Array.of(1),
      endStream: false,
    };
    const second: QuicEvent = { kind: "streamReset", streamId: 0, errorCode: 3 };
    const third: QuicEvent = { kind: "pingAcknowledged", uid: 9 };
    onEachReceive(driver, (engine, n) => {
      if (n === 1) engine.events.push(handshake, negotiated, first);
      if (n === 2) engine.events.push(second, third);
    });

    await dispatcher.handle(initial(I1));
    await dispatcher.handle(shortPacket(driver.created[0].hostCid));

    expect(sessions[0].events).toEqual([negotiated, first, second, third]);
  });

  it("never builds a second session for a connection", async () => {
    const { dispatcher, driver, sessions } = setup();
    onEachReceive(driver, (engine) =>
      engine.events.push(
        { kind: "protocolNegotiated", alpnProtocol: "h3" },
        { kind: "protocolNegotiated", alpnProtocol: "h3" },
      ),
    );

    const result = dispatcher.handle(initial(I1));

    await expect(result).rejects.toBeInstanceOf(DispatchError);
    await expect(result).rejects.toMatchObject({ kind: "duplicate-session" });
    expect(sessions).toHaveLength(1);
    expect(dispatcher.getSession(driver.created[0])).toBe(sessions[0]);
  });

  it("adds and removes routes as IDs are issued and retired", async () => {
    const { dispatcher, driver } = setup();
    onEachReceive(driver, (engine, n) => {
      if (n === 1) engine.events.push({ kind: "connectionIdIssued", connectionId: I2 });
      if (n === 2) engine.events.push({ kind: "connectionIdRetired", connectionId: I1 });
    });

    await dispatcher.handle(initial(I1));
    const engine = driver.created[0];
    expect(dispatcher.getRegistry().idsOf(engine).map((id) => Array.from(id))).toEqual([
      Array.from(I1),
      Array.from(engine.hostCid),
      Array.from(I2),
    ]);

    await dispatcher.handle(shortPacket(I2));
    expect(dispatcher.getRegistry().has(I1)).toBe(false);
    expect(dispatcher.getRegistry().lookup(I2)).toBe(engine);
    expect(dispatcher.getRegistry().size).toBe(2);
  });

  it("escalates the retirement of an ID that was never issued", async () => {
    const { dispatcher, driver } = setup();
    onEachReceive(driver, (engine) =>
      engine.events.push({ kind: "connectionIdRetired", connectionId: I2 }),
    );

    await expect(dispatcher.handle(initial(I1))).rejects.toMatchObject({
      kind: "unknown-connection-id",
      message: "connection ID a2a2a2a2a2a2a2a2 is not registered",
    });
  });

  it("keeps routes and session after termination by default", async () => {
    const { dispatcher, driver, sessions } = setup();
    const terminated: QuicEvent = {
      kind: "connectionTerminated",
      errorCode: 0,
      frameType: null,
      reasonPhrase: "bye",
    };
    onEachReceive(driver, (engine) =>
      engine.events.push({ kind: "protocolNegotiated", alpnProtocol: "h3" }, terminated),
    );

    await dispatcher.handle(initial(I1));

    const engine = driver.created[0];
    expect(sessions[0].events[1]).toEqual(terminated);
    expect(dispatcher.getRegistry().size).toBe(2);
    expect(dispatcher.getSession(engine)).toBe(sessions[0]);
  });

  it("evicts a terminated connection when configured to", async () => {
    const { dispatcher, driver, sessions, scheduler, sent } = setup({
      config: { evictOnTerminate: true },
    });
    const terminated: QuicEvent = {
      kind: "connectionTerminated",
      errorCode: 0x0a,
      frameType: null,
      reasonPhrase: "idle",
    };
    onEachReceive(driver, (engine) => {
      engine.events.push(
        { kind: "protocolNegotiated", alpnProtocol: "h3" },
        { kind: "connectionIdIssued", connectionId: I2 },
        terminated,
      );
      engine.outbound.push(outbound(9));
      engine.timer = 5_000;
    });

    await dispatcher.handle(initial(I1));

    const engine = driver.created[0];
    expect(sessions[0].events[2]).toEqual(terminated);
    expect(sent.map((s) => Array.from(s.data))).toEqual([[9]]);
    expect(dispatcher.getRegistry().size).toBe(0);
    expect(dispatcher.getSession(engine)).toBeUndefined();
    expect(scheduler.pending).toHaveLength(0);

    await dispatcher.handle(shortPacket(engine.hostCid));
    expect(engine.received).toHaveLength(1);
  });
});

describe("QuicDispatcher timers", () => {
  it("schedules one wake-up at the engine's deadline and runs a batch when it fires", async () => {
    const { dispatcher, driver, scheduler, sent } = setup();
    driver.setup = (engine) => {
      engine.timer = 5_000;
      engine.onTimer = (e) => {
        e.timer = null;
        e.outbound.push(outbound(4));
      };
    };

    await dispatcher.handle(initial(I1));
    expect(scheduler.pending.map((p) => p.when)).toEqual([5_000]);

    expect(scheduler.advanceTo(5_000)).toBe(1);
    await settle();

    const engine = driver.created[0];
    expect(engine.timerCalls).toEqual([5_000]);
    expect(sent.map((s) => Array.from(s.data))).toEqual([[4]]);
    expect(scheduler.pending).toHaveLength(0);
  });

  it("schedules nothing when the engine has no deadline", async () => {
    const { dispatcher, scheduler } = setup();
    await dispatcher.handle(initial(I1));
    expect(scheduler.pending).toHaveLength(0);
  });

  it("ignores a wake-up once the connection is no longer timed", async () => {
    const { dispatcher, driver, scheduler } = setup();
    driver.setup = (engine) => {
      engine.timer = 5_000;
    };

    await dispatcher.handle(initial(I1));
    const engine = driver.created[0];
    engine.closeAt = null;
    scheduler.advanceTo(5_000);
    await settle();

    expect(engine.timerCalls).toEqual([]);
    expect(scheduler.pending).toHaveLength(0);
  });

  it("only acts on the most recently scheduled wake-up", async () => {
    const { dispatcher, driver, scheduler } = setup();
    driver.setup = (engine) => {
      engine.onReceive = (e) => {
        e.timer = e.received.length === 1 ? 5_000 : 6_000;
      };
      engine.onTimer = (e) => {
        e.timer = null;
      };
    };

    await dispatcher.handle(initial(I1));
    await dispatcher.handle(shortPacket(driver.created[0].hostCid));
    expect(scheduler.pending.map((p) => p.when)).toEqual([5_000, 6_000]);

    expect(scheduler.advanceTo(6_000)).toBe(2);
    await settle();

    expect(driver.created[0].timerCalls).toEqual([6_000]);
  });

  it("drops a wake-up superseded while it waited behind another batch", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { dispatcher, driver, scheduler } = setup({
      send: async (event) => {
        if (event.data[0] === 9) await gate;
      },
    });
    onEachReceive(driver, (engine, n) => {
      if (n === 1) {
        engine.timer = 5_000;
      } else {
        engine.timer = 6_000;
        engine.outbound.push(outbound(9));
      }
    });

    await dispatcher.handle(initial(I1));
    const engine = driver.created[0];
    const second = dispatcher.handle(shortPacket(engine.hostCid));
    await settle();

    expect(scheduler.advanceTo(5_000)).toBe(1);
    release();
    await second;
    await settle();

    expect(engine.timerCalls).toEqual([]);
    expect(scheduler.pending.map((p) => p.when)).toEqual([6_000]);
  });

  it("reschedules after a timer-driven batch", async () => {
    const { dispatcher, driver, scheduler } = setup();
    driver.setup = (engine) => {
      engine.timer = 5_000;
      engine.onTimer = (e) => {
        e.timer = 8_000;
      };
    };

    await dispatcher.handle(initial(I1));
    scheduler.advanceTo(5_000);
    await settle();

    expect(scheduler.pending.map((p) => p.when)).toEqual([8_000]);
  });

  it("builds a session with no client address when a timer negotiates", async () => {
    const { dispatcher, driver, scheduler, sessions } = setup();
    driver.setup = (engine) => {
      engine.timer = 5_000;
      engine.onTimer = (e) => {
        e.timer = null;
        e.events.push({ kind: "protocolNegotiated", alpnProtocol: "h3" });
      };
    };

    await dispatcher.handle(initial(I1));
    scheduler.advanceTo(5_000);
    await settle();

    expect(sessions).toHaveLength(1);
    expect(sessions[0].options.client).toBeNull();
  });

  it("reports failures of timer-driven batches", async () => {
    const { dispatcher, driver, scheduler, errors } = setup();
    driver.setup = (engine) => {
      engine.timer = 5_000;
      engine.onTimer = (e) => {
        e.timer = null;
        e.events.push({ kind: "connectionIdRetired", connectionId: I2 });
      };
    };

    await dispatcher.handle(initial(I1));
    scheduler.advanceTo(5_000);
    await settle();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(DispatchError);
  });
});

describe("QuicDispatcher batching", () => {
  it("does not start a connection's next batch until the current one finishes", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const sent: RawData[] = [];
    const { dispatcher, driver } = setup({
      send: async (event) => {
        sent.push(event);
        if (sent.length === 1) await gate;
      },
    });
    onEachReceive(driver, (engine, n) => {
      if (n === 1) engine.outbound.push(outbound(1));
    });

    const first = dispatcher.handle(initial(I1));
    await settle();
    expect(sent).toHaveLength(1);

    const engine = driver.created[0];
    const second = dispatcher.handle(shortPacket(engine.hostCid));
    await settle();
    expect(engine.received).toHaveLength(1);

    release();
    await Promise.all([first, second]);
    expect(engine.received).toHaveLength(2);
  });

  it("lets other connections proceed while one is blocked", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { dispatcher, driver } = setup({
      send: async (event) => {
        if (event.data[0] === 1) await gate;
      },
    });
    onEachReceive(driver, (engine) => {
      if (driver.created.indexOf(engine) === 0) engine.outbound.push(outbound(1));
    });

    const first = dispatcher.handle(initial(I1));
    await settle();
    await dispatcher.handle(initial(I2));

    expect(driver.created).toHaveLength(2);
    expect(driver.created[1].received).toHaveLength(1);

    release();
    await first;
  });
});
