// @quay/core - connection demultiplexing and dispatch for QUIC servers
//
// Transport-agnostic: a transport feeds TransportEvents into QuicDispatcher
// and sends the RawData it gets back. See @quay/udp for the Node transport.

export { QuicDispatcher, type DispatcherOptions } from "./dispatcher.ts";
export { ConnectionRegistry } from "./registry.ts";
export { TimerScheduler } from "./timer.ts";
export { SerialQueue } from "./serial.ts";

export type {
  Address,
  RawData,
  Closed,
  TransportEvent,
  OutboundDatagram,
  SendFn,
} from "./types.ts";
export type {
  QuicEvent,
  LifecycleEvent,
  ConnectionTerminated,
  ProtocolNegotiated,
  ConnectionIdIssued,
  ConnectionIdRetired,
  HandshakeCompleted,
  PingAcknowledged,
  StreamDataReceived,
  StreamReset,
  DatagramFrameReceived,
} from "./events.ts";
export type {
  Credentials,
  CredentialStore,
  EngineConfiguration,
  QuicEngine,
  QuicEngineDriver,
} from "./engine.ts";
export type { Session, SessionOptions, SessionFactory } from "./session.ts";
export type { Scheduler } from "./scheduler.ts";

export {
  DispatchError,
  type DispatchErrorKind,
  StartupError,
  type StartupErrorKind,
} from "./errors.ts";
export {
  DEFAULT_ALPN_PROTOCOL,
  type ServerConfig,
  defaultServerConfig,
  resolveServerConfig,
  configFromEnv,
} from "./config.ts";
export {
  logIngress,
  logDispatch,
  logTimer,
  logEgress,
  logError,
  enableLogging,
  hex,
  formatAddress,
} from "./logging.ts";
