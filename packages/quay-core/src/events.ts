// Events produced by the Protocol Engine for one connection.
//
// The first four kinds drive the dispatcher's bookkeeping; the rest are
// only forwarded to the connection's session.

export interface ConnectionTerminated {
  kind: "connectionTerminated";
  errorCode: number;
  frameType: number | null;
  reasonPhrase: string;
}

export interface ProtocolNegotiated {
  kind: "protocolNegotiated";
  alpnProtocol: string | null;
}

export interface ConnectionIdIssued {
  kind: "connectionIdIssued";
  connectionId: Uint8Array;
}

export interface ConnectionIdRetired {
  kind: "connectionIdRetired";
  connectionId: Uint8Array;
}

export interface HandshakeCompleted {
  kind: "handshakeCompleted";
  alpnProtocol: string | null;
  earlyDataAccepted: boolean;
  sessionResumed: boolean;
}

export interface PingAcknowledged {
  kind: "pingAcknowledged";
  uid: number;
}

export interface StreamDataReceived {
  kind: "streamDataReceived";
  streamId: number;
  data: Uint8Array;
  endStream: boolean;
}

export interface StreamReset {
  kind: "streamReset";
  streamId: number;
  errorCode: number;
}

export interface DatagramFrameReceived {
  kind: "datagramFrameReceived";
  data: Uint8Array;
}

/** Lifecycle events the dispatcher reacts to. */
export type LifecycleEvent =
  | ConnectionTerminated
  | ProtocolNegotiated
  | ConnectionIdIssued
  | ConnectionIdRetired;

export type QuicEvent =
  | LifecycleEvent
  | HandshakeCompleted
  | PingAcknowledged
  | StreamDataReceived
  | StreamReset
  | DatagramFrameReceived;
