// Errors raised by the dispatcher and at startup.
//
// Malformed datagrams never surface here; they are dropped at ingress.

import { hex } from "./logging.ts";

export type DispatchErrorKind = "unknown-connection-id" | "duplicate-session";

/**
 * The engine's event stream and the dispatcher's bookkeeping disagree.
 *
 * These indicate a bug and are never absorbed.
 */
export class DispatchError extends Error {
  constructor(
    public kind: DispatchErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "DispatchError";
  }

  static unknownConnectionId(connectionId: Uint8Array): DispatchError {
    return new DispatchError(
      "unknown-connection-id",
      `connection ID ${hex(connectionId)} is not registered`,
    );
  }

  static duplicateSession(hostCid: Uint8Array): DispatchError {
    return new DispatchError(
      "duplicate-session",
      `connection ${hex(hostCid)} already has a session`,
    );
  }
}

export type StartupErrorKind = "config" | "credentials";

/** The server cannot start accepting datagrams. */
export class StartupError extends Error {
  constructor(
    public kind: StartupErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StartupError";
  }

  static config(message: string): StartupError {
    return new StartupError("config", message);
  }

  static credentials(path: string, cause: unknown): StartupError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new StartupError("credentials", `cannot load ${path}: ${reason}`, { cause });
  }
}
