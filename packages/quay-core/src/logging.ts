// Logging for the dispatcher.
//
// Built on the `debug` package: nothing is printed unless the namespace is
// enabled, e.g. `DEBUG=quay:*` or `DEBUG=quay:ingress,quay:timer`.

import debug from "debug";
import type { Address } from "./types.ts";

export const logIngress = debug("quay:ingress");
export const logDispatch = debug("quay:dispatch");
export const logTimer = debug("quay:timer");
export const logEgress = debug("quay:egress");
export const logError = debug("quay:error");

/** Enable namespaces programmatically, with the same syntax as `DEBUG`. */
export function enableLogging(namespaces: string = "quay:*"): void {
  debug.enable(namespaces);
}

/** Lowercase hex, the form connection IDs are logged and keyed in. */
export function hex(bytes: Uint8Array): string {
  let out = "";
  for (const byte of bytes) {
    out += byte.toString(16).padStart(2, "0");
  }
  return out;
}

export function formatAddress(address: Address | null): string {
  if (address === null) return "-";
  return address.host.includes(":")
    ? `[${address.host}]:${address.port}`
    : `${address.host}:${address.port}`;
}
