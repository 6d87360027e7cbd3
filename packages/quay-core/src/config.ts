// Server configuration.

import { DEFAULT_HOST_CID_LENGTH, MAX_CID_LENGTH } from "@quay/wire";
import { StartupError } from "./errors.ts";

/** ALPN identifier offered to every client. */
export const DEFAULT_ALPN_PROTOCOL = "h3";

export interface ServerConfig {
  /** Interface to bind. */
  host: string;
  port: number;
  /** PEM certificate path. */
  certfile: string;
  /** PEM private key path (no passphrase). */
  keyfile: string;
  alpnProtocol: string;
  /** Length of the connection IDs the engine issues; used to parse short headers. */
  hostCidLength: number;
  /** Drop a connection's routing entries, session and timer once it terminates. */
  evictOnTerminate: boolean;
}

/** Default server configuration. */
export function defaultServerConfig(): ServerConfig {
  return {
    host: "0.0.0.0",
    port: 4433,
    certfile: "",
    keyfile: "",
    alpnProtocol: DEFAULT_ALPN_PROTOCOL,
    hostCidLength: DEFAULT_HOST_CID_LENGTH,
    evictOnTerminate: false,
  };
}

/**
 * Merge `overrides` over the defaults and validate the result.
 *
 * @throws StartupError of kind `config`
 */
export function resolveServerConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  const config = { ...defaultServerConfig(), ...overrides };

  if (!config.certfile) throw StartupError.config("certfile is required");
  if (!config.keyfile) throw StartupError.config("keyfile is required");
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 0xffff) {
    throw StartupError.config(`invalid port: ${config.port}`);
  }
  if (
    !Number.isInteger(config.hostCidLength) ||
    config.hostCidLength < 1 ||
    config.hostCidLength > MAX_CID_LENGTH
  ) {
    throw StartupError.config(
      `hostCidLength must be between 1 and ${MAX_CID_LENGTH}: ${config.hostCidLength}`,
    );
  }
  const alpnLength = Buffer.byteLength(config.alpnProtocol);
  if (alpnLength === 0 || alpnLength > 0xff) {
    throw StartupError.config(`invalid ALPN protocol: "${config.alpnProtocol}"`);
  }

  return config;
}

function envInteger(env: Record<string, string | undefined>, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw StartupError.config(`${name} is not an integer: "${raw}"`);
  }
  return value;
}

/**
 * Read overrides from `QUAY_*` environment variables.
 *
 * Unset variables are left out so that the defaults apply.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): Partial<ServerConfig> {
  const overrides: Partial<ServerConfig> = {};

  if (env.QUAY_HOST) overrides.host = env.QUAY_HOST;
  if (env.QUAY_CERTFILE) overrides.certfile = env.QUAY_CERTFILE;
  if (env.QUAY_KEYFILE) overrides.keyfile = env.QUAY_KEYFILE;
  if (env.QUAY_ALPN) overrides.alpnProtocol = env.QUAY_ALPN;

  const port = envInteger(env, "QUAY_PORT");
  if (port !== undefined) overrides.port = port;
  const hostCidLength = envInteger(env, "QUAY_HOST_CID_LENGTH");
  if (hostCidLength !== undefined) overrides.hostCidLength = hostCidLength;

  const evict = env.QUAY_EVICT_ON_TERMINATE;
  if (evict !== undefined && evict !== "") {
    overrides.evictOnTerminate = evict === "1" || evict.toLowerCase() === "true";
  }

  return overrides;
}
