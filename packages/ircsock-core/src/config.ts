// Per-connection settings.

import type { ClientIdentity } from "./transport.ts";

export type ProxyType = "none" | "system";

/** Settings as supplied by the caller; omitted fields take defaults. */
export interface ConnectionConfigInput {
  serverAddress: string;
  serverPort: number;
  /** Default: false */
  prefersSecuredConnection?: boolean;
  /** Default: "none" */
  proxyType?: ProxyType;
  /** OpenSSL cipher suite names, or "default". Default: "default" */
  cipherSuites?: "default" | readonly string[];
  /** Default: false */
  prefersModernCiphersOnly?: boolean;
  clientIdentity?: ClientIdentity;
  /** Upper bound for a single receive. Default: 65536 */
  maximumReadLength?: number;
  /** Identifies the connection in logs. */
  label?: string;
}

/** Resolved, frozen settings. Never mutated after construction. */
export interface ConnectionConfig {
  readonly serverAddress: string;
  readonly serverPort: number;
  readonly prefersSecuredConnection: boolean;
  readonly proxyType: ProxyType;
  readonly cipherSuites: "default" | readonly string[];
  readonly prefersModernCiphersOnly: boolean;
  readonly clientIdentity?: ClientIdentity;
  readonly maximumReadLength: number;
  readonly label?: string;
}

/** Thrown when connection settings are invalid. */
export class ConfigError extends Error {
  constructor(
    public readonly field: keyof ConnectionConfigInput,
    message: string,
  ) {
    super(`${field}: ${message}`);
    this.name = "ConfigError";
  }
}

export const DEFAULT_MAXIMUM_READ_LENGTH = 65536;

/**
 * Apply defaults, validate and freeze.
 *
 * @throws ConfigError if the address is empty, the port is not an integer in
 *   1–65535, the cipher list is empty or the read length is not positive.
 */
export function resolveConnectionConfig(input: ConnectionConfigInput): ConnectionConfig {
  const serverAddress = input.serverAddress.trim();
  if (serverAddress.length === 0) {
    throw new ConfigError("serverAddress", "must not be empty");
  }

  if (!Number.isInteger(input.serverPort) || input.serverPort < 1 || input.serverPort > 65535) {
    throw new ConfigError("serverPort", `must be an integer between 1 and 65535, got ${input.serverPort}`);
  }

  const cipherSuites = input.cipherSuites ?? "default";
  if (cipherSuites !== "default" && cipherSuites.length === 0) {
    throw new ConfigError("cipherSuites", "must list at least one suite, or be \"default\"");
  }

  const maximumReadLength = input.maximumReadLength ?? DEFAULT_MAXIMUM_READ_LENGTH;
  if (!Number.isInteger(maximumReadLength) || maximumReadLength < 1) {
    throw new ConfigError("maximumReadLength", `must be a positive integer, got ${maximumReadLength}`);
  }

  return Object.freeze({
    serverAddress,
    serverPort: input.serverPort,
    prefersSecuredConnection: input.prefersSecuredConnection ?? false,
    proxyType: input.proxyType ?? "none",
    cipherSuites: cipherSuites === "default" ? cipherSuites : Object.freeze([...cipherSuites]),
    prefersModernCiphersOnly: input.prefersModernCiphersOnly ?? false,
    clientIdentity: input.clientIdentity,
    maximumReadLength,
    label: input.label,
  });
}
