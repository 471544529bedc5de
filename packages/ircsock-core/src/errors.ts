// Connection error taxonomy and the translator from transport errors.
//
// The delegate only ever sees ConnectionError; TransportError is what a
// Transport Provider reports and stays inside the core.

import { constants } from "node:os";
import { getSystemErrorMap } from "node:util";
import tlsErrorTable from "./tls_errors.json";

export type ConnectionErrorKind = "posix" | "tls" | "generic";

/**
 * Error reported to the delegate when a connection ends abnormally.
 *
 * - `posix`: operating-system level failure, carries the errno `code`
 * - `tls`: handshake or negotiation failure
 * - `generic`: anything else
 */
export class ConnectionError extends Error {
  constructor(
    public readonly kind: ConnectionErrorKind,
    message: string,
    public readonly code?: number,
  ) {
    super(message);
    this.name = "ConnectionError";
  }

  static posix(code: number, message: string): ConnectionError {
    return new ConnectionError("posix", message, code);
  }

  static tls(reason: string): ConnectionError {
    return new ConnectionError("tls", reason);
  }

  static generic(description: string): ConnectionError {
    return new ConnectionError("generic", description);
  }

  /** Human-readable reason; same as `message`. */
  get reason(): string {
    return this.message;
  }
}

export type TransportErrorDomain = "posix" | "tls" | "dns" | "other";

/** Raw error shape reported by a Transport Provider. */
export class TransportError extends Error {
  constructor(
    public readonly domain: TransportErrorDomain,
    public readonly code: number | string,
    description: string,
  ) {
    super(description);
    this.name = "TransportError";
  }

  static posix(code: number, description: string = `POSIX error ${code}`): TransportError {
    return new TransportError("posix", code, description);
  }

  static tls(code: number | string, description: string = `TLS error ${code}`): TransportError {
    return new TransportError("tls", code, description);
  }

  static dns(code: string, description: string): TransportError {
    return new TransportError("dns", code, description);
  }

  static other(description: string, code: number | string = "unknown"): TransportError {
    return new TransportError("other", code, description);
  }
}

/** Lookup tables used by {@link translateError}. */
export interface ErrorDescriptions {
  /** Description of a positive errno value. */
  describePosix(code: number): string | undefined;
  /** Description of a TLS verification code or numeric alert. */
  describeTls(code: number | string): string | undefined;
}

const tlsCodes: Record<string, string | undefined> = tlsErrorTable.codes;
const tlsAlerts: Record<string, string | undefined> = tlsErrorTable.alerts;

let systemErrors: Map<number, [string, string]> | null = null;
let errnoNames: Map<number, string> | null = null;

function errnoName(code: number): string | undefined {
  if (errnoNames === null) {
    errnoNames = new Map();
    for (const [name, value] of Object.entries(constants.errno)) {
      if (typeof value === "number" && !errnoNames.has(value)) errnoNames.set(value, name);
    }
  }
  return errnoNames.get(code);
}

/**
 * Descriptions from libuv's error map and the bundled TLS table.
 *
 * libuv only knows the errno values it uses itself; other values fall back
 * to the platform's errno name.
 */
export const systemErrorDescriptions: ErrorDescriptions = {
  describePosix(code: number): string | undefined {
    systemErrors ??= getSystemErrorMap();
    // libuv keys errno values as negatives
    return systemErrors.get(-Math.abs(code))?.[1] ?? errnoName(Math.abs(code));
  },

  describeTls(code: number | string): string | undefined {
    if (typeof code === "number") return tlsAlerts[String(code)];
    return tlsCodes[code];
  },
};

/**
 * Map a transport error into the uniform taxonomy.
 *
 * A numeric posix code is always a posix error, described as
 * `Unknown error <code>` when no description is found. A tls code without a
 * description, and every other domain, becomes a generic error carrying the
 * transport's own description. Never throws.
 */
export function translateError(
  error: TransportError,
  descriptions: ErrorDescriptions = systemErrorDescriptions,
): ConnectionError {
  switch (error.domain) {
    case "posix": {
      if (typeof error.code === "number") {
        const message = descriptions.describePosix(error.code) ?? `Unknown error ${error.code}`;
        return ConnectionError.posix(error.code, message);
      }
      break;
    }
    case "tls": {
      const reason = descriptions.describeTls(error.code);
      if (reason !== undefined) return ConnectionError.tls(reason);
      break;
    }
    default:
      break;
  }
  return ConnectionError.generic(describe(error));
}

function describe(error: TransportError): string {
  if (error.message.length > 0) return error.message;
  return `${error.domain} error ${error.code}`;
}
