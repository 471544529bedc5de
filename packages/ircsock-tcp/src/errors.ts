// Mapping from Node socket errors to transport errors.

import { getSystemErrorMap } from "node:util";
import { TransportError } from "@ircsock/core";

// OpenSSL errors surfaced by node:tls, and X.509 verification codes.
const TLS_CODE =
  /^ERR_(SSL|TLS)_|CERT|^UNABLE_TO_|^INVALID_(CA|PURPOSE)$|^PATH_LENGTH_EXCEEDED$|^HOSTNAME_MISMATCH$/;

let errnoByName: Map<string, number> | null = null;

/** Positive errno value for a system error name such as "ECONNRESET". */
export function errnoFor(name: string): number | undefined {
  if (errnoByName === null) {
    errnoByName = new Map();
    for (const [code, [errorName]] of getSystemErrorMap()) {
      errnoByName.set(errorName, Math.abs(code));
    }
  }
  return errnoByName.get(name);
}

/**
 * Classify an error raised by a node:net or node:tls socket.
 *
 * - `ENOTFOUND` and `EAI_*` are resolver failures (`dns`)
 * - OpenSSL and certificate codes are `tls`, keeping the code string
 * - other system error names are `posix`, with the positive errno
 * - anything else is `other`
 */
export function toTransportError(err: unknown): TransportError {
  if (err instanceof TransportError) return err;
  if (!(err instanceof Error)) return TransportError.other(String(err));

  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
  if (code === undefined) return TransportError.other(err.message);

  if (code === "ENOTFOUND" || code.startsWith("EAI_")) {
    return TransportError.dns(code, err.message);
  }
  if (TLS_CODE.test(code)) {
    return TransportError.tls(code, err.message);
  }

  const errno = errnoFor(code);
  if (errno !== undefined) return TransportError.posix(errno, err.message);

  return TransportError.other(err.message, code);
}
