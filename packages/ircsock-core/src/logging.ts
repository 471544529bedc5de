// Logging for connection sockets.
//
// Built on the `debug` package: nothing is printed unless the DEBUG
// environment variable matches the namespace, e.g. DEBUG=ircsock:*.

import createDebug from "debug";
import type { ConnectionSocketDelegate } from "./delegate.ts";
import type { ConnectionError } from "./errors.ts";

/** printf-style log function; a `debug` instance satisfies it. */
export type LogFn = (formatter: string, ...args: unknown[]) => void;

/** State machine internals: status changes, dropped writes, trust verdicts. */
export const socketLog: LogFn = createDebug("ircsock:socket");

export interface LoggingOptions {
  /**
   * Namespace for the `debug` logger. Defaults to "ircsock:delegate".
   * Ignored when `log` is given.
   */
  namespace?: string;

  /**
   * Log the text of received lines. Defaults to true.
   */
  logLines?: boolean;

  /**
   * Log the text of outbound data. Defaults to false (PASS and
   * AUTHENTICATE lines carry credentials).
   */
  logPayloads?: boolean;

  /** Log sink. Defaults to a `debug` instance for `namespace`. */
  log?: LogFn;
}

const decoder = new TextDecoder("utf-8");

/**
 * Wrap a delegate so every lifecycle event is logged as a structured object
 * before being forwarded.
 *
 * Log lines look like:
 * - `→ connect irc.example.net:6697` { type: "connect", address, port }
 * - `← connect: ✓ 41.20ms` { type: "connected", host, duration }
 * - `← disconnect: ✗ tls` { type: "disconnected", error: { kind, message } }
 *
 * @example
 * ```typescript
 * const socket = new ConnectionSocket(config, provider, loggingDelegate(session));
 * ```
 */
export function loggingDelegate(
  inner: ConnectionSocketDelegate,
  options: LoggingOptions = {},
): ConnectionSocketDelegate {
  const log = options.log ?? createDebug(options.namespace ?? "ircsock:delegate");
  const logLines = options.logLines ?? true;
  const logPayloads = options.logPayloads ?? false;

  let connectStartedAt: number | undefined;

  return {
    willConnect(address: string, port: number): void {
      connectStartedAt = performance.now();
      log(`→ connect ${address}:${port}`, { type: "connect", address, port });
      inner.willConnect?.(address, port);
    },

    didConnect(host: string | undefined): void {
      const logObj: Record<string, unknown> = { type: "connected", host };
      if (connectStartedAt !== undefined) {
        const duration = performance.now() - connectStartedAt;
        logObj.duration = `${duration.toFixed(2)}ms`;
        log(`← connect: ✓ ${duration.toFixed(2)}ms`, logObj);
      } else {
        log("← connect: ✓", logObj);
      }
      inner.didConnect?.(host);
    },

    securedWith(protocolVersion: string, cipherSuite: string): void {
      log(`secured with ${protocolVersion}`, {
        type: "secured",
        protocolVersion,
        cipherSuite,
      });
      inner.securedWith?.(protocolVersion, cipherSuite);
    },

    received(line: Uint8Array): void {
      if (logLines) {
        log("← line", { type: "line", line: decoder.decode(line) });
      }
      inner.received(line);
    },

    willSend(data: Uint8Array): void {
      const logObj: Record<string, unknown> = { type: "send", length: data.length };
      if (logPayloads) {
        logObj.data = decoder.decode(data);
      }
      log(`→ send ${data.length} bytes`, logObj);
      inner.willSend?.(data);
    },

    didSend(): void {
      log("← send: ✓", { type: "sent" });
      inner.didSend?.();
    },

    disconnected(): void {
      connectStartedAt = undefined;
      log("← disconnect", { type: "disconnected" });
      inner.disconnected?.();
    },

    disconnectedWith(error: ConnectionError): void {
      connectStartedAt = undefined;
      const logObj: Record<string, unknown> = {
        type: "disconnected",
        error: { kind: error.kind, message: error.message },
      };
      if (error.code !== undefined) {
        logObj.code = error.code;
      }
      log(`← disconnect: ✗ ${error.kind}`, logObj);
      inner.disconnectedWith?.(error);
    },
  };
}
