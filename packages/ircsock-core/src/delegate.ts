import type { ConnectionError } from "./errors.ts";

/**
 * Receives a connection's lifecycle events, on the connection queue.
 *
 * Per connection attempt exactly one of `disconnected` and
 * `disconnectedWith` is called.
 */
export interface ConnectionSocketDelegate {
  willConnect?(address: string, port: number): void;
  /** `host` is absent when the transport cannot report the remote endpoint. */
  didConnect?(host: string | undefined): void;
  securedWith?(protocolVersion: string, cipherSuite: string): void;
  /** One call per framed line, delimiter removed, in wire order. */
  received(line: Uint8Array): void;
  willSend?(data: Uint8Array): void;
  didSend?(): void;
  disconnected?(): void;
  disconnectedWith?(error: ConnectionError): void;
}
