/**
 * Transport Provider abstraction.
 *
 * This module defines the capability set a ConnectionSocket needs from the
 * layer that actually moves bytes: opening TCP (and optionally TLS)
 * connections, receiving, sending, cancelling, and reporting status.
 *
 * Implementations:
 * - NodeTransportProvider (ircsock-tcp) for node:net / node:tls
 * - FakeTransportProvider (testing/) for unit tests
 */

import type { SerialQueue } from "./queue.ts";
import type { TransportError } from "./errors.ts";
import type { TrustObject } from "./trust.ts";

/** Client certificate and private key for mutual TLS. */
export interface ClientIdentity {
  certificate: string | Uint8Array;
  privateKey: string | Uint8Array;
  passphrase?: string;
}

/** Accept/reject callback handed to the trust-verification hook. */
export type TrustVerdict = (accepted: boolean) => void;

/** TLS parameters passed to {@link TransportProvider.connect}. */
export interface TlsParameters {
  /** Cipher suites to offer, or "default" for the provider's own list. */
  cipherSuites: "default" | readonly string[];
  /** Drop deprecated suites and protocol versions. */
  modernCiphersOnly: boolean;
  clientIdentity?: ClientIdentity;
  /**
   * Called during the handshake with the peer's trust object.
   * The provider must hold the handshake until `complete` is invoked.
   */
  verify(trust: TrustObject, complete: TrustVerdict): void;
}

export interface ConnectParameters {
  /** Present only when a secured connection is wanted. */
  tls?: TlsParameters;
  /** Ask the provider not to route through a proxy. */
  preferNoProxies: boolean;
}

/**
 * Status updates reported by a handle.
 *
 * Only `waiting`, `ready`, `cancelled` and `failed` drive the state machine;
 * the rest are informational.
 */
export type TransportStatus =
  | { kind: "setup" }
  | { kind: "preparing" }
  | { kind: "waiting"; error: TransportError }
  | { kind: "ready" }
  | { kind: "cancelled" }
  | { kind: "failed"; error: TransportError };

export type ReceiveCompletion = (
  content: Uint8Array | undefined,
  isComplete: boolean,
  error: TransportError | undefined,
) => void;

export type SendCompletion = (error: TransportError | undefined) => void;

export interface RemoteEndpoint {
  host: string;
  port: number;
}

export interface TlsMetadata {
  negotiatedProtocol: string;
  negotiatedCipherSuite: string;
}

/**
 * A single connection created by a provider.
 *
 * Every callback (status, receive, send, trust verification) must be
 * delivered through the queue given to {@link TransportHandle.start}.
 */
export interface TransportHandle {
  /** Begin connecting; callbacks are dispatched on `queue`. */
  start(queue: SerialQueue): void;

  /** Tear down the connection. Ends with a `cancelled` status. */
  cancel(): void;

  /**
   * Request between `minLength` and `maxLength` bytes.
   * Exactly one completion per request.
   */
  receive(minLength: number, maxLength: number, completion: ReceiveCompletion): void;

  send(content: Uint8Array, completion: SendCompletion): void;

  /** Register the status handler. Only one handler is kept. */
  onStatus(handler: (status: TransportStatus) => void): void;

  remoteEndpoint(): RemoteEndpoint | undefined;

  /** Negotiated TLS parameters, once the handshake has completed. */
  tlsMetadata(): TlsMetadata | undefined;
}

export interface TransportProvider {
  connect(address: string, port: number, parameters: ConnectParameters): TransportHandle;
}
