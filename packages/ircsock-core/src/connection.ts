// Connection state machine.
//
// Drives a TransportHandle through open → ready → (secured) → cancelled or
// failed, frames received bytes into lines, gates writes, and reports every
// step to the delegate.
//
// Generic over TransportProvider to support different transports:
// - NodeTransportProvider for node:net / node:tls
// - FakeTransportProvider in tests

import {
  resolveConnectionConfig,
  type ConnectionConfig,
  type ConnectionConfigInput,
} from "./config.ts";
import type { ConnectionSocketDelegate } from "./delegate.ts";
import {
  ConnectionError,
  TransportError,
  translateError,
  systemErrorDescriptions,
  type ErrorDescriptions,
} from "./errors.ts";
import { LineFramer } from "./framing.ts";
import { socketLog, type LogFn } from "./logging.ts";
import { SerialQueue } from "./queue.ts";
import type {
  ConnectParameters,
  TransportHandle,
  TransportProvider,
  TransportStatus,
  TrustVerdict,
} from "./transport.ts";
import { TrustVerifier, systemTrustPolicy, type TrustObject, type TrustPolicy } from "./trust.ts";
import { WriteGate } from "./write_gate.ts";

/** Connection state. Exactly one holds at a time. */
export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "securing"
  | "connected"
  | "secured"
  | "disconnecting";

/** Reason given to {@link ConnectionSocket.close}; strings become generic errors. */
export type CloseReason = ConnectionError | TransportError | string;

export interface ConnectionSocketOptions {
  /** Decides TLS trust. Default: {@link systemTrustPolicy} */
  trustPolicy?: TrustPolicy;
  /** Lookup tables for error translation. Default: system descriptions */
  errorDescriptions?: ErrorDescriptions;
  /** Internal log sink. Default: the `ircsock:socket` debug logger */
  log?: LogFn;
}

const EMPTY_READ_MESSAGE = "Unexpected condition: there is no data when there is no error";

let nextSocketId = 1;

/**
 * A connection to one IRC server.
 *
 * Opened once; after it reports a disconnect it is back in `disconnected`
 * and may be opened again. None of the operations block: results arrive
 * through the delegate on the connection queue.
 */
export class ConnectionSocket {
  readonly id: number;
  readonly config: ConnectionConfig;

  private readonly provider: TransportProvider;
  private readonly delegate: ConnectionSocketDelegate;
  private readonly errorDescriptions: ErrorDescriptions;
  private readonly log: LogFn;

  private readonly framer = new LineFramer();
  private readonly writeGate = new WriteGate();
  private readonly trustVerifier: TrustVerifier;

  private _state: ConnectionState = "disconnected";
  private handle: TransportHandle | undefined;
  private queue: SerialQueue | undefined;
  private alternateDisconnectError: ConnectionError | undefined;

  constructor(
    config: ConnectionConfigInput,
    provider: TransportProvider,
    delegate: ConnectionSocketDelegate,
    options: ConnectionSocketOptions = {},
  ) {
    this.id = nextSocketId++;
    this.config = resolveConnectionConfig(config);
    this.provider = provider;
    this.delegate = delegate;
    this.errorDescriptions = options.errorDescriptions ?? systemErrorDescriptions;
    this.log = options.log ?? socketLog;
    this.trustVerifier = new TrustVerifier(options.trustPolicy ?? systemTrustPolicy, this.log);
  }

  // -- State ----------------------------------------------------------------

  get state(): ConnectionState {
    return this._state;
  }

  get isDisconnected(): boolean {
    return this._state === "disconnected";
  }

  get isConnecting(): boolean {
    return this._state === "connecting" || this._state === "securing";
  }

  get isConnected(): boolean {
    return this._state === "connected" || this._state === "secured";
  }

  get isSecured(): boolean {
    return this._state === "secured";
  }

  get isDisconnecting(): boolean {
    return this._state === "disconnecting";
  }

  /** Name used in logs and for the connection queue. */
  get label(): string {
    return this.config.label ?? `socket-${this.id}`;
  }

  // -- Open / close ---------------------------------------------------------

  /** Start connecting. No-op unless disconnected. */
  open(): void {
    if (this._state !== "disconnected") return;

    const { serverAddress, serverPort } = this.config;

    const handle = this.provider.connect(serverAddress, serverPort, this.connectParameters());
    handle.onStatus((status) => {
      if (this.handle !== handle) {
        this.log("%s: ignoring %s from a previous attempt", this.label, status.kind);
        return;
      }
      this.handleStatus(status);
    });

    this.handle = handle;
    this.queue = new SerialQueue(`ircsock.${this.label}`);
    this._state = "connecting";

    this.delegate.willConnect?.(serverAddress, serverPort);

    handle.start(this.queue);
  }

  /**
   * Ask the transport to tear the connection down.
   *
   * With a reason, that reason is reported instead of whatever the
   * transport says. `disconnected` is reached asynchronously, never inside
   * this call. No-op when already disconnected or disconnecting.
   */
  close(reason?: CloseReason): void {
    if (this._state === "disconnected" || this._state === "disconnecting") return;

    if (reason !== undefined) {
      this.alternateDisconnectError = this.toConnectionError(reason);
    }

    this._state = "disconnecting";
    this.handle?.cancel();
  }

  private connectParameters(): ConnectParameters {
    const config = this.config;
    const parameters: ConnectParameters = {
      preferNoProxies: config.proxyType === "none",
    };

    if (config.prefersSecuredConnection) {
      parameters.tls = {
        cipherSuites: config.cipherSuites,
        modernCiphersOnly: config.prefersModernCiphersOnly,
        clientIdentity: config.clientIdentity,
        verify: (trust, complete) => this.verifyTrust(trust, complete),
      };
    }

    return parameters;
  }

  // -- Read / write ---------------------------------------------------------

  /** Request the next chunk of bytes. No-op unless connected. */
  read(): void {
    if (!this.isConnected) return;

    const handle = this.handle;
    if (handle === undefined) return;

    handle.receive(0, this.config.maximumReadLength, (content, _isComplete, error) => {
      if (this.handle !== handle) return;
      this.readCompletion(content, error);
    });
  }

  /**
   * Send `data`. Returns false, without sending, when not connected or when
   * a previous write has not completed yet.
   */
  write(data: Uint8Array): boolean {
    if (!this.isConnected) return false;

    const handle = this.handle;
    if (handle === undefined) return false;

    // One write at a time
    if (!this.writeGate.tryAcquire()) {
      this.log("%s: dropped write of %d bytes, a write is already pending", this.label, data.length);
      return false;
    }

    this.delegate.willSend?.(data);

    handle.send(data, (error) => {
      if (this.handle !== handle) return;
      this.writeCompletion(error);
    });

    return true;
  }

  private readCompletion(content: Uint8Array | undefined, error: TransportError | undefined): void {
    if (error !== undefined) {
      this.close(error);
      return;
    }

    if (content === undefined) {
      this.close(EMPTY_READ_MESSAGE);
      return;
    }

    this.readIn(content);

    this.read();
  }

  private readIn(data: Uint8Array): void {
    if (this._state === "disconnected" || this._state === "disconnecting") return;

    for (const line of this.framer.push(data)) {
      try {
        this.delegate.received(line);
      } catch (error) {
        // The rest of the chunk is dropped with the connection
        this.log("%s: delegate failed on a received line: %O", this.label, error);
        const reason = error instanceof Error ? error.message : String(error);
        this.close(ConnectionError.generic(`Delegate failed to handle a received line: ${reason}`));
        return;
      }
    }
  }

  private writeCompletion(error: TransportError | undefined): void {
    this.writeGate.release();

    if (error !== undefined) {
      this.close(error);
      return;
    }

    this.delegate.didSend?.();
  }

  // -- Transport events -----------------------------------------------------

  private handleStatus(status: TransportStatus): void {
    switch (status.kind) {
      case "waiting":
        this.close(status.error);
        break;
      case "ready":
        this.onConnect();
        break;
      case "cancelled":
        this.onDisconnect(undefined);
        break;
      case "failed":
        this.onDisconnect(status.error);
        break;
      default:
        this.log("%s: status changed to %s", this.label, status.kind);
    }
  }

  private onConnect(): void {
    if (this._state === "disconnecting") {
      this.log("%s: ready after close was requested", this.label);
      return;
    }

    this._state = "connected";

    this.read();

    this.delegate.didConnect?.(this.connectedHost);

    this.onSecured();
  }

  private onSecured(): void {
    // Called for every connection; only TLS connections report metadata.
    if (this._state !== "connected") return;

    const metadata = this.handle?.tlsMetadata();
    if (metadata === undefined) return;

    this._state = "secured";

    this.delegate.securedWith?.(metadata.negotiatedProtocol, metadata.negotiatedCipherSuite);
  }

  private onDisconnect(error: TransportError | undefined): void {
    let payload: ConnectionError | undefined;
    try {
      payload = this.alternateDisconnectError;
      if (payload === undefined && error !== undefined) {
        payload = translateError(error, this.errorDescriptions);
      }
    } finally {
      this.resetState();
    }

    if (payload === undefined) {
      this.delegate.disconnected?.();
    } else {
      this.delegate.disconnectedWith?.(payload);
    }
  }

  private verifyTrust(trust: TrustObject, complete: TrustVerdict): void {
    if (!this.isConnecting) {
      this.log("%s: rejecting trust evaluation in state %s", this.label, this._state);
      complete(false);
      return;
    }

    this._state = "securing";

    this.trustVerifier.evaluate(trust, complete);
  }

  private resetState(): void {
    this.handle = undefined;

    this.queue?.close();
    this.queue = undefined;

    this.framer.reset();
    this.writeGate.release();
    this.trustVerifier.reset();
    this.alternateDisconnectError = undefined;

    this._state = "disconnected";
  }

  private toConnectionError(reason: CloseReason): ConnectionError {
    if (reason instanceof ConnectionError) return reason;
    if (reason instanceof TransportError) return translateError(reason, this.errorDescriptions);
    return ConnectionError.generic(reason);
  }

  // -- Properties -----------------------------------------------------------

  /** Host of the remote endpoint, once connected. */
  get connectedHost(): string | undefined {
    return this.handle?.remoteEndpoint()?.host;
  }

  get tlsNegotiatedProtocol(): string | undefined {
    return this.handle?.tlsMetadata()?.negotiatedProtocol;
  }

  get tlsNegotiatedCipherSuite(): string | undefined {
    return this.handle?.tlsMetadata()?.negotiatedCipherSuite;
  }

  /** DER-encoded peer certificates, leaf first. */
  get tlsCertificateChain(): readonly Uint8Array[] | undefined {
    return this.trustVerifier.certificateChain;
  }

  get tlsPolicyName(): string | undefined {
    return this.trustVerifier.policyName;
  }
}
