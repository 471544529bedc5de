// Transport Provider over node:net and node:tls.

import net from "node:net";
import tls from "node:tls";
import createDebug from "debug";
import {
  TransportError,
  type ClientIdentity,
  type ConnectParameters,
  type ReceiveCompletion,
  type RemoteEndpoint,
  type SendCompletion,
  type SerialQueue,
  type TlsMetadata,
  type TlsParameters,
  type TransportHandle,
  type TransportProvider,
  type TransportStatus,
  type TrustObject,
} from "@ircsock/core";
import { minimumVersion, selectCiphers } from "./ciphers.ts";
import { toTransportError } from "./errors.ts";

const log = createDebug("ircsock:tcp");

/** The parts of a peer certificate the trust object is built from. */
export interface PeerCertificateLike {
  raw?: Uint8Array;
  issuerCertificate?: PeerCertificateLike;
}

/** DER chain from `getPeerCertificate(true)`, leaf first. */
export function peerCertificateChain(peer: PeerCertificateLike): Uint8Array[] {
  const chain: Uint8Array[] = [];
  const seen = new Set<PeerCertificateLike>();
  let cert: PeerCertificateLike | undefined = peer;
  while (cert !== undefined && cert.raw !== undefined && !seen.has(cert)) {
    seen.add(cert);
    chain.push(new Uint8Array(cert.raw));
    // A self-signed root is its own issuer
    cert = cert.issuerCertificate;
  }
  return chain;
}

/** Trust object for a completed handshake with `address`. */
export function buildTrustObject(
  address: string,
  peer: PeerCertificateLike,
  authorized: boolean,
  authorizationError: unknown,
): TrustObject {
  const trust: TrustObject = {
    certificateChain: peerCertificateChain(peer),
    policyName: `SSL (${address})`,
    authorized,
  };
  const reason = describeAuthorizationError(authorizationError);
  return reason === undefined ? trust : { ...trust, authorizationError: reason };
}

// node:tls reports the verification code as a string, though typed as Error
function describeAuthorizationError(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return undefined;
}

const VERIFICATION_CODE = /^[A-Z][A-Z0-9_]*$/;

/**
 * Error for a rejected trust verdict: the transport's own verification code
 * when it has one, `CERT_REJECTED` otherwise.
 */
export function rejectionError(trust: TrustObject): TransportError {
  const code = trust.authorizationError;
  if (code !== undefined && VERIFICATION_CODE.test(code)) {
    return TransportError.tls(code, `certificate rejected by trust policy: ${code}`);
  }
  return TransportError.tls("CERT_REJECTED", "certificate rejected by trust policy");
}

function keyMaterial(value: string | Uint8Array): string | Buffer {
  return typeof value === "string" ? value : Buffer.from(value);
}

interface PendingReceive {
  maxLength: number;
  completion: ReceiveCompletion;
}

/**
 * One node:net or node:tls connection.
 *
 * Socket events are forwarded to the connection queue; received chunks
 * wait there until the next `receive` asks for them.
 */
export class NodeTransportHandle implements TransportHandle {
  private socket: net.Socket | null = null;
  private tlsSocket: tls.TLSSocket | null = null;
  private queue: SerialQueue | null = null;
  private statusHandler: ((status: TransportStatus) => void) | null = null;

  private chunks: Uint8Array[] = [];
  private pendingReceives: PendingReceive[] = [];
  private ended = false;
  private cancelled = false;
  private finished = false;

  constructor(
    readonly address: string,
    readonly port: number,
    private readonly parameters: ConnectParameters,
  ) {}

  start(queue: SerialQueue): void {
    if (this.queue !== null) return;
    this.queue = queue;

    this.dispatch(() => this.report({ kind: "setup" }));
    this.dispatch(() => this.report({ kind: "preparing" }));

    if (!this.parameters.preferNoProxies) {
      log("%s:%d: system proxy settings do not apply to node sockets", this.address, this.port);
    }

    const tlsParameters = this.parameters.tls;
    if (tlsParameters === undefined) {
      const socket = net.connect({ host: this.address, port: this.port });
      socket.once("connect", () => this.dispatch(() => this.report({ kind: "ready" })));
      this.attach(socket);
    } else {
      const socket = tls.connect(this.tlsOptions(tlsParameters));
      socket.once("secureConnect", () => this.dispatch(() => this.verifyPeer(socket, tlsParameters)));
      this.tlsSocket = socket;
      this.attach(socket);
    }
  }

  cancel(): void {
    if (this.finished || this.cancelled) return;
    this.cancelled = true;
    this.socket?.destroy();
    this.dispatch(() => this.finish({ kind: "cancelled" }));
  }

  receive(_minLength: number, maxLength: number, completion: ReceiveCompletion): void {
    this.dispatch(() => {
      this.pendingReceives.push({ maxLength, completion });
      this.flushReceive();
    });
  }

  send(content: Uint8Array, completion: SendCompletion): void {
    const socket = this.socket;
    if (socket === null || socket.destroyed) {
      this.dispatch(() => completion(TransportError.other("socket is not connected")));
      return;
    }
    socket.write(content, (err) => {
      this.dispatch(() => completion(err ? toTransportError(err) : undefined));
    });
  }

  onStatus(handler: (status: TransportStatus) => void): void {
    this.statusHandler = handler;
  }

  remoteEndpoint(): RemoteEndpoint | undefined {
    const host = this.socket?.remoteAddress;
    const port = this.socket?.remotePort;
    if (host === undefined || port === undefined) return undefined;
    return { host, port };
  }

  tlsMetadata(): TlsMetadata | undefined {
    const socket = this.tlsSocket;
    if (socket === null) return undefined;
    const protocol = socket.getProtocol();
    if (protocol === null) return undefined;
    return {
      negotiatedProtocol: protocol,
      negotiatedCipherSuite: socket.getCipher().name,
    };
  }

  private tlsOptions(parameters: TlsParameters): tls.ConnectionOptions {
    const options: tls.ConnectionOptions = {
      host: this.address,
      port: this.port,
      // Trust is decided by the verify hook after the handshake
      rejectUnauthorized: false,
      ciphers: selectCiphers(parameters.cipherSuites, parameters.modernCiphersOnly),
      minVersion: minimumVersion(parameters.modernCiphersOnly),
    };
    // SNI takes host names only
    if (net.isIP(this.address) === 0) {
      options.servername = this.address;
    }
    const identity: ClientIdentity | undefined = parameters.clientIdentity;
    if (identity !== undefined) {
      options.cert = keyMaterial(identity.certificate);
      options.key = keyMaterial(identity.privateKey);
      options.passphrase = identity.passphrase;
    }
    return options;
  }

  private attach(socket: net.Socket): void {
    this.socket = socket;

    socket.on("data", (chunk: Buffer) => {
      this.dispatch(() => {
        this.chunks.push(new Uint8Array(chunk));
        this.flushReceive();
      });
    });

    socket.on("end", () => {
      this.dispatch(() => this.markEnded());
    });

    socket.on("error", (err: Error) => {
      log("%s:%d: socket error: %s", this.address, this.port, err.message);
      this.dispatch(() => this.finish({ kind: "failed", error: toTransportError(err) }));
    });

    socket.on("close", () => {
      if (this.cancelled) return;
      this.dispatch(() => this.markEnded());
    });
  }

  private verifyPeer(socket: tls.TLSSocket, parameters: TlsParameters): void {
    if (this.finished || this.cancelled) return;

    const trust = buildTrustObject(
      this.address,
      socket.getPeerCertificate(true),
      socket.authorized,
      socket.authorizationError,
    );

    parameters.verify(trust, (accepted) => {
      this.dispatch(() => {
        if (this.finished || this.cancelled) return;
        if (accepted) {
          this.report({ kind: "ready" });
          return;
        }
        socket.destroy();
        this.finish({ kind: "failed", error: rejectionError(trust) });
      });
    });
  }

  private markEnded(): void {
    this.ended = true;
    this.flushReceive();
  }

  /** Complete pending receives in request order while data or EOF is available. */
  private flushReceive(): void {
    for (;;) {
      const pending = this.pendingReceives[0];
      if (pending === undefined) return;

      const first = this.chunks[0];
      if (first !== undefined) {
        this.pendingReceives.shift();
        if (first.length <= pending.maxLength) {
          this.chunks.shift();
          pending.completion(first, false, undefined);
        } else {
          this.chunks[0] = first.subarray(pending.maxLength);
          pending.completion(first.subarray(0, pending.maxLength), false, undefined);
        }
        continue;
      }

      if (!this.ended) return;
      this.pendingReceives.shift();
      pending.completion(undefined, true, undefined);
    }
  }

  private finish(status: TransportStatus): void {
    if (this.finished) return;
    this.finished = true;
    this.report(status);
  }

  private report(status: TransportStatus): void {
    this.statusHandler?.(status);
  }

  private dispatch(task: () => void): void {
    this.queue?.dispatch(task);
  }
}

/** Opens connections with node:net, or node:tls when TLS parameters are given. */
export class NodeTransportProvider implements TransportProvider {
  connect(address: string, port: number, parameters: ConnectParameters): NodeTransportHandle {
    return new NodeTransportHandle(address, port, parameters);
  }
}
