// @ircsock/tcp - Transport Provider for Node.js (node:net and node:tls)

import {
  ConnectionSocket,
  type ConnectionConfigInput,
  type ConnectionSocketDelegate,
  type ConnectionSocketOptions,
} from "@ircsock/core";
import { NodeTransportProvider } from "./transport.ts";

export {
  NodeTransportProvider,
  NodeTransportHandle,
  buildTrustObject,
  peerCertificateChain,
  rejectionError,
  type PeerCertificateLike,
} from "./transport.ts";
export { toTransportError, errnoFor } from "./errors.ts";
export { selectCiphers, minimumVersion } from "./ciphers.ts";

/**
 * A ConnectionSocket over real sockets.
 *
 * @example
 * ```typescript
 * const socket = connectionSocket(
 *   { serverAddress: "irc.example.net", serverPort: 6697, prefersSecuredConnection: true },
 *   loggingDelegate(session),
 * );
 * socket.open();
 * ```
 */
export function connectionSocket(
  config: ConnectionConfigInput,
  delegate: ConnectionSocketDelegate,
  options: ConnectionSocketOptions = {},
): ConnectionSocket {
  return new ConnectionSocket(config, new NodeTransportProvider(), delegate, options);
}
