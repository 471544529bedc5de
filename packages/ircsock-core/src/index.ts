// @ircsock/core - connection socket for IRC clients
// Transport-agnostic state machine, line framing, write gating, TLS trust
// evaluation and error translation.

export {
  ConnectionSocket,
  type ConnectionState,
  type ConnectionSocketOptions,
  type CloseReason,
} from "./connection.ts";

export type { ConnectionSocketDelegate } from "./delegate.ts";

export {
  resolveConnectionConfig,
  ConfigError,
  DEFAULT_MAXIMUM_READ_LENGTH,
  type ConnectionConfig,
  type ConnectionConfigInput,
  type ProxyType,
} from "./config.ts";

export {
  ConnectionError,
  TransportError,
  translateError,
  systemErrorDescriptions,
  type ConnectionErrorKind,
  type TransportErrorDomain,
  type ErrorDescriptions,
} from "./errors.ts";

export { LineFramer } from "./framing.ts";
export { WriteGate } from "./write_gate.ts";
export { SerialQueue } from "./queue.ts";

export {
  TrustVerifier,
  systemTrustPolicy,
  acceptAnyTrustPolicy,
  pinnedCertificatePolicy,
  anyOfTrustPolicies,
  certificateFingerprint,
  type TrustObject,
  type TrustPolicy,
} from "./trust.ts";

export type {
  TransportProvider,
  TransportHandle,
  TransportStatus,
  ConnectParameters,
  TlsParameters,
  ClientIdentity,
  TrustVerdict,
  ReceiveCompletion,
  SendCompletion,
  RemoteEndpoint,
  TlsMetadata,
} from "./transport.ts";

export { loggingDelegate, socketLog, type LoggingOptions, type LogFn } from "./logging.ts";
