// @skiff/core - connection-level HTTP engine
//
// Routes transport events into request/response exchanges, accumulates
// request bodies with backpressure, and guarantees one response per request.

export { HttpConnectionAdapter, type AdapterOptions } from "./adapter.ts";

export { Connection, type ConnectionHandler } from "./connection.ts";

export { ConnectionLoop, type LoopErrorHandler } from "./loop.ts";

export {
  AttributeKey,
  ConnectionAttributes,
  type ClosureReason,
  type RawSubscriber,
} from "./attributes.ts";

export {
  RequestBody,
  RequestBodyAccumulator,
  type BodyOptions,
  type BodyState,
  type ReadControl,
} from "./body.ts";

export {
  ResponseTransmitter,
  TransmittedFlag,
  encodeFailureResponse,
  failureBody,
  type CloseEvent,
  type ResponseOutcome,
  type TransmitterOptions,
} from "./transmitter.ts";

export { Request, type RequestInit } from "./request.ts";
export { Response } from "./response.ts";

export {
  Exchange,
  type Application,
  type ConnectionInfo,
  type RawConnection,
  type Takeover,
} from "./exchange.ts";

export {
  classifyError,
  isIgnorableError,
  captureSecuritySession,
  type ErrorDisposition,
} from "./classifier.ts";

export {
  TransportEvents,
  type ConnectionTransport,
  type HandshakeCompletion,
  type IdleTimeout,
  type PeerAuthentication,
  type PeerCertificate,
  type SecuritySession,
  type SocketAddress,
  type TransportEvent,
} from "./transport.ts";

export {
  ConfigError,
  DecodingErrorLevel,
  defaultServerConfig,
  resolveServerConfig,
  serverConfigFromEnv,
  type ServerConfig,
  type ServerConfigOptions,
} from "./config.ts";

export { type Clock, systemClock } from "./clock.ts";

export { BodyError, ConnectionError, ResponseError } from "./errors.ts";

export {
  createLogger,
  errorMeta,
  isEnabled,
  silentLogger,
  type LogLevel,
  type LogMeta,
  type Logger,
  type LoggerOptions,
} from "./logging.ts";
