// @skiff/tcp - Node.js socket binding for @skiff/core

export { Server, type ServerOptions } from "./server.ts";
export { HttpConnection } from "./connection.ts";
export { SocketTransport, type SocketLike } from "./transport.ts";
export {
  completedHandshake,
  describeTlsSession,
  peerAuthenticationFor,
  toPeerCertificate,
  type CertificateFields,
  type TlsSocketLike,
} from "./tls.ts";
