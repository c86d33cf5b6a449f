// TLS session capture.

import type { CipherNameAndProtocol, TlsOptions } from "node:tls";

import type { HandshakeCompletion, PeerAuthentication, PeerCertificate, SecuritySession } from "@skiff/core";

/** Certificate fields read from a peer certificate; absent when the peer sent none. */
export interface CertificateFields {
  subject?: object;
  issuer?: object;
  fingerprint256?: string;
  valid_from?: string;
  valid_to?: string;
}

/** The parts of a tls.TLSSocket read after the handshake. */
export interface TlsSocketLike {
  readonly authorized: boolean;
  readonly authorizationError?: Error;
  getProtocol(): string | null;
  getCipher(): CipherNameAndProtocol;
  getPeerCertificate(): CertificateFields;
}

/** Map server TLS options onto whether a client certificate is wanted or required. */
export function peerAuthenticationFor(options: TlsOptions): PeerAuthentication {
  if (!options.requestCert) return "none";
  return options.rejectUnauthorized === false ? "want" : "need";
}

/** "CN=client, O=Example" */
function formatName(name: object | undefined): string {
  if (!name) return "";
  return Object.entries(name)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(", ");
}

export function toPeerCertificate(cert: CertificateFields): PeerCertificate | null {
  if (!cert.fingerprint256) return null;
  return {
    subject: formatName(cert.subject),
    issuer: formatName(cert.issuer),
    fingerprint256: cert.fingerprint256,
    validFrom: cert.valid_from ?? "",
    validTo: cert.valid_to ?? "",
  };
}

export function describeTlsSession(socket: TlsSocketLike): SecuritySession {
  return {
    protocol: socket.getProtocol(),
    cipher: socket.getCipher().name,
    authorized: socket.authorized,
    authorizationError: socket.authorizationError ? String(socket.authorizationError) : null,
    peerCertificate: toPeerCertificate(socket.getPeerCertificate()),
  };
}

/** Handshake outcome for a socket that completed its TLS handshake. */
export function completedHandshake(
  socket: TlsSocketLike,
  peerAuthentication: PeerAuthentication,
): HandshakeCompletion {
  return { success: true, peerAuthentication, session: describeTlsSession(socket) };
}
