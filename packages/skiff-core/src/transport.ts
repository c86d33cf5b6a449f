// The transport seam.
//
// A ConnectionTransport is what the engine writes to and asks to read; a
// TransportEvent is everything the transport reports back. The TCP binding
// implements both directions over a socket, tests implement them in memory.

import type { InboundMessage } from "@skiff/wire";

export interface SocketAddress {
  host: string;
  port: number;
  family?: string;
}

/** The connection's idle timer. Setting 0 disables it. */
export interface IdleTimeout {
  readonly ms: number;
  set(ms: number): void;
}

export interface ConnectionTransport {
  readonly isActive: boolean;
  /** False while outbound buffers are above the transport's high watermark. */
  readonly isWritable: boolean;
  readonly remoteAddress: SocketAddress | null;
  readonly localAddress: SocketAddress | null;
  readonly idleTimeout: IdleTimeout;

  /** Ask for more inbound data. */
  read(): void;
  /** Stop delivering inbound data until the next read(). */
  pauseRead(): void;
  /**
   * Queue bytes; resolves once they are handed to the OS, rejects on failure.
   * Accepted while unwritable: the bytes wait in the queue until it drains.
   */
  write(data: Uint8Array): Promise<void>;
  /** Push queued writes out. */
  flush(): void;
  close(): void;
}

// ============================================================================
// Security
// ============================================================================

/** Whether the server asked the peer for a certificate. */
export type PeerAuthentication = "none" | "want" | "need";

export interface PeerCertificate {
  subject: string;
  issuer: string;
  fingerprint256: string;
  validFrom: string;
  validTo: string;
}

/** Negotiated TLS session details kept for the life of the connection. */
export interface SecuritySession {
  protocol: string | null;
  cipher: string | null;
  authorized: boolean;
  authorizationError: string | null;
  peerCertificate: PeerCertificate | null;
}

export interface HandshakeCompletion {
  success: boolean;
  peerAuthentication: PeerAuthentication;
  session: SecuritySession | null;
  error?: Error;
}

// ============================================================================
// Events
// ============================================================================

export type TransportEvent =
  | { kind: "open" }
  | { kind: "close" }
  | { kind: "message"; message: InboundMessage }
  | { kind: "writabilityChanged" }
  | { kind: "idle" }
  | { kind: "handshake"; completion: HandshakeCompletion }
  | { kind: "error"; error: unknown };

export const TransportEvents = {
  open: (): TransportEvent => ({ kind: "open" }),
  close: (): TransportEvent => ({ kind: "close" }),
  message: (message: InboundMessage): TransportEvent => ({ kind: "message", message }),
  writabilityChanged: (): TransportEvent => ({ kind: "writabilityChanged" }),
  idle: (): TransportEvent => ({ kind: "idle" }),
  handshake: (completion: HandshakeCompletion): TransportEvent => ({ kind: "handshake", completion }),
  error: (error: unknown): TransportEvent => ({ kind: "error", error }),
};
