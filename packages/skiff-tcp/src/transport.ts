// Socket-backed ConnectionTransport.

import {
  ConnectionError,
  type ConnectionTransport,
  type IdleTimeout,
  type SocketAddress,
} from "@skiff/core";

/** The parts of a net.Socket the transport drives. */
export interface SocketLike {
  readonly destroyed: boolean;
  readonly writableNeedDrain: boolean;
  readonly remoteAddress?: string;
  readonly remotePort?: number;
  readonly remoteFamily?: string;
  readonly localAddress?: string;
  readonly localPort?: number;
  pause(): unknown;
  resume(): unknown;
  write(data: Uint8Array, callback: (error?: Error | null) => void): boolean;
  cork(): void;
  uncork(): void;
  end(callback?: () => void): unknown;
  destroy(error?: Error): unknown;
  setTimeout(timeout: number): unknown;
}

function toAddress(host: string | undefined, port: number | undefined, family?: string): SocketAddress | null {
  if (host === undefined || port === undefined) return null;
  return family === undefined ? { host, port } : { host, port, family };
}

/** Idle timer backed by the socket's inactivity timeout ("timeout" event). */
class SocketIdleTimeout implements IdleTimeout {
  private current: number;

  constructor(
    private socket: SocketLike,
    ms: number,
  ) {
    this.current = ms;
    if (ms > 0) socket.setTimeout(ms);
  }

  get ms(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
    this.socket.setTimeout(ms);
  }
}

/**
 * ConnectionTransport over a socket.
 *
 * Reads map onto pause/resume. Writes are corked until flush() so a response
 * head and body leave in one segment; writability follows the socket's
 * drain state.
 */
export class SocketTransport implements ConnectionTransport {
  readonly idleTimeout: IdleTimeout;
  private corked = false;
  private closed = false;

  constructor(
    private socket: SocketLike,
    idleTimeoutMs = 0,
  ) {
    this.idleTimeout = new SocketIdleTimeout(socket, idleTimeoutMs);
  }

  get isActive(): boolean {
    return !this.closed && !this.socket.destroyed;
  }

  get isWritable(): boolean {
    return !this.socket.writableNeedDrain;
  }

  get remoteAddress(): SocketAddress | null {
    return toAddress(this.socket.remoteAddress, this.socket.remotePort, this.socket.remoteFamily);
  }

  get localAddress(): SocketAddress | null {
    return toAddress(this.socket.localAddress, this.socket.localPort);
  }

  read(): void {
    this.socket.resume();
  }

  pauseRead(): void {
    this.socket.pause();
  }

  write(data: Uint8Array): Promise<void> {
    if (!this.isActive) {
      return Promise.reject(ConnectionError.closed());
    }
    if (!this.corked) {
      this.socket.cork();
      this.corked = true;
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.write(data, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  flush(): void {
    if (this.corked) {
      this.corked = false;
      this.socket.uncork();
    }
  }

  /** Flush, half-close, and destroy the socket once the peer has everything. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.flush();
    this.socket.end(() => {
      this.socket.destroy();
    });
  }
}
