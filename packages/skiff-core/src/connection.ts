// Per-connection state: transport, serial loop and attributes.

import { type ClosureReason, type AttributeKey, ConnectionAttributes } from "./attributes.ts";
import type { ReadControl } from "./body.ts";
import type { ConnectionInfo } from "./exchange.ts";
import { ConnectionLoop } from "./loop.ts";
import {
  type ConnectionTransport,
  type SecuritySession,
  type SocketAddress,
  type TransportEvent,
  TransportEvents,
} from "./transport.ts";

/** Receives every event of a connection, always on its loop. */
export interface ConnectionHandler {
  handle(connection: Connection, event: TransportEvent): void;
}

export class Connection implements ReadControl, ConnectionInfo {
  readonly loop: ConnectionLoop;
  readonly attributes = new ConnectionAttributes();

  constructor(
    readonly transport: ConnectionTransport,
    private handler: ConnectionHandler,
  ) {
    this.loop = new ConnectionLoop((error) => this.handler.handle(this, TransportEvents.error(error)));
    this.attributes.idleTimeout = transport.idleTimeout;
  }

  /** Deliver a transport event on the loop. */
  dispatch(event: TransportEvent): void {
    this.loop.run(() => this.handler.handle(this, event));
  }

  // ==========================================================================
  // Read demand
  // ==========================================================================

  /** Ask the transport for data, unless a read is already outstanding. */
  demandRead(): void {
    if (this.attributes.readPending || !this.transport.isActive) return;
    this.attributes.readPending = true;
    this.transport.read();
  }

  pauseRead(): void {
    this.attributes.readPending = false;
    this.transport.pauseRead();
  }

  /** Data arrived; the outstanding read is satisfied. */
  readDelivered(): void {
    this.attributes.readPending = false;
  }

  /** Record why the connection is closing (first reason wins) and close it. */
  closeWith(reason: ClosureReason): void {
    this.attributes.closureReason ??= reason;
    if (this.transport.isActive) {
      this.transport.close();
    }
  }

  // ==========================================================================
  // ConnectionInfo
  // ==========================================================================

  get remoteAddress(): SocketAddress | null {
    return this.transport.remoteAddress;
  }

  get localAddress(): SocketAddress | null {
    return this.transport.localAddress;
  }

  get securitySession(): SecuritySession | null {
    return this.attributes.securitySession ?? null;
  }

  get<T>(key: AttributeKey<T>): T | undefined {
    return this.attributes.get(key);
  }

  set<T>(key: AttributeKey<T>, value: T): void {
    this.attributes.set(key, value);
  }
}
