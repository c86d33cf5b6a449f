// Per-connection attribute store.
//
// Named slots for the engine's own state, plus a typed map for whatever the
// application wants to hang off a connection.

import type { InboundMessage } from "@skiff/wire";

import type { RequestBodyAccumulator } from "./body.ts";
import type { ResponseTransmitter } from "./transmitter.ts";
import type { IdleTimeout, SecuritySession } from "./transport.ts";

/** Consumer of every inbound message after a connection is taken over. */
export type RawSubscriber = (message: InboundMessage) => void;

/** Why a connection ended. */
export type ClosureReason = "idle" | "peer" | "error" | "complete";

/** Typed key for application attributes. Keys compare by identity. */
export class AttributeKey<T> {
  private readonly type?: T;

  constructor(readonly name: string) {}

  toString(): string {
    return `AttributeKey(${this.name})`;
  }
}

export class ConnectionAttributes {
  bodyAccumulator: RequestBodyAccumulator | undefined;
  responseTransmitter: ResponseTransmitter | undefined;
  rawSubscriber: RawSubscriber | undefined;
  securitySession: SecuritySession | undefined;
  idleTimeout: IdleTimeout | undefined;
  closureReason: ClosureReason | undefined;
  /** Settles after the current request's execution and fallback handling. */
  execution: Promise<void> | undefined;
  /** Pipelined messages waiting for the in-flight response to finish. */
  held: InboundMessage[] = [];
  /** A read has been requested and nothing has arrived since. */
  readPending = false;

  private extensions = new Map<AttributeKey<unknown>, unknown>();

  get<T>(key: AttributeKey<T>): T | undefined {
    return this.extensions.get(key) as T | undefined;
  }

  set<T>(key: AttributeKey<T>, value: T): void {
    this.extensions.set(key, value);
  }

  has<T>(key: AttributeKey<T>): boolean {
    return this.extensions.has(key);
  }

  delete<T>(key: AttributeKey<T>): boolean {
    return this.extensions.delete(key);
  }

  /**
   * Drop everything held for the connection. The closure reason and
   * security session stay readable for diagnostics.
   */
  release(): void {
    this.bodyAccumulator = undefined;
    this.responseTransmitter = undefined;
    this.rawSubscriber = undefined;
    this.idleTimeout = undefined;
    this.held = [];
    this.readPending = false;
    this.extensions.clear();
  }
}
