// Immutable view of one request.

import type { HttpVersion, ReadonlyHttpHeaders } from "@skiff/wire";

import type { RequestBody } from "./body.ts";
import type { ServerConfig } from "./config.ts";
import type { IdleTimeout, SecuritySession, SocketAddress } from "./transport.ts";

export interface RequestInit {
  /** Receive time in epoch milliseconds. */
  timestamp: number;
  method: string;
  uri: string;
  version: HttpVersion;
  headers: ReadonlyHttpHeaders;
  remoteAddress: SocketAddress | null;
  localAddress: SocketAddress | null;
  serverConfig: ServerConfig;
  body: RequestBody | null;
  idleTimeout: IdleTimeout;
  securitySession: SecuritySession | null;
}

export class Request {
  readonly timestamp: number;
  readonly method: string;
  /** Request target exactly as received. */
  readonly uri: string;
  /** `uri` up to the first "?". */
  readonly path: string;
  /** `uri` after the first "?", without it; empty when absent. */
  readonly query: string;
  readonly version: HttpVersion;
  readonly headers: ReadonlyHttpHeaders;
  readonly remoteAddress: SocketAddress | null;
  readonly localAddress: SocketAddress | null;
  readonly serverConfig: ServerConfig;
  /** Present only when the request declared a body. */
  readonly body: RequestBody | null;
  /** The connection's idle timer; requests that stream slowly may extend it. */
  readonly idleTimeout: IdleTimeout;
  readonly securitySession: SecuritySession | null;

  constructor(init: RequestInit) {
    this.timestamp = init.timestamp;
    this.method = init.method;
    this.uri = init.uri;
    this.version = init.version;
    this.headers = init.headers;
    this.remoteAddress = init.remoteAddress;
    this.localAddress = init.localAddress;
    this.serverConfig = init.serverConfig;
    this.body = init.body;
    this.idleTimeout = init.idleTimeout;
    this.securitySession = init.securitySession;

    const q = init.uri.indexOf("?");
    this.path = q < 0 ? init.uri : init.uri.slice(0, q);
    this.query = q < 0 ? "" : init.uri.slice(q + 1);
    Object.freeze(this);
  }

  get hasBody(): boolean {
    return this.body !== null;
  }
}
