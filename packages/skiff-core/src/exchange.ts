// What the application sees of one request/response exchange.

import type { AttributeKey, RawSubscriber } from "./attributes.ts";
import type { Request } from "./request.ts";
import type { Response } from "./response.ts";
import type { SecuritySession, SocketAddress } from "./transport.ts";

/** Connection metadata and typed per-connection attributes. */
export interface ConnectionInfo {
  readonly remoteAddress: SocketAddress | null;
  readonly localAddress: SocketAddress | null;
  readonly securitySession: SecuritySession | null;
  get<T>(key: AttributeKey<T>): T | undefined;
  set<T>(key: AttributeKey<T>, value: T): void;
}

/** Direct access to a connection after takeover. */
export interface RawConnection {
  readonly isActive: boolean;
  write(data: Uint8Array): Promise<void>;
  close(): void;
}

export type Takeover = (subscriber: RawSubscriber) => RawConnection;

export class Exchange {
  /**
   * Set by the handler pipeline to name the last handler that ran; included
   * in the diagnostic when no response is sent.
   */
  handlerDescription: string | undefined;

  constructor(
    readonly request: Request,
    readonly response: Response,
    readonly connection: ConnectionInfo,
    private takeoverFn: Takeover,
  ) {}

  /**
   * Take the connection over from HTTP handling. Counts as this request's
   * response; every later inbound message goes to `subscriber`.
   *
   * @throws ResponseError if a response was already sent
   */
  takeover(subscriber: RawSubscriber): RawConnection {
    return this.takeoverFn(subscriber);
  }
}

/** Decides how to respond to each request. */
export interface Application {
  execute(exchange: Exchange): Promise<void>;
}
