// Response transmission.
//
// One ResponseTransmitter per request. It owns the transmitted flag that
// guarantees a response reaches the wire at most once, frames the response
// for keep-alive, and propagates writability and closure to a streaming
// producer.

import {
  HttpHeaders,
  HeaderNames,
  HttpStatus,
  PLAIN_TEXT_UTF8,
  describeStatus,
  encodeChunk,
  encodeResponseHead,
  isBodylessStatus,
  isKeepAlive,
  LAST_CHUNK,
} from "@skiff/wire";

import type { RequestBodyAccumulator } from "./body.ts";
import type { Clock } from "./clock.ts";
import type { Connection } from "./connection.ts";
import { ConnectionError, ResponseError } from "./errors.ts";
import { type Logger, errorMeta } from "./logging.ts";
import type { Request } from "./request.ts";
import { TransportEvents } from "./transport.ts";

const EMPTY = new Uint8Array(0);

/**
 * A flag that flips from false to true once.
 *
 * Connection state is only touched from one thread of execution, so the
 * check and the set cannot be separated by another caller.
 */
export class TransmittedFlag {
  private value = false;

  get isSet(): boolean {
    return this.value;
  }

  /** Set the flag; true if this call was the one that set it. */
  testAndSet(): boolean {
    if (this.value) return false;
    this.value = true;
    return true;
  }
}

export interface ResponseOutcome {
  status: number;
  /** Whether the connection stays open for another request. */
  keepAlive: boolean;
  /** Milliseconds from request receipt to the last byte written. */
  duration: number;
}

export interface CloseEvent {
  /** Whether a response had been committed before the connection closed. */
  transmitted: boolean;
}

export interface TransmitterOptions {
  logger: Logger;
  clock: Clock;
}

/** Body text of a synthetic failure response, e.g. "Failure: 400 Bad Request\r\n". */
export function failureBody(status: number): Uint8Array {
  return Buffer.from(`Failure: ${describeStatus(status)}\r\n`, "utf8");
}

/** A complete failure response that closes the connection. */
export function encodeFailureResponse(status: number): Uint8Array {
  const body = failureBody(status);
  const headers = new HttpHeaders()
    .set("Content-Type", PLAIN_TEXT_UTF8)
    .set("Content-Length", body.length)
    .set("Connection", "close");
  return Buffer.concat([encodeResponseHead("HTTP/1.1", status, headers), body]);
}

interface WritableWaiter {
  resolve(): void;
  reject(error: Error): void;
}

export class ResponseTransmitter {
  readonly flag = new TransmittedFlag();

  private closed = false;
  private finished = false;
  private forceClose = false;
  private writeFailed = false;
  private producerPaused = false;
  private hooks: Array<() => void> = [];
  private closeListeners: Array<(event: CloseEvent) => void> = [];
  private finishListeners: Array<(outcome: ResponseOutcome) => void> = [];
  private writableWaiters: WritableWaiter[] = [];

  constructor(
    private connection: Connection,
    readonly request: Request,
    readonly headers: HttpHeaders,
    private accumulator: RequestBodyAccumulator | null,
    private options: TransmitterOptions,
  ) {}

  get isTransmitted(): boolean {
    return this.flag.isSet;
  }

  get isConnectionClosed(): boolean {
    return this.closed;
  }

  /** Whether a streaming producer is waiting for the transport to drain. */
  get isProducerPaused(): boolean {
    return this.producerPaused;
  }

  /** Run `hook` once, just before the response head is written. */
  beforeSend(hook: () => void): void {
    if (this.flag.isSet) throw ResponseError.alreadyTransmitted();
    this.hooks.push(hook);
  }

  onClose(listener: (event: CloseEvent) => void): void {
    this.closeListeners.push(listener);
  }

  onFinished(listener: (outcome: ResponseOutcome) => void): void {
    this.finishListeners.push(listener);
  }

  // ==========================================================================
  // Transmission
  // ==========================================================================

  /**
   * Send a complete response.
   *
   * @returns false, without writing anything, if a response was already
   * transmitted or the connection is closed
   */
  transmit(status: number, body: Uint8Array = EMPTY): boolean {
    if (this.closed) {
      this.options.logger.debug("Connection closed, not sending response", this.describe(status));
      return false;
    }
    if (!this.flag.testAndSet()) {
      this.options.logger.warn("Response already transmitted, ignoring", this.describe(status));
      return false;
    }
    this.onLoop(() => this.writeFull(status, body));
    return true;
  }

  /** Replace whatever the application prepared with a failure response and close afterwards. */
  transmitError(status: number): boolean {
    if (this.closed || this.flag.isSet) return false;
    this.headers.clear();
    this.headers.set("Content-Type", PLAIN_TEXT_UTF8);
    this.forceClose = true;
    return this.transmit(status, failureBody(status));
  }

  /**
   * Send a response whose body is produced incrementally.
   *
   * Uses the declared content-length when there is one, chunked encoding on
   * HTTP/1.1 otherwise, and closes the connection to delimit the body on
   * HTTP/1.0. The producer is not pulled while the transport is unwritable.
   */
  transmitStream(status: number, source: AsyncIterable<Uint8Array>): Promise<void> {
    if (this.closed) return Promise.reject(ConnectionError.closed());
    if (!this.flag.testAndSet()) return Promise.reject(ResponseError.alreadyTransmitted());
    return new Promise<void>((resolve, reject) => {
      this.onLoop(() => {
        this.stream(status, source).then(resolve, reject);
      });
    });
  }

  // A complete body goes to the transport in one write. The transport holds
  // whatever the peer cannot take yet until it drains; only streamed bodies
  // wait on writability.
  private writeFull(status: number, body: Uint8Array): void {
    if (this.closed || !this.connection.transport.isActive) {
      this.options.logger.debug("Connection closed before response could be sent", this.describe(status));
      return;
    }

    if (!this.headers.has(HeaderNames.CONTENT_LENGTH) && !isBodylessStatus(status)) {
      this.headers.set("Content-Length", body.length);
    }
    const keepAlive = this.prepareConnectionHeader(true);
    try {
      this.runHooks();
    } catch (error) {
      this.hookFailed(status, error);
      return;
    }

    const head = encodeResponseHead(this.request.version, status, this.headers);
    const data = this.omitsBody(status) || body.length === 0 ? head : Buffer.concat([head, body]);
    this.discardUnreadBody();

    void this.send(data).then((ok) => {
      if (ok) this.connection.loop.execute(() => this.finish(status, keepAlive));
    });
    this.connection.transport.flush();
  }

  private async stream(status: number, source: AsyncIterable<Uint8Array>): Promise<void> {
    if (this.closed || !this.connection.transport.isActive) {
      throw ConnectionError.closed();
    }

    const omitBody = this.omitsBody(status);
    const declared = this.headers.has(HeaderNames.CONTENT_LENGTH);
    const chunked = !omitBody && !declared && this.request.version === "HTTP/1.1";
    if (chunked) {
      this.headers.set("Transfer-Encoding", "chunked");
    }
    const keepAlive = this.prepareConnectionHeader(omitBody || declared || chunked);
    try {
      this.runHooks();
    } catch (error) {
      this.hookFailed(status, error);
      throw error;
    }

    let written = this.send(encodeResponseHead(this.request.version, status, this.headers));
    this.connection.transport.flush();
    this.discardUnreadBody();

    const iterator = source[Symbol.asyncIterator]();
    try {
      while (true) {
        await this.whenWritable();
        const next = await iterator.next();
        if (this.closed) throw ConnectionError.closed();
        if (next.done) break;
        if (omitBody || next.value.length === 0) continue;

        written = this.send(chunked ? encodeChunk(next.value) : next.value);
        this.connection.transport.flush();
      }
      if (chunked) {
        written = this.send(LAST_CHUNK);
        this.connection.transport.flush();
      }
    } catch (error) {
      await iterator.return?.();
      if (!this.closed) {
        // The head is already out; the only way to signal failure is to close.
        this.connection.closeWith("error");
      }
      throw error;
    }

    if (!(await written)) {
      throw ConnectionError.closed();
    }
    this.connection.loop.execute(() => this.finish(status, keepAlive));
  }

  // ==========================================================================
  // Transport notifications
  // ==========================================================================

  /** The transport became writable or unwritable. */
  onWritabilityChanged(): void {
    if (!this.connection.transport.isWritable) {
      if (this.writableWaiters.length > 0) this.producerPaused = true;
      return;
    }
    this.producerPaused = false;
    const waiters = this.writableWaiters;
    this.writableWaiters = [];
    for (const waiter of waiters) waiter.resolve();
  }

  /** The connection closed. Idempotent. */
  onConnectionClosed(): void {
    if (this.closed) return;
    this.closed = true;
    this.producerPaused = false;

    const waiters = this.writableWaiters;
    this.writableWaiters = [];
    for (const waiter of waiters) waiter.reject(ConnectionError.closed());

    const transmitted = this.flag.isSet;
    if (!transmitted) {
      this.options.logger.debug("Connection closed before a response was sent", this.describe());
    }
    for (const listener of this.closeListeners) listener({ transmitted });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private onLoop(task: () => void): void {
    if (this.connection.loop.inLoop) {
      task();
    } else {
      this.connection.loop.execute(task);
    }
  }

  private whenWritable(): Promise<void> {
    if (this.closed) return Promise.reject(ConnectionError.closed());
    if (this.connection.transport.isWritable) {
      this.producerPaused = false;
      return Promise.resolve();
    }
    this.producerPaused = true;
    return new Promise((resolve, reject) => {
      this.writableWaiters.push({ resolve, reject });
    });
  }

  /** Resolves true once written, false if the write failed (the failure is routed to the connection). */
  private send(data: Uint8Array): Promise<boolean> {
    return this.connection.transport.write(data).then(
      () => true,
      (error: unknown) => {
        if (!this.writeFailed) {
          this.writeFailed = true;
          this.connection.dispatch(TransportEvents.error(error));
        }
        return false;
      },
    );
  }

  private finish(status: number, keepAlive: boolean): void {
    if (this.finished) return;
    this.finished = true;

    const attributes = this.connection.attributes;
    if (attributes.responseTransmitter === this) {
      attributes.responseTransmitter = undefined;
    }

    const outcome: ResponseOutcome = {
      status,
      keepAlive,
      duration: this.options.clock.now() - this.request.timestamp,
    };
    for (const listener of this.finishListeners) listener(outcome);

    if (!keepAlive) {
      this.connection.closeWith("complete");
    }
  }

  /**
   * Decide whether the connection survives this exchange and set the
   * connection header to match. A body that is neither length-delimited nor
   * chunked can only be ended by closing.
   */
  private prepareConnectionHeader(framed: boolean): boolean {
    const keepAlive =
      framed &&
      !this.forceClose &&
      isKeepAlive(this.request.version, this.request.headers) &&
      !this.headers.containsToken(HeaderNames.CONNECTION, "close");

    if (!keepAlive) {
      this.headers.set("Connection", "close");
    } else if (this.request.version === "HTTP/1.0") {
      this.headers.set("Connection", "keep-alive");
    }
    return keepAlive;
  }

  private omitsBody(status: number): boolean {
    return this.request.method === "HEAD" || isBodylessStatus(status);
  }

  private runHooks(): void {
    const hooks = this.hooks;
    this.hooks = [];
    for (const hook of hooks) hook();
  }

  /** A beforeSend hook threw: nothing is on the wire yet, so send a 500 instead and close. */
  private hookFailed(status: number, error: unknown): void {
    this.options.logger.error("Response hook failed", { ...this.describe(status), ...errorMeta(error) });
    this.forceClose = true;
    this.discardUnreadBody();

    const failure = HttpStatus.INTERNAL_SERVER_ERROR;
    void this.send(encodeFailureResponse(failure)).then(() => {
      this.connection.loop.execute(() => {
        this.connection.closeWith("error");
        this.finish(failure, false);
      });
    });
    this.connection.transport.flush();
  }

  private discardUnreadBody(): void {
    if (this.accumulator && !this.accumulator.isComplete) {
      this.accumulator.discard();
    }
  }

  private describe(status?: number): Record<string, unknown> {
    return {
      method: this.request.method,
      uri: this.request.uri,
      ...(status === undefined ? {} : { status }),
    };
  }
}
