// Connection event router.
//
// One HttpConnectionAdapter serves every connection of a server. Each
// transport event is handled on the connection's loop: request heads become
// exchanges handed to the application, body fragments feed the request's
// accumulator, and every failure path ends in exactly one response or a
// closed connection.

import {
  type BodyFragment,
  type InboundMessage,
  type RequestHead,
  HeaderNames,
  HttpHeaders,
  HttpStatus,
  PLAIN_TEXT_UTF8,
  getContentLength,
} from "@skiff/wire";

import type { RawSubscriber } from "./attributes.ts";
import { RequestBodyAccumulator } from "./body.ts";
import { captureSecuritySession, classifyError } from "./classifier.ts";
import { type Clock, systemClock } from "./clock.ts";
import { type ServerConfig, defaultServerConfig } from "./config.ts";
import { Connection, type ConnectionHandler } from "./connection.ts";
import { ResponseError } from "./errors.ts";
import { type Application, type RawConnection, Exchange } from "./exchange.ts";
import { type Logger, createLogger, errorMeta } from "./logging.ts";
import { Request } from "./request.ts";
import { Response } from "./response.ts";
import { type ResponseOutcome, ResponseTransmitter, encodeFailureResponse } from "./transmitter.ts";
import type { ConnectionTransport, HandshakeCompletion, TransportEvent } from "./transport.ts";

const EMPTY = new Uint8Array(0);

export interface AdapterOptions {
  application: Application;
  config?: ServerConfig;
  clock?: Clock;
  logger?: Logger;
}

export class HttpConnectionAdapter implements ConnectionHandler {
  readonly config: ServerConfig;
  private application: Application;
  private clock: Clock;
  private logger: Logger;

  constructor(options: AdapterOptions) {
    this.application = options.application;
    this.config = options.config ?? defaultServerConfig();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger({ namespace: "skiff:connection" });
  }

  /** Set up state for a new transport. Dispatch its events through the returned connection. */
  connect(transport: ConnectionTransport): Connection {
    return new Connection(transport, this);
  }

  handle(connection: Connection, event: TransportEvent): void {
    switch (event.kind) {
      case "open":
        connection.demandRead();
        break;
      case "close":
        this.closed(connection);
        break;
      case "message":
        this.received(connection, event.message);
        break;
      case "writabilityChanged":
        connection.attributes.responseTransmitter?.onWritabilityChanged();
        break;
      case "idle":
        connection.closeWith("idle");
        break;
      case "handshake":
        this.handshakeCompleted(connection, event.completion);
        break;
      case "error":
        this.exceptionCaught(connection, event.error);
        break;
      default: {
        const unknown: never = event;
        throw new Error(`unhandled transport event: ${JSON.stringify(unknown)}`);
      }
    }
  }

  // ==========================================================================
  // Inbound messages
  // ==========================================================================

  private received(connection: Connection, message: InboundMessage): void {
    connection.readDelivered();
    const attributes = connection.attributes;

    // Pipelined: hold the next request, and everything after it, until the
    // current response is out.
    if (
      message.tag !== "Raw" &&
      attributes.rawSubscriber === undefined &&
      (attributes.held.length > 0 ||
        (message.tag === "RequestHead" && attributes.responseTransmitter !== undefined))
    ) {
      if (attributes.held.length === 0) {
        connection.pauseRead();
      }
      attributes.held.push(message);
      return;
    }

    this.route(connection, message);
  }

  private route(connection: Connection, message: InboundMessage): void {
    switch (message.tag) {
      case "RequestHead":
        this.newRequest(connection, message);
        break;
      case "BodyFragment":
        this.bodyFragment(connection, message);
        break;
      case "Raw": {
        const subscriber = connection.attributes.rawSubscriber;
        if (subscriber) {
          subscriber(message);
        } else {
          this.logger.debug("Dropping raw message with no subscriber", {
            bytes: message.payload.length,
          });
        }
        break;
      }
    }
  }

  private bodyFragment(connection: Connection, fragment: BodyFragment): void {
    const attributes = connection.attributes;
    attributes.bodyAccumulator?.add(fragment);
    if (fragment.last && attributes.held.length === 0) {
      connection.demandRead();
    }
  }

  private newRequest(connection: Connection, head: RequestHead): void {
    if (!head.decoderResult.ok) {
      this.logger.debug("Failed to decode HTTP request.", errorMeta(head.decoderResult.cause));
      this.sendError(connection, HttpStatus.BAD_REQUEST);
      return;
    }

    const attributes = connection.attributes;
    const contentLength = getContentLength(head.headers, -1);
    const hasBody = contentLength > 0 || head.headers.has(HeaderNames.TRANSFER_ENCODING);

    let accumulator: RequestBodyAccumulator | null = null;
    if (hasBody) {
      const created = new RequestBodyAccumulator(
        contentLength,
        connection,
        {
          highWatermark: this.config.bodyHighWatermark,
          lowWatermark: this.config.bodyLowWatermark,
          maxContentLength: this.config.maxContentLength,
        },
        () => {
          if (attributes.bodyAccumulator === created) {
            attributes.bodyAccumulator = undefined;
          }
        },
      );
      attributes.bodyAccumulator = created;
      accumulator = created;
    }

    const request = new Request({
      timestamp: this.clock.now(),
      method: head.method,
      uri: head.uri,
      version: head.version,
      headers: head.headers,
      remoteAddress: connection.remoteAddress,
      localAddress: connection.localAddress,
      serverConfig: this.config,
      body: accumulator ? accumulator.body : null,
      idleTimeout: connection.transport.idleTimeout,
      securitySession: connection.securitySession,
    });

    const transmitter = new ResponseTransmitter(connection, request, new HttpHeaders(), accumulator, {
      logger: this.logger,
      clock: this.clock,
    });
    transmitter.onFinished((outcome) => this.responseFinished(connection, request, outcome));
    attributes.responseTransmitter = transmitter;

    const exchange = new Exchange(request, new Response(transmitter), connection, (subscriber) =>
      this.takeover(connection, transmitter, subscriber),
    );
    attributes.execution = this.execute(connection, exchange, transmitter);
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  private execute(
    connection: Connection,
    exchange: Exchange,
    transmitter: ResponseTransmitter,
  ): Promise<void> {
    let execution: Promise<void>;
    try {
      execution = this.application.execute(exchange);
    } catch (error) {
      execution = Promise.reject(error);
    }

    return execution.then(
      () => this.executionComplete(connection, exchange, transmitter),
      (error: unknown) => {
        this.logger.error("Request execution failed", {
          method: exchange.request.method,
          uri: exchange.request.uri,
          ...errorMeta(error),
        });
        this.executionComplete(connection, exchange, transmitter);
      },
    );
  }

  /** Send a 500 if the application finished without responding. */
  private executionComplete(
    connection: Connection,
    exchange: Exchange,
    transmitter: ResponseTransmitter,
  ): void {
    if (transmitter.isTransmitted || transmitter.isConnectionClosed) return;

    const request = exchange.request;
    let message = `No response sent for ${request.method} request to ${request.uri}`;
    if (exchange.handlerDescription) {
      message += ` (last handler: ${exchange.handlerDescription})`;
    }
    this.logger.warn(message);

    const headers = transmitter.headers;
    headers.clear();
    let body = EMPTY;
    if (this.config.development) {
      body = Buffer.from(message, "utf8");
      headers.set("Content-Type", PLAIN_TEXT_UTF8);
    }
    headers.set("Content-Length", body.length);

    connection.loop.execute(() => {
      transmitter.transmit(HttpStatus.INTERNAL_SERVER_ERROR, body);
    });
  }

  private responseFinished(connection: Connection, request: Request, outcome: ResponseOutcome): void {
    this.logger.debug(`← ${request.method} ${request.uri}: ${outcome.status} ${outcome.duration}ms`, {
      type: "response",
      method: request.method,
      uri: request.uri,
      status: outcome.status,
      duration: outcome.duration,
    });
    if (outcome.keepAlive) {
      this.replayHeld(connection);
    }
  }

  /** Deliver held pipelined messages until the next request is in flight. */
  private replayHeld(connection: Connection): void {
    const attributes = connection.attributes;
    while (attributes.held.length > 0 && connection.transport.isActive) {
      const next = attributes.held[0];
      if (next.tag === "RequestHead" && attributes.responseTransmitter !== undefined) return;
      attributes.held.shift();
      this.route(connection, next);
    }
    // A replayed body that filled its buffer demands the next read itself once drained.
    if (!attributes.bodyAccumulator?.isPaused) {
      connection.demandRead();
    }
  }

  private takeover(
    connection: Connection,
    transmitter: ResponseTransmitter,
    subscriber: RawSubscriber,
  ): RawConnection {
    if (!transmitter.flag.testAndSet()) {
      throw ResponseError.alreadyTransmitted();
    }

    const install = () => {
      const attributes = connection.attributes;
      if (attributes.responseTransmitter === transmitter) {
        attributes.responseTransmitter = undefined;
      }
      if (attributes.held.length > 0) {
        this.logger.debug("Dropping messages decoded before takeover", { count: attributes.held.length });
        attributes.held = [];
      }
      attributes.rawSubscriber = subscriber;
      connection.demandRead();
    };
    if (connection.loop.inLoop) {
      install();
    } else {
      connection.loop.execute(install);
    }

    const transport = connection.transport;
    return {
      get isActive() {
        return transport.isActive;
      },
      write: (data) => {
        const written = transport.write(data);
        transport.flush();
        return written;
      },
      close: () => connection.closeWith("complete"),
    };
  }

  // ==========================================================================
  // Lifecycle and failures
  // ==========================================================================

  private closed(connection: Connection): void {
    const attributes = connection.attributes;
    attributes.closureReason ??= "peer";
    attributes.responseTransmitter?.onConnectionClosed();
    attributes.bodyAccumulator?.onClose();
    this.logger.debug("Connection closed", {
      reason: attributes.closureReason,
      remoteAddress: connection.remoteAddress,
    });
    attributes.release();
  }

  private handshakeCompleted(connection: Connection, completion: HandshakeCompletion): void {
    const session = captureSecuritySession(completion);
    if (session) {
      connection.attributes.securitySession = session;
    }
    if (!completion.success) {
      this.logger.debug("TLS handshake failed", errorMeta(completion.error));
    }
  }

  private exceptionCaught(connection: Connection, error: unknown): void {
    const disposition = classifyError(error, this.config.decodingErrorLevel);
    switch (disposition.kind) {
      case "ignore":
        connection.closeWith("peer");
        return;
      case "decode":
        this.logDecodeFailure(disposition.level, disposition.message);
        break;
      case "fatal":
        this.logger.error("Unhandled connection error", errorMeta(error));
        break;
    }

    if (connection.transport.isActive) {
      this.sendError(connection, HttpStatus.INTERNAL_SERVER_ERROR);
    }
  }

  private logDecodeFailure(level: "error" | "warn" | "info" | "silent", message: string): void {
    switch (level) {
      case "error":
        this.logger.error(message);
        break;
      case "warn":
        this.logger.warn(message);
        break;
      case "info":
        this.logger.info(message);
        break;
      case "silent":
        break;
    }
  }

  /**
   * Respond with a plain-text failure and close. Goes through the current
   * transmitter when there is one, so a response is never sent twice.
   */
  private sendError(connection: Connection, status: number): void {
    const attributes = connection.attributes;
    attributes.closureReason ??= "error";

    const transmitter = attributes.responseTransmitter;
    if (transmitter) {
      if (!transmitter.transmitError(status)) {
        connection.closeWith("error");
      }
      return;
    }

    const transport = connection.transport;
    const close = () => connection.loop.execute(() => connection.closeWith("error"));
    void transport.write(encodeFailureResponse(status)).then(close, close);
    transport.flush();
  }
}
