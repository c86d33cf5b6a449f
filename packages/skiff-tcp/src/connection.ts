// Drives one accepted socket: bytes in through the decoder, events into the
// connection adapter.

import type net from "node:net";

import {
  type Connection,
  type HandshakeCompletion,
  type HttpConnectionAdapter,
  TransportEvents,
} from "@skiff/core";
import { RequestDecoder, rawMessage } from "@skiff/wire";

import { SocketTransport } from "./transport.ts";

export class HttpConnection {
  readonly transport: SocketTransport;
  readonly connection: Connection;
  private decoder: RequestDecoder;

  /**
   * Start serving `socket`. Reads stay paused until the adapter asks for
   * data. Pass `handshake` for a TLS socket whose handshake already completed.
   */
  constructor(
    private socket: net.Socket,
    adapter: HttpConnectionAdapter,
    handshake?: HandshakeCompletion,
  ) {
    this.transport = new SocketTransport(socket, adapter.config.idleTimeoutMs);
    this.connection = adapter.connect(this.transport);
    this.decoder = new RequestDecoder(adapter.config.decoder);

    socket.pause();
    socket.on("data", (chunk: Buffer) => this.received(chunk));
    socket.on("drain", () => this.connection.dispatch(TransportEvents.writabilityChanged()));
    socket.on("timeout", () => this.connection.dispatch(TransportEvents.idle()));
    socket.on("error", (error: Error) => this.connection.dispatch(TransportEvents.error(error)));
    socket.on("close", () => this.connection.dispatch(TransportEvents.close()));

    this.connection.dispatch(TransportEvents.open());
    if (handshake) {
      this.connection.dispatch(TransportEvents.handshake(handshake));
    }
  }

  /** Close the connection from the server side. */
  close(): void {
    this.connection.loop.run(() => this.connection.closeWith("complete"));
  }

  private received(chunk: Buffer): void {
    if (this.connection.attributes.rawSubscriber) {
      this.deliverRaw(chunk);
      return;
    }

    try {
      this.decoder.decode(chunk, (message) => {
        this.connection.dispatch(TransportEvents.message(message));
        return this.connection.attributes.rawSubscriber === undefined;
      });
    } catch (error) {
      this.connection.dispatch(TransportEvents.error(error));
      return;
    }

    // Taken over mid-chunk: whatever followed the upgrade request is raw.
    if (this.connection.attributes.rawSubscriber) {
      this.deliverRaw(new Uint8Array(0));
    }
  }

  private deliverRaw(chunk: Uint8Array): void {
    const buffered = this.decoder.takeBuffered();
    const payload = buffered.length === 0 ? new Uint8Array(chunk) : Buffer.concat([buffered, chunk]);
    if (payload.length > 0) {
      this.connection.dispatch(TransportEvents.message(rawMessage(payload)));
    }
  }
}
