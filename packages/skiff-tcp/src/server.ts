// Listening server over net or tls.

import net from "node:net";
import tls from "node:tls";

import {
  type Application,
  type Clock,
  type HandshakeCompletion,
  type Logger,
  type ServerConfig,
  type SocketAddress,
  HttpConnectionAdapter,
  createLogger,
  errorMeta,
} from "@skiff/core";

import { HttpConnection } from "./connection.ts";
import { completedHandshake, peerAuthenticationFor } from "./tls.ts";

export interface ServerOptions {
  application: Application;
  config?: ServerConfig;
  clock?: Clock;
  /** Logger for the connection adapter. */
  logger?: Logger;
  /** Serve HTTPS with these options instead of plain HTTP. */
  tls?: tls.TlsOptions;
}

/**
 * An HTTP/1.1 server. One adapter is shared by all connections; each
 * accepted socket gets its own HttpConnection.
 */
export class Server {
  readonly adapter: HttpConnectionAdapter;
  private server: net.Server;
  private connections = new Set<HttpConnection>();
  private logger = createLogger({ namespace: "skiff:tcp" });

  constructor(options: ServerOptions) {
    this.adapter = new HttpConnectionAdapter({
      application: options.application,
      config: options.config,
      clock: options.clock,
      logger: options.logger,
    });

    const tlsOptions = options.tls;
    if (tlsOptions) {
      const peerAuthentication = peerAuthenticationFor(tlsOptions);
      const server = tls.createServer(tlsOptions);
      server.on("secureConnection", (socket: tls.TLSSocket) => {
        this.accept(socket, completedHandshake(socket, peerAuthentication));
      });
      server.on("tlsClientError", (error: Error, socket: tls.TLSSocket) => {
        this.logger.debug("TLS handshake failed", errorMeta(error));
        socket.destroy();
      });
      this.server = server;
    } else {
      this.server = net.createServer((socket) => this.accept(socket));
    }
  }

  get listening(): boolean {
    return this.server.listening;
  }

  /** Number of open connections. */
  get connectionCount(): number {
    return this.connections.size;
  }

  /** Start listening. Port 0 picks a free port; the bound address is returned. */
  listen(port = 0, host = "127.0.0.1"): Promise<SocketAddress> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once("error", onError);
      this.server.listen(port, host, () => {
        this.server.off("error", onError);
        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new Error(`unexpected server address: ${String(address)}`));
          return;
        }
        this.logger.info("Listening", { host: address.address, port: address.port });
        resolve({ host: address.address, port: address.port, family: address.family });
      });
    });
  }

  /** Stop accepting, close open connections, and resolve once everything is closed. */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
      for (const connection of this.connections) {
        connection.close();
      }
    });
  }

  private accept(socket: net.Socket, handshake?: HandshakeCompletion): void {
    const connection = new HttpConnection(socket, this.adapter, handshake);
    this.connections.add(connection);
    socket.once("close", () => {
      this.connections.delete(connection);
    });
  }
}
