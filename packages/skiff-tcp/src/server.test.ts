import net from "node:net";

import { afterEach, describe, expect, it } from "vitest";

import { type Application, resolveServerConfig, silentLogger } from "@skiff/core";

import { Server } from "./server.ts";

interface Client {
  send(text: string): void;
  waitFor(text: string): Promise<void>;
  /** Everything received, once the server closed the connection. */
  closed: Promise<string>;
}

function connectClient(port: number): Client {
  const socket = net.connect({ port, host: "127.0.0.1" });
  let received = "";
  let waiters: Array<{ text: string; resolve: () => void }> = [];

  socket.on("data", (chunk: Buffer) => {
    received += chunk.toString("latin1");
    const ready = waiters.filter((w) => received.includes(w.text));
    waiters = waiters.filter((w) => !received.includes(w.text));
    for (const waiter of ready) waiter.resolve();
  });

  const closed = new Promise<string>((resolve, reject) => {
    socket.on("error", reject);
    socket.on("close", () => resolve(received));
  });

  return {
    send: (text) => {
      socket.write(text);
    },
    waitFor: (text) =>
      new Promise<void>((resolve) => {
        if (received.includes(text)) resolve();
        else waiters.push({ text, resolve });
      }),
    closed,
  };
}

const echoUri: Application = {
  async execute(exchange) {
    exchange.response.send(exchange.request.uri);
  },
};

let server: Server | undefined;

async function start(application: Application, idleTimeoutMs = 0): Promise<number> {
  server = new Server({
    application,
    config: resolveServerConfig({ idleTimeoutMs }),
    logger: silentLogger,
  });
  const address = await server.listen();
  return address.port;
}

afterEach(async () => {
  if (server?.listening) {
    await server.close();
  }
  server = undefined;
});

describe("Server", () => {
  it("serves a request and closes when asked to", async () => {
    const port = await start({
      async execute(exchange) {
        exchange.response.send("hello");
      },
    });
    const client = connectClient(port);
    client.send("GET / HTTP/1.1\r\nHost: localhost\r\nConnection: close\r\n\r\n");

    expect(await client.closed).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain;charset=UTF-8\r\nContent-Length: 5\r\nConnection: close\r\n\r\nhello",
    );
  });

  it("hands the request body to the application", async () => {
    const port = await start({
      async execute(exchange) {
        const body = (await exchange.request.body?.text()) ?? "";
        exchange.response.send(body.toUpperCase());
      },
    });
    const client = connectClient(port);
    client.send("POST /echo HTTP/1.1\r\nContent-Length: 5\r\nConnection: close\r\n\r\nhel");
    client.send("lo");

    expect(await client.closed).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain;charset=UTF-8\r\nContent-Length: 5\r\nConnection: close\r\n\r\nHELLO",
    );
  });

  it("answers pipelined requests in order", async () => {
    const port = await start(echoUri);
    const client = connectClient(port);
    client.send("GET /a HTTP/1.1\r\n\r\nGET /b HTTP/1.1\r\nConnection: close\r\n\r\n");

    expect(await client.closed).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain;charset=UTF-8\r\nContent-Length: 2\r\n\r\n/a" +
        "HTTP/1.1 200 OK\r\nContent-Type: text/plain;charset=UTF-8\r\nContent-Length: 2\r\nConnection: close\r\n\r\n/b",
    );
  });

  it("rejects a malformed request with 400", async () => {
    const port = await start(echoUri);
    const client = connectClient(port);
    client.send("GARBAGE\r\n\r\n");

    expect(await client.closed).toBe(
      "HTTP/1.1 400 Bad Request\r\nContent-Type: text/plain;charset=UTF-8\r\nContent-Length: 26\r\nConnection: close\r\n\r\nFailure: 400 Bad Request\r\n",
    );
  });

  it("switches to raw bytes after a takeover", async () => {
    const dec = new TextDecoder();
    const enc = new TextEncoder();
    const port = await start({
      async execute(exchange) {
        const raw = exchange.takeover((message) => {
          if (message.tag !== "Raw") return;
          const text = dec.decode(message.payload);
          void raw.write(enc.encode(text.toUpperCase()));
          if (text.includes("bye")) raw.close();
        });
        void raw.write(
          enc.encode("HTTP/1.1 101 Switching Protocols\r\nUpgrade: echo\r\nConnection: Upgrade\r\n\r\n"),
        );
      },
    });
    const client = connectClient(port);
    client.send("GET /upgrade HTTP/1.1\r\nUpgrade: echo\r\nConnection: Upgrade\r\n\r\n");
    await client.waitFor("\r\n\r\n");
    client.send("ping");
    await client.waitFor("PING");
    client.send("bye");

    expect(await client.closed).toBe(
      "HTTP/1.1 101 Switching Protocols\r\nUpgrade: echo\r\nConnection: Upgrade\r\n\r\nPINGBYE",
    );
  });

  it("closes idle connections", async () => {
    const port = await start(echoUri, 50);
    const client = connectClient(port);
    expect(await client.closed).toBe("");
  });

  it("closes open connections on shutdown", async () => {
    const port = await start(echoUri);
    const client = connectClient(port);
    client.send("GET /keep HTTP/1.1\r\n\r\n");
    await client.waitFor("/keep");
    expect(server?.connectionCount).toBe(1);

    await Promise.all([server?.close(), client.closed]);
    expect(await client.closed).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain;charset=UTF-8\r\nContent-Length: 5\r\n\r\n/keep",
    );
  });
});
