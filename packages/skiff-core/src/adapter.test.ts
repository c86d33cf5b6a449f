import { describe, expect, it } from "vitest";

import {
  DecoderError,
  HttpHeaders,
  bodyFragment,
  invalidRequestHead,
  lastBodyFragment,
  rawMessage,
  requestHead,
} from "@skiff/wire";

import { AttributeKey } from "./attributes.ts";
import { resolveServerConfig } from "./config.ts";
import { ConnectionError } from "./errors.ts";
import type { Application, Exchange } from "./exchange.ts";
import type { Request } from "./request.ts";
import { ManualClock, connect, settle } from "./test-support.ts";
import { type SecuritySession, TransportEvents } from "./transport.ts";

const enc = new TextEncoder();
const dec = new TextDecoder();

function app(handler: (exchange: Exchange) => Promise<void> | void): Application {
  return {
    execute: async (exchange) => {
      await handler(exchange);
    },
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const session: SecuritySession = {
  protocol: "TLSv1.3",
  cipher: "TLS_AES_256_GCM_SHA384",
  authorized: true,
  authorizationError: null,
  peerCertificate: null,
};

describe("HttpConnectionAdapter", () => {
  it("serves a bodiless GET without creating a body accumulator", async () => {
    let seen: Request | undefined;
    const h = connect(
      app((exchange) => {
        seen = exchange.request;
        exchange.response.send("hi");
      }),
    );

    h.deliver(requestHead("GET", "/foo"));
    expect(h.connection.attributes.bodyAccumulator).toBeUndefined();
    h.deliver(lastBodyFragment());
    await settle();

    expect(seen?.body).toBeNull();
    expect(seen?.hasBody).toBe(false);
    expect(h.transport.output).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain;charset=UTF-8\r\nContent-Length: 2\r\n\r\nhi",
    );
    expect(h.connection.attributes.responseTransmitter).toBeUndefined();
    expect(h.transport.isActive).toBe(true);
  });

  it("keeps at most one read outstanding", async () => {
    const h = connect(app((exchange) => void exchange.response.send("ok")));
    expect(h.transport.reads).toBe(1);

    h.deliver(requestHead("GET", "/"), lastBodyFragment());
    await settle();

    // One for open, one re-issued after the terminal fragment.
    expect(h.transport.reads).toBe(2);
    expect(h.connection.attributes.readPending).toBe(true);
  });

  it("assembles a POST body delivered in two fragments", async () => {
    let body = "";
    let declared = 0;
    const h = connect(
      app(async (exchange) => {
        declared = exchange.request.body?.contentLength ?? 0;
        body = (await exchange.request.body?.text()) ?? "";
        exchange.response.send(`got ${body.length}`);
      }),
    );

    h.deliver(requestHead("POST", "/upload", "HTTP/1.1", new HttpHeaders([["Content-Length", "10"]])));
    expect(h.connection.attributes.bodyAccumulator).toBeDefined();

    h.deliver(bodyFragment(enc.encode("0123")));
    h.deliver(lastBodyFragment(enc.encode("456789")));
    expect(h.connection.attributes.bodyAccumulator).toBeUndefined();
    await settle();

    expect(declared).toBe(10);
    expect(body).toBe("0123456789");
    expect(h.transport.output).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain;charset=UTF-8\r\nContent-Length: 6\r\n\r\ngot 10",
    );
  });

  it("creates a body accumulator for a chunked request", () => {
    const h = connect(app(() => new Promise<void>(() => {})));
    h.deliver(requestHead("POST", "/c", "HTTP/1.1", new HttpHeaders([["Transfer-Encoding", "chunked"]])));
    expect(h.connection.attributes.bodyAccumulator?.contentLength).toBe(-1);
  });

  it("pauses transport reads when an unread body fills the buffer", () => {
    const config = resolveServerConfig({ bodyHighWatermark: 4, bodyLowWatermark: 2 });
    const h = connect(app(() => new Promise<void>(() => {})), { config });

    h.deliver(requestHead("PUT", "/big", "HTTP/1.1", new HttpHeaders([["Content-Length", "10"]])));
    h.deliver(bodyFragment(enc.encode("01234")));

    expect(h.transport.pauses).toBe(1);
    expect(h.connection.attributes.readPending).toBe(false);
  });

  it("exposes request details", async () => {
    const clock = new ManualClock(5_000);
    let seen: Request | undefined;
    const h = connect(
      app((exchange) => {
        seen = exchange.request;
        clock.advance(5);
        exchange.response.send("");
      }),
      { clock },
    );

    h.deliver(requestHead("GET", "/search?q=skiff&n=2"), lastBodyFragment());
    await settle();

    expect(seen).toMatchObject({
      timestamp: 5_000,
      method: "GET",
      uri: "/search?q=skiff&n=2",
      path: "/search",
      query: "q=skiff&n=2",
      version: "HTTP/1.1",
      remoteAddress: { host: "127.0.0.1", port: 50123 },
      localAddress: { host: "127.0.0.1", port: 8080 },
      securitySession: null,
    });
    expect(Object.isFrozen(seen)).toBe(true);
    expect(h.logger.messages("debug")).toContain("← GET /search?q=skiff&n=2: 200 5ms");
  });

  it("shares typed attributes across requests on one connection", async () => {
    const visits = new AttributeKey<number>("visits");
    const counts: number[] = [];
    const h = connect(
      app((exchange) => {
        const next = (exchange.connection.get(visits) ?? 0) + 1;
        exchange.connection.set(visits, next);
        counts.push(next);
        exchange.response.send("");
      }),
    );

    h.deliver(requestHead("GET", "/1"), lastBodyFragment());
    await settle();
    h.deliver(requestHead("GET", "/2"), lastBodyFragment());
    await settle();

    expect(counts).toEqual([1, 2]);
  });

  describe("when the application sends nothing", () => {
    it("responds 500 with the diagnostic in development", async () => {
      const config = resolveServerConfig({ development: true });
      const h = connect(
        app((exchange) => {
          exchange.handlerDescription = "fooHandler";
          exchange.response.headers.set("X-Leftover", "1");
        }),
        { config },
      );

      h.deliver(requestHead("GET", "/foo"), lastBodyFragment());
      await settle();

      const message = "No response sent for GET request to /foo (last handler: fooHandler)";
      expect(h.logger.messages("warn")).toEqual([message]);
      expect(h.transport.output).toBe(
        "HTTP/1.1 500 Internal Server Error\r\n" +
          "Content-Type: text/plain;charset=UTF-8\r\n" +
          `Content-Length: ${message.length}\r\n\r\n` +
          message,
      );
      expect(h.connection.attributes.responseTransmitter).toBeUndefined();
    });

    it("responds 500 with an empty body in production", async () => {
      const h = connect(app(() => {}));

      h.deliver(requestHead("GET", "/foo"), lastBodyFragment());
      await settle();

      expect(h.logger.messages("warn")).toEqual(["No response sent for GET request to /foo"]);
      expect(h.transport.output).toBe("HTTP/1.1 500 Internal Server Error\r\nContent-Length: 0\r\n\r\n");
      expect(h.transport.written).toHaveLength(1);
    });

    it("logs a failed execution before responding 500", async () => {
      const h = connect(
        app(() => {
          throw new Error("handler blew up");
        }),
      );

      h.deliver(requestHead("DELETE", "/item/1"), lastBodyFragment());
      await h.connection.attributes.execution;
      await settle();

      expect(h.logger.messages("error")).toEqual(["Request execution failed"]);
      expect(h.logger.entries.find((e) => e.level === "error")?.meta).toMatchObject({
        method: "DELETE",
        uri: "/item/1",
        error: { message: "handler blew up" },
      });
      expect(h.logger.messages("warn")).toEqual(["No response sent for DELETE request to /item/1"]);
      expect(h.transport.output.startsWith("HTTP/1.1 500 Internal Server Error\r\n")).toBe(true);
    });

    it("does not respond at all once the connection closed", async () => {
      const gate = deferred();
      const h = connect(app(() => gate.promise));

      h.deliver(requestHead("GET", "/slow"), lastBodyFragment());
      h.transport.isActive = false;
      h.connection.dispatch(TransportEvents.close());
      gate.resolve();
      await settle();

      expect(h.logger.messages("warn")).toEqual([]);
      expect(h.transport.written).toEqual([]);
      expect(h.connection.attributes.closureReason).toBe("peer");
    });
  });

  it("answers a request that failed to decode with 400 and logs only at debug", async () => {
    let executed = false;
    const h = connect(
      app(() => {
        executed = true;
      }),
    );

    h.deliver(invalidRequestHead(DecoderError.malformed("invalid request line: GARBAGE")));
    await settle();

    expect(executed).toBe(false);
    expect(h.transport.output).toBe(
      "HTTP/1.1 400 Bad Request\r\n" +
        "Content-Type: text/plain;charset=UTF-8\r\n" +
        "Content-Length: 26\r\n" +
        "Connection: close\r\n\r\n" +
        "Failure: 400 Bad Request\r\n",
    );
    expect(h.transport.closes).toBe(1);
    expect(h.logger.entries.filter((e) => e.level !== "debug")).toEqual([]);
    expect(h.logger.messages("debug")).toContain("Failed to decode HTTP request.");
    expect(h.connection.attributes.closureReason).toBe("error");
  });

  it("fails the body reader when the connection closes mid-body", async () => {
    let failure: unknown;
    let sent: boolean | undefined;
    const h = connect(
      app(async (exchange) => {
        try {
          await exchange.request.body?.readAll();
        } catch (error) {
          failure = error;
          sent = exchange.response.send("too late");
        }
      }),
    );

    h.deliver(requestHead("POST", "/upload", "HTTP/1.1", new HttpHeaders([["Content-Length", "10"]])));
    h.deliver(bodyFragment(enc.encode("0123")));
    h.transport.isActive = false;
    h.connection.dispatch(TransportEvents.close());
    await settle();

    expect(failure).toMatchObject({ kind: "closedEarly", message: "connection closed before body complete" });
    expect(sent).toBe(false);
    expect(h.transport.written).toEqual([]);
  });

  it("closes an idle connection and records why", () => {
    const h = connect(app(() => {}));
    h.connection.dispatch(TransportEvents.idle());

    expect(h.transport.closes).toBe(1);
    expect(h.connection.attributes.closureReason).toBe("idle");
    const closed = h.logger.entries.find((e) => e.message === "Connection closed");
    expect(closed?.meta).toMatchObject({ reason: "idle" });
  });

  describe("exceptions", () => {
    it("closes quietly on a peer reset", () => {
      const h = connect(app(() => {}));
      h.connection.dispatch(
        TransportEvents.error(Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" })),
      );

      expect(h.logger.entries.filter((e) => e.level !== "debug")).toEqual([]);
      expect(h.transport.written).toEqual([]);
      expect(h.transport.closes).toBe(1);
      expect(h.connection.attributes.closureReason).toBe("peer");
    });

    it("treats 'Connection reset by peer' as ignorable in any case", () => {
      const h = connect(app(() => {}));
      h.connection.dispatch(TransportEvents.error(ConnectionError.io("CONNECTION RESET BY PEER")));
      expect(h.logger.messages("error")).toEqual([]);
      expect(h.transport.written).toEqual([]);
    });

    it("sends 500 through the in-flight transmitter on an unexpected error", async () => {
      const h = connect(app(() => new Promise<void>(() => {})));
      h.deliver(requestHead("GET", "/"), lastBodyFragment());

      h.connection.dispatch(TransportEvents.error(new Error("boom")));
      await settle();

      expect(h.logger.messages("error")).toEqual(["Unhandled connection error"]);
      expect(h.transport.output).toBe(
        "HTTP/1.1 500 Internal Server Error\r\n" +
          "Content-Type: text/plain;charset=UTF-8\r\n" +
          "Content-Length: 36\r\n" +
          "Connection: close\r\n\r\n" +
          "Failure: 500 Internal Server Error\r\n",
      );
      expect(h.transport.closes).toBe(1);
      expect(h.connection.attributes.closureReason).toBe("error");
    });

    it("writes a bare failure response when no request is in flight", async () => {
      const h = connect(app(() => {}));
      h.connection.dispatch(TransportEvents.error(new Error("boom")));
      await settle();

      expect(h.transport.output.startsWith("HTTP/1.1 500 Internal Server Error\r\n")).toBe(true);
      expect(h.transport.closes).toBe(1);
    });

    it("only closes when the response is already on the wire", async () => {
      const gate = deferred();
      let streamFailure: unknown;
      async function* partial(): AsyncGenerator<Uint8Array> {
        yield enc.encode("partial");
        await gate.promise;
      }
      const h = connect(
        app((exchange) => {
          exchange.response.sendStream(partial()).catch((error: unknown) => {
            streamFailure = error;
          });
        }),
      );
      h.deliver(requestHead("GET", "/stream"), lastBodyFragment());
      await settle();
      const before = h.transport.written.length;

      h.connection.dispatch(TransportEvents.error(new Error("boom")));
      gate.resolve();
      await settle();

      expect(h.transport.written.length).toBe(before);
      expect(h.transport.closes).toBe(1);
      expect(streamFailure).toMatchObject({ kind: "closed" });
    });

    it("logs mid-stream decode failures at the configured level", async () => {
      const failure = DecoderError.malformed("invalid chunk size: zz");

      const info = connect(app(() => {}), { config: resolveServerConfig({ decodingErrorLevel: "info" }) });
      info.connection.dispatch(TransportEvents.error(failure));
      expect(info.logger.messages("info")).toEqual(["invalid chunk size: zz"]);
      expect(info.logger.messages("error")).toEqual([]);

      const silent = connect(app(() => {}), { config: resolveServerConfig({ decodingErrorLevel: "silent" }) });
      silent.connection.dispatch(TransportEvents.error(failure));
      expect(silent.logger.entries.filter((e) => e.level !== "debug")).toEqual([]);

      const full = connect(app(() => {}), { config: resolveServerConfig({ decodingErrorLevel: "full" }) });
      full.connection.dispatch(TransportEvents.error(failure));
      expect(full.logger.messages("error")).toEqual(["Unhandled connection error"]);

      await settle();
      expect(silent.transport.output.startsWith("HTTP/1.1 500 Internal Server Error\r\n")).toBe(true);
    });
  });

  it("answers pipelined requests in order", async () => {
    const started: string[] = [];
    const gates = new Map<string, () => void>();
    const h = connect(
      app(async (exchange) => {
        const uri = exchange.request.uri;
        started.push(uri);
        await new Promise<void>((resolve) => gates.set(uri, resolve));
        exchange.response.send(uri);
      }),
    );

    h.deliver(requestHead("GET", "/a"), lastBodyFragment(), requestHead("GET", "/b"), lastBodyFragment());

    expect(started).toEqual(["/a"]);
    expect(h.connection.attributes.held).toHaveLength(2);
    expect(h.transport.pauses).toBe(1);

    gates.get("/a")?.();
    await settle();
    expect(started).toEqual(["/a", "/b"]);
    expect(h.connection.attributes.held).toHaveLength(0);

    gates.get("/b")?.();
    await settle();
    const head = "HTTP/1.1 200 OK\r\nContent-Type: text/plain;charset=UTF-8\r\nContent-Length: 2\r\n\r\n";
    expect(h.transport.output).toBe(`${head}/a${head}/b`);
  });

  it("keeps reads paused when a replayed request body fills its buffer", async () => {
    const config = resolveServerConfig({ bodyHighWatermark: 4, bodyLowWatermark: 1 });
    const gates = new Map<string, () => void>();
    const h = connect(
      app(async (exchange) => {
        const uri = exchange.request.uri;
        await new Promise<void>((resolve) => gates.set(uri, resolve));
        if (uri === "/one") {
          exchange.response.send("one");
          return;
        }
        await exchange.request.body?.read();
        await exchange.request.body?.read();
      }),
      { config },
    );

    h.deliver(
      requestHead("GET", "/one"),
      lastBodyFragment(),
      requestHead("POST", "/two", "HTTP/1.1", new HttpHeaders([["Content-Length", "20"]])),
      bodyFragment(enc.encode("aaaaaaaa")),
      bodyFragment(enc.encode("bbbbbbbb")),
    );
    expect(h.transport.reads).toBe(2);
    expect(h.transport.pauses).toBe(1);

    gates.get("/one")?.();
    await settle();

    const accumulator = h.connection.attributes.bodyAccumulator;
    expect(accumulator?.isPaused).toBe(true);
    expect(accumulator?.bufferedBytes).toBe(16);
    expect(h.transport.pauses).toBe(2);
    expect(h.transport.reads).toBe(2);

    gates.get("/two")?.();
    await settle();
    expect(accumulator?.isPaused).toBe(false);
    expect(h.transport.reads).toBe(3);
  });

  it("answers 500 and closes when a beforeSend hook throws", async () => {
    const h = connect(
      app((exchange) => {
        exchange.response.beforeSend(() => {
          throw new Error("hook failed");
        });
        exchange.response.send("hi");
      }),
    );

    h.deliver(requestHead("GET", "/hooked"), lastBodyFragment());
    await settle();

    expect(h.transport.output).toBe(
      "HTTP/1.1 500 Internal Server Error\r\n" +
        "Content-Type: text/plain;charset=UTF-8\r\n" +
        "Content-Length: 36\r\n" +
        "Connection: close\r\n\r\n" +
        "Failure: 500 Internal Server Error\r\n",
    );
    expect(h.transport.isActive).toBe(false);
    expect(h.connection.attributes.closureReason).toBe("error");
    expect(h.logger.messages("error")).toEqual(["Response hook failed"]);
  });

  it("hands the connection to a raw subscriber on takeover", async () => {
    const received: string[] = [];
    const h = connect(
      app(async (exchange) => {
        const raw = exchange.takeover((message) => {
          if (message.tag === "Raw") received.push(dec.decode(message.payload));
        });
        await raw.write(enc.encode("HTTP/1.1 101 Switching Protocols\r\n\r\n"));
      }),
    );

    h.deliver(requestHead("GET", "/ws"), lastBodyFragment());
    await settle();
    h.deliver(rawMessage(enc.encode("frame-1")));

    expect(received).toEqual(["frame-1"]);
    expect(h.transport.output).toBe("HTTP/1.1 101 Switching Protocols\r\n\r\n");
    expect(h.connection.attributes.responseTransmitter).toBeUndefined();
    expect(h.logger.messages("warn")).toEqual([]);
  });

  it("refuses takeover after a response was sent", async () => {
    let failure: unknown;
    const h = connect(
      app((exchange) => {
        exchange.response.send("done");
        try {
          exchange.takeover(() => {});
        } catch (error) {
          failure = error;
        }
      }),
    );
    h.deliver(requestHead("GET", "/"), lastBodyFragment());
    await settle();
    expect(failure).toMatchObject({ kind: "alreadyTransmitted" });
  });

  it("drops raw messages nobody subscribed to", () => {
    const h = connect(app(() => {}));
    h.deliver(rawMessage(enc.encode("stray")));
    expect(h.logger.messages("debug")).toContain("Dropping raw message with no subscriber");
  });

  it("keeps the TLS session when a client certificate was requested", async () => {
    const sessions: Array<SecuritySession | null> = [];
    const h = connect(
      app((exchange) => {
        sessions.push(exchange.request.securitySession);
        exchange.response.send("");
      }),
    );

    h.connection.dispatch(TransportEvents.handshake({ success: true, peerAuthentication: "need", session }));
    h.deliver(requestHead("GET", "/"), lastBodyFragment());
    await settle();

    expect(sessions).toEqual([session]);
    expect(h.connection.securitySession).toBe(session);
  });

  it("ignores the TLS session when no client certificate was requested", () => {
    const h = connect(app(() => {}));
    h.connection.dispatch(TransportEvents.handshake({ success: true, peerAuthentication: "none", session }));
    expect(h.connection.securitySession).toBeNull();
  });

  it("forwards writability changes to a streaming response", async () => {
    async function* hello(): AsyncGenerator<Uint8Array> {
      yield enc.encode("hello");
    }
    const h = connect(app((exchange) => exchange.response.sendStream(hello())));
    h.transport.isWritable = false;

    h.deliver(requestHead("GET", "/s"), lastBodyFragment());
    await settle();
    expect(h.transport.output).toBe("HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n");

    h.transport.isWritable = true;
    h.connection.dispatch(TransportEvents.writabilityChanged());
    await settle();
    expect(h.transport.output).toBe(
      "HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n5\r\nhello\r\n0\r\n\r\n",
    );
  });

  it("releases connection state on close", () => {
    const h = connect(app(() => new Promise<void>(() => {})));
    h.deliver(requestHead("POST", "/", "HTTP/1.1", new HttpHeaders([["Content-Length", "3"]])));
    h.transport.isActive = false;
    h.connection.dispatch(TransportEvents.close());

    expect(h.connection.attributes.bodyAccumulator).toBeUndefined();
    expect(h.connection.attributes.responseTransmitter).toBeUndefined();
    expect(h.connection.attributes.closureReason).toBe("peer");
  });
});
