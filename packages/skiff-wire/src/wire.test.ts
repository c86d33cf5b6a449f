import { describe, expect, it } from "vitest";

import { HttpHeaders, getContentLength } from "./headers.ts";
import { encodeResponseHead, encodeChunk, LAST_CHUNK, isKeepAlive } from "./encoder.ts";
import { reasonPhrase, describeStatus, isBodylessStatus } from "./status.ts";

const dec = new TextDecoder();

describe("HttpHeaders", () => {
  it("matches names case-insensitively and keeps the first casing", () => {
    const headers = new HttpHeaders();
    headers.add("X-Trace", "a");
    headers.add("x-trace", "b");

    expect(headers.get("X-TRACE")).toBe("a");
    expect(headers.getAll("x-trace")).toEqual(["a", "b"]);
    expect(headers.names()).toEqual(["X-Trace"]);
    expect([...headers]).toEqual([
      ["X-Trace", "a"],
      ["X-Trace", "b"],
    ]);
  });

  it("replaces values on set and empties on clear", () => {
    const headers = new HttpHeaders([["Content-Length", "3"]]);
    headers.set("content-length", 12);
    expect(headers.getAll("Content-Length")).toEqual(["12"]);

    headers.clear();
    expect(headers.size).toBe(0);
    expect(headers.get("content-length")).toBeNull();
  });

  it("finds comma-separated tokens", () => {
    const headers = new HttpHeaders([["Connection", "Upgrade, Keep-Alive"]]);
    expect(headers.containsToken("connection", "keep-alive")).toBe(true);
    expect(headers.containsToken("connection", "close")).toBe(false);
  });

  it("parses content-length with a default", () => {
    expect(getContentLength(new HttpHeaders([["Content-Length", "42"]]), -1)).toBe(42);
    expect(getContentLength(new HttpHeaders([["Content-Length", "x"]]), -1)).toBe(-1);
    expect(getContentLength(new HttpHeaders(), -1)).toBe(-1);
  });
});

describe("status", () => {
  it("has reason phrases for known and unknown codes", () => {
    expect(reasonPhrase(500)).toBe("Internal Server Error");
    expect(reasonPhrase(599)).toBe("Server Error");
    expect(describeStatus(400)).toBe("400 Bad Request");
  });

  it("knows which statuses carry no body", () => {
    expect(isBodylessStatus(204)).toBe(true);
    expect(isBodylessStatus(304)).toBe(true);
    expect(isBodylessStatus(200)).toBe(false);
  });
});

describe("encoder", () => {
  it("encodes a response head", () => {
    const headers = new HttpHeaders([
      ["Content-Type", "text/plain"],
      ["Content-Length", "5"],
    ]);
    expect(dec.decode(encodeResponseHead("HTTP/1.1", 200, headers))).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 5\r\n\r\n",
    );
  });

  it("frames chunks in hex", () => {
    const data = new Uint8Array(26).fill(0x61);
    expect(dec.decode(encodeChunk(data))).toBe(`1a\r\n${"a".repeat(26)}\r\n`);
    expect(encodeChunk(new Uint8Array(0)).length).toBe(0);
    expect(dec.decode(LAST_CHUNK)).toBe("0\r\n\r\n");
  });

  it("decides keep-alive from version and connection header", () => {
    expect(isKeepAlive("HTTP/1.1", new HttpHeaders())).toBe(true);
    expect(isKeepAlive("HTTP/1.1", new HttpHeaders([["Connection", "close"]]))).toBe(false);
    expect(isKeepAlive("HTTP/1.0", new HttpHeaders())).toBe(false);
    expect(isKeepAlive("HTTP/1.0", new HttpHeaders([["Connection", "Keep-Alive"]]))).toBe(true);
  });
});
