// HTTP/1.1 response encoding.

import { type ReadonlyHttpHeaders, HeaderNames } from "./headers.ts";
import { reasonPhrase } from "./status.ts";
import type { HttpVersion } from "./types.ts";

/** Encode a status line and header section, including the terminating blank line. */
export function encodeResponseHead(
  version: HttpVersion,
  status: number,
  headers: ReadonlyHttpHeaders,
): Uint8Array {
  let head = `${version} ${status} ${reasonPhrase(status)}\r\n`;
  for (const [name, value] of headers) {
    head += `${name}: ${value}\r\n`;
  }
  head += "\r\n";
  return Buffer.from(head, "latin1");
}

/** Frame `data` as one chunk of a chunked body. Empty input encodes to nothing. */
export function encodeChunk(data: Uint8Array): Uint8Array {
  if (data.length === 0) return new Uint8Array(0);
  return Buffer.concat([
    Buffer.from(`${data.length.toString(16)}\r\n`, "latin1"),
    data,
    Buffer.from("\r\n", "latin1"),
  ]);
}

/** Terminating zero-length chunk with an empty trailer. */
export const LAST_CHUNK: Uint8Array = Buffer.from("0\r\n\r\n", "latin1");

/**
 * Whether a message with these headers lets the connection persist.
 *
 * HTTP/1.1 persists unless `connection: close`; HTTP/1.0 only with
 * `connection: keep-alive`.
 */
export function isKeepAlive(version: HttpVersion, headers: ReadonlyHttpHeaders): boolean {
  const connection = headers
    .getAll(HeaderNames.CONNECTION)
    .flatMap((v) => v.split(","))
    .map((v) => v.trim().toLowerCase());
  if (connection.includes("close")) return false;
  if (version === "HTTP/1.1") return true;
  return connection.includes("keep-alive");
}
