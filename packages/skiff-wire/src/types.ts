// Inbound HTTP message types.
//
// The decoder turns bytes into a stream of these messages: one RequestHead per
// request, followed by BodyFragments, the last of which carries `last: true`.
// After a connection is taken over, bytes arrive undecoded as Raw messages.

import { HttpHeaders } from "./headers.ts";

export type HttpVersion = "HTTP/1.0" | "HTTP/1.1";

/** Outcome of decoding a request head. */
export type DecoderResult = { ok: true } | { ok: false; cause: Error };

export const DECODE_SUCCESS: DecoderResult = { ok: true };

// ============================================================================
// Messages
// ============================================================================

/**
 * Request line and headers of one request.
 *
 * A head whose `decoderResult` failed is a placeholder for bytes that could
 * not be parsed; its other fields are not meaningful.
 */
export interface RequestHead {
  tag: "RequestHead";
  method: string;
  uri: string;
  version: HttpVersion;
  headers: HttpHeaders;
  decoderResult: DecoderResult;
}

/** A slice of request body. The final fragment of a request has `last` set. */
export interface BodyFragment {
  tag: "BodyFragment";
  data: Uint8Array;
  last: boolean;
}

/** Undecoded inbound bytes, delivered once a connection has been taken over. */
export interface RawMessage {
  tag: "Raw";
  payload: Uint8Array;
}

export type InboundMessage = RequestHead | BodyFragment | RawMessage;

// ============================================================================
// Factory functions
// ============================================================================

const EMPTY = new Uint8Array(0);

export function requestHead(
  method: string,
  uri: string,
  version: HttpVersion = "HTTP/1.1",
  headers: HttpHeaders = new HttpHeaders(),
): RequestHead {
  return { tag: "RequestHead", method, uri, version, headers, decoderResult: DECODE_SUCCESS };
}

/** Placeholder head for a request that failed to decode. */
export function invalidRequestHead(cause: Error): RequestHead {
  return {
    tag: "RequestHead",
    method: "GET",
    uri: "/bad-request",
    version: "HTTP/1.0",
    headers: new HttpHeaders(),
    decoderResult: { ok: false, cause },
  };
}

export function bodyFragment(data: Uint8Array, last = false): BodyFragment {
  return { tag: "BodyFragment", data, last };
}

export function lastBodyFragment(data: Uint8Array = EMPTY): BodyFragment {
  return { tag: "BodyFragment", data, last: true };
}

export function rawMessage(payload: Uint8Array): RawMessage {
  return { tag: "Raw", payload };
}
