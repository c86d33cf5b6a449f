// Incremental HTTP/1.1 request decoder.
//
// Bytes are fed as they arrive from the socket; complete messages are emitted
// in order. A request head that cannot be parsed is reported as an invalid
// RequestHead (the caller answers 400); framing errors inside a body surface
// as a thrown DecoderError. Either way the decoder stops decoding for good.

import { HttpHeaders, HeaderNames } from "./headers.ts";
import { DecoderError } from "./errors.ts";
import {
  type InboundMessage,
  requestHead,
  invalidRequestHead,
  bodyFragment,
  lastBodyFragment,
} from "./types.ts";

export interface DecoderOptions {
  /** Longest accepted request line or chunk-size line. Defaults to 4096. */
  maxInitialLineLength?: number;
  /** Largest accepted header section, excluding the request line. Defaults to 8192. */
  maxHeaderSize?: number;
  /** Body bytes are emitted in fragments of at most this size. Defaults to 8192. */
  maxChunkSize?: number;
}

export const DEFAULT_DECODER_OPTIONS: Required<DecoderOptions> = {
  maxInitialLineLength: 4096,
  maxHeaderSize: 8192,
  maxChunkSize: 8192,
};

/**
 * Receives each decoded message. Returning `false` stops decoding once the
 * messages already produced from the current bytes (a head and its empty
 * terminal fragment) are delivered; bytes not yet decoded stay buffered and
 * can be taken with `takeBuffered()`.
 */
export type MessageSink = (message: InboundMessage) => boolean | void;

type DecoderState =
  | { kind: "head" }
  | { kind: "fixed"; remaining: number }
  | { kind: "chunkSize" }
  | { kind: "chunkData"; remaining: number }
  | { kind: "chunkDataEnd" }
  | { kind: "trailer" }
  | { kind: "bad" };

const CRLF = Buffer.from("\r\n", "latin1");
const HEAD_END = Buffer.from("\r\n\r\n", "latin1");
const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const VERSION = /^HTTP\/\d\.\d$/;
const EMPTY = Buffer.alloc(0);

type Framing = { kind: "none" } | { kind: "fixed"; length: number } | { kind: "chunked" };

export class RequestDecoder {
  private buf: Buffer = EMPTY;
  private state: DecoderState = { kind: "head" };
  private readonly options: Required<DecoderOptions>;

  constructor(options: DecoderOptions = {}) {
    this.options = { ...DEFAULT_DECODER_OPTIONS, ...options };
  }

  /** True once a decode failure has been seen; later input is ignored. */
  get isBad(): boolean {
    return this.state.kind === "bad";
  }

  /**
   * Decode `chunk` (appended to any buffered bytes), passing each complete
   * message to `emit`.
   *
   * @throws DecoderError on a framing error inside a body
   */
  decode(chunk: Uint8Array, emit: MessageSink): void {
    if (this.state.kind === "bad") return;

    this.buf = this.buf.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buf, chunk]);

    try {
      while (true) {
        const messages = this.step();
        if (messages === null) return;
        let stop = false;
        for (const message of messages) {
          if (emit(message) === false) stop = true;
        }
        if (stop) return;
      }
    } catch (e) {
      this.state = { kind: "bad" };
      this.buf = EMPTY;
      throw e;
    }
  }

  /** Remove and return bytes not yet decoded (used when a connection is taken over). */
  takeBuffered(): Uint8Array {
    const rest = new Uint8Array(this.buf);
    this.buf = EMPTY;
    return rest;
  }

  /**
   * Advance the state machine once. Returns null when more input is needed,
   * otherwise the messages produced by this step (possibly none).
   */
  private step(): InboundMessage[] | null {
    const state = this.state;
    switch (state.kind) {
      case "head":
        return this.decodeHead();
      case "fixed": {
        const data = this.takeBody(state.remaining);
        if (data === null) return null;
        const remaining = state.remaining - data.length;
        this.state = remaining === 0 ? { kind: "head" } : { kind: "fixed", remaining };
        return [bodyFragment(data, remaining === 0)];
      }
      case "chunkSize":
        return this.decodeChunkSize();
      case "chunkData": {
        const data = this.takeBody(state.remaining);
        if (data === null) return null;
        const remaining = state.remaining - data.length;
        this.state = remaining === 0 ? { kind: "chunkDataEnd" } : { kind: "chunkData", remaining };
        return [bodyFragment(data, false)];
      }
      case "chunkDataEnd":
        if (this.buf.length < 2) return null;
        if (this.buf[0] !== 0x0d || this.buf[1] !== 0x0a) {
          throw DecoderError.malformed("missing CRLF after chunk data");
        }
        this.buf = this.buf.subarray(2);
        this.state = { kind: "chunkSize" };
        return [];
      case "trailer":
        return this.decodeTrailer();
      case "bad":
        return null;
    }
  }

  private decodeHead(): InboundMessage[] | null {
    // Tolerate stray CRLFs between pipelined requests.
    let skip = 0;
    while (skip < this.buf.length && (this.buf[skip] === 0x0d || this.buf[skip] === 0x0a)) {
      skip++;
    }
    if (skip > 0) this.buf = this.buf.subarray(skip);

    const { maxInitialLineLength, maxHeaderSize } = this.options;
    const end = this.buf.indexOf(HEAD_END);
    if (end === -1) {
      const lineEnd = this.buf.indexOf(CRLF);
      if (lineEnd === -1 && this.buf.length > maxInitialLineLength) {
        return this.failHead(DecoderError.tooLong("An HTTP line", maxInitialLineLength));
      }
      if (this.buf.length > maxInitialLineLength + maxHeaderSize + 4) {
        return this.failHead(DecoderError.tooLong("HTTP header", maxHeaderSize));
      }
      return null;
    }

    const text = this.buf.subarray(0, end).toString("latin1");
    this.buf = this.buf.subarray(end + 4);

    const lines = text.split("\r\n");
    const requestLine = lines[0];
    if (requestLine.length > maxInitialLineLength) {
      return this.failHead(DecoderError.tooLong("An HTTP line", maxInitialLineLength));
    }
    if (text.length - requestLine.length > maxHeaderSize) {
      return this.failHead(DecoderError.tooLong("HTTP header", maxHeaderSize));
    }

    const parts = requestLine.split(" ");
    if (parts.length !== 3) {
      return this.failHead(DecoderError.malformed(`invalid request line: ${requestLine}`));
    }
    const [method, uri, version] = parts;
    if (!TOKEN.test(method)) {
      return this.failHead(DecoderError.malformed(`invalid method: ${method}`));
    }
    if (uri.length === 0) {
      return this.failHead(DecoderError.malformed("empty request target"));
    }
    if (!VERSION.test(version)) {
      return this.failHead(DecoderError.malformed(`invalid version: ${version}`));
    }
    if (version !== "HTTP/1.0" && version !== "HTTP/1.1") {
      return this.failHead(DecoderError.malformed(`unsupported version: ${version}`));
    }

    const headers = new HttpHeaders();
    for (let i = 1; i < lines.length; i++) {
      const line = lines[i];
      if (line.startsWith(" ") || line.startsWith("\t")) {
        return this.failHead(DecoderError.malformed("obsolete header line folding"));
      }
      const colon = line.indexOf(":");
      const name = colon > 0 ? line.slice(0, colon) : "";
      if (!TOKEN.test(name)) {
        return this.failHead(DecoderError.malformed(`invalid header line: ${line}`));
      }
      headers.add(name, line.slice(colon + 1).trim());
    }

    const framing = this.framing(headers);
    if (framing instanceof DecoderError) {
      return this.failHead(framing);
    }

    const head = requestHead(method, uri, version, headers);
    switch (framing.kind) {
      case "chunked":
        this.state = { kind: "chunkSize" };
        return [head];
      case "fixed":
        this.state = { kind: "fixed", remaining: framing.length };
        return [head];
      case "none":
        // Bodiless requests still end with a terminal fragment, so every
        // request finishes the same way for the consumer.
        return [head, lastBodyFragment()];
    }
  }

  private framing(headers: HttpHeaders): Framing | DecoderError {
    const codings = headers
      .getAll(HeaderNames.TRANSFER_ENCODING)
      .flatMap((v) => v.split(","))
      .map((v) => v.trim().toLowerCase())
      .filter((v) => v.length > 0);
    if (codings.length > 0) {
      if (codings[codings.length - 1] !== "chunked") {
        return DecoderError.malformed(`unsupported transfer-encoding: ${codings.join(", ")}`);
      }
      // Transfer-encoding overrides any content-length.
      headers.delete(HeaderNames.CONTENT_LENGTH);
      return { kind: "chunked" };
    }

    const lengths = headers
      .getAll(HeaderNames.CONTENT_LENGTH)
      .flatMap((v) => v.split(","))
      .map((v) => v.trim());
    if (lengths.length === 0) {
      return { kind: "none" };
    }
    if (!lengths.every((v) => /^\d+$/.test(v)) || new Set(lengths).size !== 1) {
      return DecoderError.malformed(`invalid content-length: ${lengths.join(", ")}`);
    }
    const length = Number(lengths[0]);
    if (!Number.isSafeInteger(length)) {
      return DecoderError.malformed(`invalid content-length: ${lengths[0]}`);
    }
    return length === 0 ? { kind: "none" } : { kind: "fixed", length };
  }

  private decodeChunkSize(): InboundMessage[] | null {
    const lineEnd = this.buf.indexOf(CRLF);
    if (lineEnd === -1) {
      if (this.buf.length > this.options.maxInitialLineLength) {
        throw DecoderError.tooLong("A chunk size line", this.options.maxInitialLineLength);
      }
      return null;
    }
    const line = this.buf.subarray(0, lineEnd).toString("latin1");
    this.buf = this.buf.subarray(lineEnd + 2);

    const sizeText = line.split(";")[0].trim();
    if (!/^[0-9a-fA-F]{1,8}$/.test(sizeText)) {
      throw DecoderError.malformed(`invalid chunk size: ${sizeText}`);
    }
    const size = parseInt(sizeText, 16);
    this.state = size === 0 ? { kind: "trailer" } : { kind: "chunkData", remaining: size };
    return [];
  }

  private decodeTrailer(): InboundMessage[] | null {
    const lineEnd = this.buf.indexOf(CRLF);
    if (lineEnd === -1) {
      if (this.buf.length > this.options.maxHeaderSize) {
        throw DecoderError.tooLong("HTTP trailer", this.options.maxHeaderSize);
      }
      return null;
    }
    this.buf = this.buf.subarray(lineEnd + 2);
    if (lineEnd > 0) {
      // Trailer fields are not exposed.
      return [];
    }
    this.state = { kind: "head" };
    return [lastBodyFragment()];
  }

  /** Up to `remaining` body bytes (bounded by maxChunkSize), or null if none are buffered. */
  private takeBody(remaining: number): Uint8Array | null {
    if (this.buf.length === 0) return null;
    const n = Math.min(remaining, this.buf.length, this.options.maxChunkSize);
    const data = new Uint8Array(this.buf.subarray(0, n));
    this.buf = this.buf.subarray(n);
    return data;
  }

  private failHead(error: DecoderError): InboundMessage[] {
    this.state = { kind: "bad" };
    this.buf = EMPTY;
    return [invalidRequestHead(error)];
  }
}
