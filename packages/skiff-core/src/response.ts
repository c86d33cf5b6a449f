// The application's side of a response.

import { type HttpHeaders, HeaderNames, HttpStatus, PLAIN_TEXT_UTF8 } from "@skiff/wire";

import type { CloseEvent, ResponseTransmitter } from "./transmitter.ts";

const EMPTY = new Uint8Array(0);
const encoder = new TextEncoder();

/**
 * Status and headers are mutable until the response is sent. Sending goes
 * through the request's transmitter, so only the first send takes effect.
 */
export class Response {
  status: number = HttpStatus.OK;

  constructor(private transmitter: ResponseTransmitter) {}

  get headers(): HttpHeaders {
    return this.transmitter.headers;
  }

  /** True once a response has been sent for this request. */
  get committed(): boolean {
    return this.transmitter.isTransmitted;
  }

  contentType(value: string): this {
    this.headers.set("Content-Type", value);
    return this;
  }

  /** Register a hook that runs just before the head is written. */
  beforeSend(hook: (response: Response) => void): this {
    this.transmitter.beforeSend(() => hook(this));
    return this;
  }

  /** Notified if the connection closes while this exchange is current. */
  onClose(listener: (event: CloseEvent) => void): this {
    this.transmitter.onClose(listener);
    return this;
  }

  /**
   * Send the response with a complete body. Strings are sent as UTF-8 and
   * default to text/plain.
   *
   * @returns false if a response was already sent or the connection closed
   */
  send(body: string | Uint8Array = EMPTY): boolean {
    if (typeof body === "string") {
      if (!this.committed && !this.headers.has(HeaderNames.CONTENT_TYPE)) {
        this.headers.set("Content-Type", PLAIN_TEXT_UTF8);
      }
      return this.transmitter.transmit(this.status, encoder.encode(body));
    }
    return this.transmitter.transmit(this.status, body);
  }

  /** Send the response with a body pulled from `source`. */
  sendStream(source: AsyncIterable<Uint8Array>): Promise<void> {
    return this.transmitter.transmitStream(this.status, source);
  }
}
