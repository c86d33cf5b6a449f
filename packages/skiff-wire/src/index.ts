// @skiff/wire - HTTP/1.1 message model and codec
//
// Turns request bytes into typed inbound messages and responses into bytes.

export {
  HttpHeaders,
  HeaderNames,
  PLAIN_TEXT_UTF8,
  getContentLength,
  type ReadonlyHttpHeaders,
} from "./headers.ts";

export { HttpStatus, reasonPhrase, describeStatus, isBodylessStatus } from "./status.ts";

export { DecoderError } from "./errors.ts";

export {
  type HttpVersion,
  type DecoderResult,
  type RequestHead,
  type BodyFragment,
  type RawMessage,
  type InboundMessage,
  DECODE_SUCCESS,
  requestHead,
  invalidRequestHead,
  bodyFragment,
  lastBodyFragment,
  rawMessage,
} from "./types.ts";

export {
  RequestDecoder,
  DEFAULT_DECODER_OPTIONS,
  type DecoderOptions,
  type MessageSink,
} from "./decoder.ts";

export { encodeResponseHead, encodeChunk, LAST_CHUNK, isKeepAlive } from "./encoder.ts";
