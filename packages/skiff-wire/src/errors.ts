// Decoder errors.

/**
 * Failure to decode inbound HTTP bytes.
 *
 * `cause` carries the underlying problem (a malformed chunk size, an
 * oversized line); callers use its presence to tell protocol garbage apart
 * from internal faults.
 */
export class DecoderError extends Error {
  constructor(
    public kind: "malformed" | "tooLong",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DecoderError";
  }

  static malformed(detail: string): DecoderError {
    return new DecoderError("malformed", `malformed HTTP message: ${detail}`, {
      cause: new Error(detail),
    });
  }

  static tooLong(what: string, limit: number): DecoderError {
    const detail = `${what} is larger than ${limit} bytes`;
    return new DecoderError("tooLong", `HTTP message too long: ${detail}`, {
      cause: new Error(detail),
    });
  }
}
