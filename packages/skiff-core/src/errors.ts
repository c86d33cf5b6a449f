// Error types raised by the connection engine.

/** Error during connection handling. */
export class ConnectionError extends Error {
  constructor(
    public kind: "io" | "closed" | "protocol",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static io(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("io", message, { cause });
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed");
  }

  static protocol(message: string): ConnectionError {
    return new ConnectionError("protocol", message);
  }
}

/** Error surfaced to whoever is reading a request body. */
export class BodyError extends Error {
  constructor(
    public kind: "closedEarly" | "tooLarge" | "alreadyReading" | "discarded",
    message: string,
  ) {
    super(message);
    this.name = "BodyError";
  }

  static closedEarly(): BodyError {
    return new BodyError("closedEarly", "connection closed before body complete");
  }

  static tooLarge(limit: number): BodyError {
    return new BodyError("tooLarge", `request body is larger than ${limit} bytes`);
  }

  static alreadyReading(): BodyError {
    return new BodyError("alreadyReading", "a read of this body is already pending");
  }

  static discarded(): BodyError {
    return new BodyError("discarded", "request body was discarded after the response was sent");
  }
}

/** Misuse of a response that has already been committed. */
export class ResponseError extends Error {
  constructor(
    public kind: "alreadyTransmitted",
    message: string,
  ) {
    super(message);
    this.name = "ResponseError";
  }

  static alreadyTransmitted(): ResponseError {
    return new ResponseError("alreadyTransmitted", "response already transmitted");
  }
}
