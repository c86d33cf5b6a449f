// Request body accumulation with backpressure.
//
// The router feeds decoded fragments in with add(); the application reads
// them out through a RequestBody. Transport reads pause once too much is
// buffered and resume when the reader catches up.

import type { BodyFragment } from "@skiff/wire";

import { BodyError } from "./errors.ts";

export type BodyState = "awaiting-demand" | "buffering" | "complete" | "closed-early" | "discarding";

/** Read control into the transport. */
export interface ReadControl {
  demandRead(): void;
  pauseRead(): void;
}

export interface BodyOptions {
  highWatermark: number;
  lowWatermark: number;
  maxContentLength: number;
}

interface Waiter {
  resolve(chunk: Uint8Array | null): void;
  reject(error: Error): void;
}

/**
 * Buffers the body of one request between the transport and its reader.
 *
 * Input completes when the declared length has arrived or the terminal
 * fragment is seen; the `onComplete` callback then fires once so the owner
 * can detach it. Bytes still buffered remain readable afterwards.
 */
export class RequestBodyAccumulator {
  private fragments: Uint8Array[] = [];
  private buffered = 0;
  private received = 0;
  private _state: BodyState = "awaiting-demand";
  private inputDone = false;
  private transportPaused = false;
  private readerPaused = false;
  private waiter: Waiter | null = null;
  private failure: BodyError | null = null;

  readonly body: RequestBody;

  /**
   * @param contentLength declared length, or -1 when the body is chunked
   * @param onComplete called once when all input has arrived
   */
  constructor(
    readonly contentLength: number,
    private control: ReadControl,
    private options: BodyOptions,
    private onComplete: () => void = () => {},
  ) {
    this.body = new RequestBody(this);
  }

  get state(): BodyState {
    return this._state;
  }

  /** Bytes received from the transport so far. */
  get receivedBytes(): number {
    return this.received;
  }

  /** Bytes received but not yet read. */
  get bufferedBytes(): number {
    return this.buffered;
  }

  /** Whether transport reads are currently paused by this body. */
  get isPaused(): boolean {
    return this.transportPaused;
  }

  get isComplete(): boolean {
    return this.inputDone;
  }

  // ==========================================================================
  // Transport side
  // ==========================================================================

  add(fragment: BodyFragment): void {
    if (this.inputDone || this._state === "closed-early") return;

    const data = fragment.data;
    this.received += data.length;
    const done =
      fragment.last || (this.contentLength >= 0 && this.received >= this.contentLength);

    if (this._state !== "discarding" && data.length > 0) {
      this.fragments.push(data);
      this.buffered += data.length;
    }

    if (done) {
      this.inputDone = true;
      this.transportPaused = false;
      if (this._state !== "discarding") this._state = "complete";
      this.onComplete();
    } else if (
      this._state !== "discarding" &&
      !this.transportPaused &&
      this.buffered >= this.options.highWatermark
    ) {
      this.transportPaused = true;
      this.control.pauseRead();
    }

    this.wake();
  }

  /** The connection closed. Fails the reader unless all input had arrived. */
  onClose(): void {
    if (this.inputDone || this._state === "closed-early") return;
    this._state = "closed-early";
    this.failure = BodyError.closedEarly();
    this.fragments = [];
    this.buffered = 0;
    this.wake();
  }

  /**
   * Drop the body: the response went out without it being read. Buffered
   * bytes are released and remaining input is read and thrown away.
   */
  discard(): void {
    if (this._state === "discarding" || this._state === "closed-early") return;
    this._state = "discarding";
    this.failure = BodyError.discarded();
    this.fragments = [];
    this.buffered = 0;
    this.wake();
    if (!this.inputDone && this.transportPaused) {
      this.transportPaused = false;
      this.control.demandRead();
    }
  }

  // ==========================================================================
  // Reader side
  // ==========================================================================

  /** Next buffered chunk, or null once the body is fully read. */
  read(): Promise<Uint8Array | null> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.waiter) return Promise.reject(BodyError.alreadyReading());
    if (this._state === "awaiting-demand") this._state = "buffering";

    const next = this.fragments.shift();
    if (next) {
      this.buffered -= next.length;
      this.maybeResume();
      return Promise.resolve(next);
    }
    if (this.inputDone) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
      this.maybeResume();
      if (!this.transportPaused) this.control.demandRead();
    });
  }

  pause(): void {
    this.readerPaused = true;
    if (!this.inputDone && !this.transportPaused && this._state !== "discarding") {
      this.transportPaused = true;
      this.control.pauseRead();
    }
  }

  resume(): void {
    this.readerPaused = false;
    this.maybeResume();
  }

  private maybeResume(): void {
    if (
      this.transportPaused &&
      !this.readerPaused &&
      !this.inputDone &&
      this.buffered <= this.options.lowWatermark
    ) {
      this.transportPaused = false;
      this.control.demandRead();
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    if (!waiter) return;

    if (this.failure) {
      this.waiter = null;
      waiter.reject(this.failure);
      return;
    }
    const next = this.fragments.shift();
    if (next) {
      this.waiter = null;
      this.buffered -= next.length;
      waiter.resolve(next);
      this.maybeResume();
      return;
    }
    if (this.inputDone) {
      this.waiter = null;
      waiter.resolve(null);
    }
  }

  /** Default limit for readAll(). */
  get maxContentLength(): number {
    return this.options.maxContentLength;
  }
}

/**
 * The application's handle on a request body.
 *
 * Read chunk by chunk with read() or `for await`, or all at once with
 * readAll(). Only one read may be pending at a time.
 */
export class RequestBody implements AsyncIterable<Uint8Array> {
  constructor(private accumulator: RequestBodyAccumulator) {}

  /** Declared length, or -1 when the body is chunked. */
  get contentLength(): number {
    return this.accumulator.contentLength;
  }

  get state(): BodyState {
    return this.accumulator.state;
  }

  read(): Promise<Uint8Array | null> {
    return this.accumulator.read();
  }

  /** Stop transport reads for this body until resume(). */
  pause(): void {
    this.accumulator.pause();
  }

  resume(): void {
    this.accumulator.resume();
  }

  /**
   * Read the whole body into one buffer.
   *
   * @throws BodyError tooLarge when the body exceeds `maxLength`
   */
  async readAll(maxLength = this.accumulator.maxContentLength): Promise<Uint8Array> {
    if (this.contentLength > maxLength) {
      throw BodyError.tooLarge(maxLength);
    }
    const parts: Uint8Array[] = [];
    let total = 0;
    for await (const chunk of this) {
      total += chunk.length;
      if (total > maxLength) {
        throw BodyError.tooLarge(maxLength);
      }
      parts.push(chunk);
    }
    return Buffer.concat(parts, total);
  }

  /** Read the whole body and decode it as UTF-8. */
  async text(maxLength?: number): Promise<string> {
    return new TextDecoder().decode(await this.readAll(maxLength));
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    while (true) {
      const chunk = await this.read();
      if (chunk === null) return;
      yield chunk;
    }
  }
}
