// Error and security-session classification.

import { DecoderError } from "@skiff/wire";

import type { DecodingErrorLevel } from "./config.ts";
import { ConnectionError } from "./errors.ts";
import type { HandshakeCompletion, SecuritySession } from "./transport.ts";

export type ErrorDisposition =
  /** Expected teardown noise: no log, no response. */
  | { kind: "ignore" }
  /** A decode failure logged at `level` with just its cause's message. */
  | { kind: "decode"; level: Exclude<DecodingErrorLevel, "full">; message: string }
  /** Anything else: logged in full at error. */
  | { kind: "fatal" };

const IGNORABLE_CODES = new Set([
  "ECONNRESET",
  "EPIPE",
  "ERR_STREAM_DESTROYED",
  "ERR_STREAM_WRITE_AFTER_END",
]);

function indicatesPeerGone(message: string): boolean {
  const lower = message.toLowerCase();
  return lower.endsWith("connection reset by peer") || lower.includes("broken pipe");
}

/** Whether `error` only says the peer went away. */
export function isIgnorableError(error: unknown): boolean {
  if (error instanceof ConnectionError) {
    return error.kind === "closed" || (error.kind === "io" && indicatesPeerGone(error.message));
  }
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return IGNORABLE_CODES.has(error.code) || indicatesPeerGone(error.message);
  }
  return false;
}

export function classifyError(error: unknown, level: DecodingErrorLevel): ErrorDisposition {
  if (isIgnorableError(error)) {
    return { kind: "ignore" };
  }
  if (error instanceof DecoderError && error.cause instanceof Error && level !== "full") {
    return { kind: "decode", level, message: error.cause.message };
  }
  return { kind: "fatal" };
}

/** The session to keep from a handshake, if any: only when it succeeded and a peer certificate was asked for. */
export function captureSecuritySession(completion: HandshakeCompletion): SecuritySession | null {
  if (!completion.success || completion.peerAuthentication === "none") {
    return null;
  }
  return completion.session;
}
