import type { HandshakeErrorCode } from "./codes.ts";
import { TermlinkError } from "./base.ts";

/**
 * Handshake failures. The message is sent verbatim to the peer in an Error
 * frame, so it stays short and lowercase.
 */
export class HandshakeError extends TermlinkError {
  declare readonly code: HandshakeErrorCode;

  constructor(code: HandshakeErrorCode, options: { message: string; why?: string }) {
    super(code, options);
    this.name = "HandshakeError";
  }
}

export const handshakeTimeoutError = (timeoutMs: number): HandshakeError =>
  new HandshakeError("ERR_HANDSHAKE_TIMEOUT", {
    message: "handshake timeout",
    why: `No handshake frame arrived within ${timeoutMs}ms`,
  });

export const unexpectedFrameError = (type: number): HandshakeError =>
  new HandshakeError("ERR_HANDSHAKE_UNEXPECTED_FRAME", {
    message: "expected handshake frame",
    why: `First frame had type 0x${type.toString(16).padStart(2, "0")}`,
  });

export const invalidHandshakeError = (why: string): HandshakeError =>
  new HandshakeError("ERR_HANDSHAKE_INVALID_JSON", {
    message: "invalid handshake json",
    why,
  });

export const unauthorizedError = (): HandshakeError =>
  new HandshakeError("ERR_HANDSHAKE_UNAUTHORIZED", {
    message: "unauthorized",
  });
