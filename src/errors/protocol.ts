import type { ErrorOptions } from "evlog";
import type { ProtocolErrorCode } from "./codes.ts";
import { TermlinkError } from "./base.ts";

export class ProtocolError extends TermlinkError {
  /** Bytes of the incomplete frame that were buffered when the stream ended. */
  readonly received?: number;

  constructor(code: ProtocolErrorCode, options: ErrorOptions & { received?: number }) {
    super(code, options);
    this.name = "ProtocolError";
    this.received = options.received;
  }

  /** True when the peer closed cleanly on a frame boundary. */
  get isCleanEof(): boolean {
    return this.code === "ERR_PROTOCOL_TRUNCATED" && this.received === 0;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...(this.received !== undefined && { received: this.received }) };
  }
}

export const truncatedFrameError = (received: number, expected: number): ProtocolError =>
  new ProtocolError("ERR_PROTOCOL_TRUNCATED", {
    received,
    message:
      received === 0
        ? "Stream closed before a frame header was received"
        : `Stream closed mid-frame (${received} of ${expected} bytes)`,
  });

export const frameTooLargeError = (length: number, maxPayload: number): ProtocolError =>
  new ProtocolError("ERR_PROTOCOL_FRAME_TOO_LARGE", {
    message: `Frame payload of ${length} bytes exceeds the ${maxPayload} byte limit`,
    why: "The peer sent a frame header declaring a payload larger than this reader accepts.",
  });
