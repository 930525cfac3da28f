import type { ErrorOptions } from "evlog";
import type { TransportErrorCode } from "./codes.ts";
import { TermlinkError } from "./base.ts";

export class TransportError extends TermlinkError {
  readonly target?: string;

  constructor(code: TransportErrorCode, options: ErrorOptions & { target?: string }) {
    super(code, options);
    this.name = "TransportError";
    this.target = options.target;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...(this.target !== undefined && { target: this.target }) };
  }
}

export const connectFailedError = (target: string, cause: Error): TransportError =>
  new TransportError("ERR_TRANSPORT_CONNECT", {
    target,
    message: `Could not connect to ${target}: ${cause.message}`,
    fix: "Check that 'termlink serve' is running and reachable on that address.",
    cause,
  });

export const socketError = (cause: Error): TransportError =>
  new TransportError("ERR_TRANSPORT_SOCKET", {
    message: `Socket error: ${cause.message}`,
    cause,
  });
