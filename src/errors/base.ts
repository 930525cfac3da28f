import { EvlogError, type ErrorOptions } from "evlog";
import type { TermlinkErrorCode } from "./codes.ts";

export class TermlinkError extends EvlogError {
  readonly code: TermlinkErrorCode;

  constructor(code: TermlinkErrorCode, options: ErrorOptions) {
    super(options);
    this.name = "TermlinkError";
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), code: this.code };
  }
}
