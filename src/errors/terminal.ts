import type { TerminalErrorCode } from "./codes.ts";
import { TermlinkError } from "./base.ts";

export class TerminalError extends TermlinkError {
  constructor(code: TerminalErrorCode, options: { message: string; cause?: Error }) {
    super(code, options);
    this.name = "TerminalError";
  }
}

export const rawModeError = (cause: unknown): TerminalError =>
  new TerminalError("ERR_TERMINAL_RAW_MODE", {
    message: `Could not switch the terminal to raw mode: ${cause instanceof Error ? cause.message : String(cause)}`,
    cause: cause instanceof Error ? cause : undefined,
  });
