import type { ErrorOptions } from "evlog";
import type { SessionErrorCode } from "./codes.ts";
import { TermlinkError } from "./base.ts";

export class SessionError extends TermlinkError {
  readonly argv?: string[];

  constructor(code: SessionErrorCode, options: ErrorOptions & { argv?: string[] }) {
    super(code, options);
    this.name = "SessionError";
    this.argv = options.argv;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...(this.argv !== undefined && { argv: this.argv }) };
  }
}

export const noShellError = (candidates: string[]): SessionError =>
  new SessionError("ERR_SESSION_NO_SHELL", {
    message: "no shell available",
    why: `None of these exist: ${candidates.join(", ")}`,
    fix: "Set TERMLINK_SHELL to an installed shell.",
  });

export const spawnFailedError = (argv: string[], cause: unknown): SessionError =>
  new SessionError("ERR_SESSION_SPAWN", {
    argv,
    message: `failed to start session: ${cause instanceof Error ? cause.message : String(cause)}`,
    cause: cause instanceof Error ? cause : undefined,
  });

export const writeFailedError = (cause: unknown): SessionError =>
  new SessionError("ERR_SESSION_WRITE", {
    message: `PTY write failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    cause: cause instanceof Error ? cause : undefined,
  });

export const sessionClosedError = (state: string): SessionError =>
  new SessionError("ERR_SESSION_CLOSED", {
    message: `PTY session is ${state}`,
  });
