import { invalidHandshakeError } from "../../errors/index.ts";
import { MsgHandshake, encodeFrame } from "./frame.ts";

export const DEFAULT_ROWS = 24;
export const DEFAULT_COLS = 80;

/** What the client asked the session to run, decided once at handshake time. */
export type SessionCommand =
  | { kind: "interactive" }
  | { kind: "shell-line"; line: string }
  | { kind: "exec"; argv: string[] };

export interface HandshakeRequest {
  token?: string;
  rows: number;
  cols: number;
  command: SessionCommand;
}

/** Wire shape of the Handshake payload, as the client sends it. */
export interface HandshakePayload {
  token?: string;
  rows?: number;
  cols?: number;
  cmd?: string | string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseDimension(name: string, value: unknown, fallback: number): number {
  if (value === undefined || value === null) return fallback;
  const num = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isInteger(num) || num <= 0) {
    throw invalidHandshakeError(`"${name}" must be a positive integer`);
  }
  return num;
}

function parseCommand(value: unknown): SessionCommand {
  if (value === undefined || value === null) return { kind: "interactive" };

  if (typeof value === "string") {
    return value.length > 0 ? { kind: "shell-line", line: value } : { kind: "interactive" };
  }

  if (Array.isArray(value)) {
    if (value.length === 0) return { kind: "interactive" };
    const argv = value.map((part) => {
      if (typeof part === "string") return part;
      if (typeof part === "number" || typeof part === "boolean") return String(part);
      throw invalidHandshakeError(`"cmd" elements must be strings`);
    });
    return { kind: "exec", argv };
  }

  throw invalidHandshakeError(`"cmd" must be a string or an array of strings`);
}

export function parseHandshake(payload: Buffer): HandshakeRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString("utf8"));
  } catch (error) {
    throw invalidHandshakeError(error instanceof Error ? error.message : String(error));
  }

  if (!isRecord(parsed)) {
    throw invalidHandshakeError("Handshake payload must be a JSON object");
  }

  const { token } = parsed;
  if (token !== undefined && token !== null && typeof token !== "string") {
    throw invalidHandshakeError(`"token" must be a string`);
  }

  return {
    ...(typeof token === "string" && { token }),
    rows: parseDimension("rows", parsed.rows, DEFAULT_ROWS),
    cols: parseDimension("cols", parsed.cols, DEFAULT_COLS),
    command: parseCommand(parsed.cmd),
  };
}

export function encodeHandshake(payload: HandshakePayload): Buffer {
  const hello: HandshakePayload = {};
  if (payload.rows !== undefined) hello.rows = payload.rows;
  if (payload.cols !== undefined) hello.cols = payload.cols;
  if (payload.token) hello.token = payload.token;
  if (payload.cmd !== undefined && payload.cmd.length > 0) hello.cmd = payload.cmd;
  return encodeFrame(MsgHandshake, JSON.stringify(hello));
}
