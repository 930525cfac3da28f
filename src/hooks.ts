import type { HandshakeErrorCode } from "./errors/index.ts";

export type SessionEndReason =
  | "pty-exit"
  | "pty-write-failed"
  | "client-exit"
  | "disconnected"
  | "protocol-error"
  | "server-shutdown";

export interface TermlinkHooks {
  // Connection lifecycle
  "connection:open": (params: { id: string; remoteAddress: string }) => void | Promise<void>;
  "connection:close": (params: { id: string; remoteAddress: string }) => void | Promise<void>;
  "handshake:reject": (params: {
    id: string;
    code: HandshakeErrorCode;
  }) => void | Promise<void>;

  // Session lifecycle
  "session:start": (params: {
    id: string;
    pid: number;
    argv: string[];
    rows: number;
    cols: number;
  }) => void | Promise<void>;
  "session:resize": (params: { id: string; rows: number; cols: number }) => void | Promise<void>;
  "session:end": (params: { id: string; reason: SessionEndReason }) => void | Promise<void>;
}
