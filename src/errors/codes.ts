export type ProtocolErrorCode = "ERR_PROTOCOL_TRUNCATED" | "ERR_PROTOCOL_FRAME_TOO_LARGE";

export type HandshakeErrorCode =
  | "ERR_HANDSHAKE_TIMEOUT"
  | "ERR_HANDSHAKE_UNEXPECTED_FRAME"
  | "ERR_HANDSHAKE_INVALID_JSON"
  | "ERR_HANDSHAKE_UNAUTHORIZED";

export type SessionErrorCode =
  | "ERR_SESSION_NO_SHELL"
  | "ERR_SESSION_SPAWN"
  | "ERR_SESSION_WRITE"
  | "ERR_SESSION_CLOSED";

export type TransportErrorCode = "ERR_TRANSPORT_CONNECT" | "ERR_TRANSPORT_SOCKET";

export type TerminalErrorCode = "ERR_TERMINAL_RAW_MODE";

export type ValidationErrorCode =
  | "ERR_VALIDATION_INTEGER"
  | "ERR_VALIDATION_PORT"
  | "ERR_VALIDATION_URL";

export type DaemonErrorCode = "ERR_DAEMON_RUNNING" | "ERR_DAEMON_NOT_RUNNING" | "ERR_DAEMON_SPAWN";

export type TermlinkErrorCode =
  | ProtocolErrorCode
  | HandshakeErrorCode
  | SessionErrorCode
  | TransportErrorCode
  | TerminalErrorCode
  | ValidationErrorCode
  | DaemonErrorCode;
