export type {
  TermlinkErrorCode,
  ProtocolErrorCode,
  HandshakeErrorCode,
  SessionErrorCode,
  TransportErrorCode,
  TerminalErrorCode,
  ValidationErrorCode,
  DaemonErrorCode,
} from "./codes.ts";

export { TermlinkError } from "./base.ts";

export { ProtocolError, truncatedFrameError, frameTooLargeError } from "./protocol.ts";

export {
  HandshakeError,
  handshakeTimeoutError,
  unexpectedFrameError,
  invalidHandshakeError,
  unauthorizedError,
} from "./handshake.ts";

export {
  SessionError,
  noShellError,
  spawnFailedError,
  writeFailedError,
  sessionClosedError,
} from "./session.ts";

export { TransportError, connectFailedError, socketError } from "./transport.ts";

export { TerminalError, rawModeError } from "./terminal.ts";

export { ValidationError, invalidIntegerEnvError, invalidPortError, invalidUrlError } from "./validation.ts";

export {
  DaemonError,
  daemonRunningError,
  daemonNotRunningError,
  daemonSpawnError,
} from "./daemon.ts";

export { handleCommandError } from "./display.ts";
