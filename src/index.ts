// Package entry point: re-exports the public API.

// Building blocks
export { createTermlinkServer } from "./context.ts";
export type { TermlinkContext, TermlinkServerOptions } from "./context.ts";
export type { TermlinkHooks, SessionEndReason } from "./hooks.ts";
export { definePlugin } from "./plugin.ts";
export type { TermlinkPlugin } from "./plugin.ts";
export type { TermlinkLogger } from "./termlink-logger.ts";
export { createDefaultLogger, createSilentLogger } from "./termlink-logger.ts";

export { termlinkPaths } from "./paths.ts";
export type { TermlinkPaths } from "./paths.ts";
export {
  loadServerConfig,
  loadClientConfig,
  parsePort,
  parseTarget,
  DEFAULT_PORT,
  HANDSHAKE_TIMEOUT_MS,
} from "./config.ts";
export type { ServerConfig, ClientConfig, ServerFlags, ClientFlags } from "./config.ts";

// Wire protocol
export {
  MsgData,
  MsgResize,
  MsgExit,
  MsgHandshake,
  MsgError,
  encodeFrame,
  decodeFrame,
  FrameDecoder,
  FrameReader,
  encodeData,
  encodeResize,
  parseResize,
  encodeExit,
  encodeError,
  parseHandshake,
  encodeHandshake,
  DEFAULT_MAX_PAYLOAD,
} from "./lib/protocol/index.ts";
export type {
  Frame,
  WindowSize,
  HandshakeRequest,
  HandshakePayload,
  SessionCommand,
} from "./lib/protocol/index.ts";

// Server side
export { Listener } from "./lib/server/listener.ts";
export { ConnectionHandler } from "./lib/server/connection.ts";
export type { ConnectionState } from "./lib/server/connection.ts";
export { PtySession } from "./lib/pty/session.ts";
export type { PtySessionOptions, PtySessionListeners } from "./lib/pty/session.ts";
export type {
  PtyProcess,
  PtyFactory,
  PtyFactoryOptions,
  PtyExit,
  PtySessionState,
  IDisposable,
} from "./lib/pty/types.ts";

// Client side
export { TerminalBridge, resolveCommand, findExecutable } from "./lib/shell/index.ts";
export type {
  TerminalBridgeOptions,
  TerminalIo,
  BridgeResult,
  BridgeEndReason,
} from "./lib/shell/index.ts";

export { PidFile } from "./lib/pid-file.ts";
export { daemonize } from "./lib/daemon.ts";
export { safeKill, isProcessAlive, safeEqual, withTimeout } from "./lib/utils.ts";

export {
  initTermlinkLogger,
  createCommandLogger,
  getOutputMode,
} from "./lib/logger/index.ts";
export type { OutputMode, CommandLogger } from "./lib/logger/index.ts";

export {
  TermlinkError,
  ProtocolError,
  HandshakeError,
  SessionError,
  TransportError,
  TerminalError,
  ValidationError,
  DaemonError,
  handleCommandError,
} from "./errors/index.ts";
export type { TermlinkErrorCode } from "./errors/index.ts";
