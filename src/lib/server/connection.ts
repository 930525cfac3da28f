import type { Socket } from "node:net";
import type { TermlinkContext } from "../../context.ts";
import type { SessionEndReason } from "../../hooks.ts";
import {
  HandshakeError,
  ProtocolError,
  TermlinkError,
  handshakeTimeoutError,
  unauthorizedError,
  unexpectedFrameError,
} from "../../errors/index.ts";
import type { TermlinkLogger } from "../../termlink-logger.ts";
import {
  MsgData,
  MsgExit,
  MsgHandshake,
  MsgResize,
  encodeData,
  encodeError,
  encodeExit,
  frameTypeName,
  parseResize,
  type Frame,
} from "../protocol/frame.ts";
import { parseHandshake, type HandshakeRequest } from "../protocol/handshake.ts";
import { FrameReader } from "../protocol/reader.ts";
import { PtySession } from "../pty/session.ts";
import { childEnv, resolveCommand } from "../shell/resolve.ts";
import { safeEqual, withTimeout } from "../utils.ts";

/** How long a peer gets to close its side after we end ours. */
const CLOSE_GRACE_MS = 2_000;

export type ConnectionState = "handshaking" | "active" | "closed";

/**
 * Drives one accepted socket: handshake, then one PTY session pumped in both
 * directions until either side ends. Teardown runs exactly once.
 */
export class ConnectionHandler {
  readonly remoteAddress: string;
  private _state: ConnectionState = "handshaking";
  private _endReason: SessionEndReason | null = null;
  private session: PtySession | null = null;
  private outputPaused = false;
  private destroyTimer: NodeJS.Timeout | null = null;
  private readonly reader: FrameReader;
  private readonly log: TermlinkLogger;
  private readonly closed: Promise<void>;

  constructor(
    private readonly socket: Socket,
    private readonly ctx: TermlinkContext,
    readonly id: string,
  ) {
    this.remoteAddress = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;
    this.log = ctx.logger.withTag(this.remoteAddress);
    this.reader = new FrameReader(socket, { maxPayload: ctx.config.maxPayload });
    this.closed = new Promise((resolve) => {
      socket.once("close", () => {
        if (this.destroyTimer) clearTimeout(this.destroyTimer);
        this.finish("disconnected");
        this.ctx.hooks
          .callHook("connection:close", { id: this.id, remoteAddress: this.remoteAddress })
          .catch(this.hookFailed);
        resolve();
      });
    });
    socket.on("error", (error) => {
      this.log.debug("socket error:", error.message);
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  get endReason(): SessionEndReason | null {
    return this._endReason;
  }

  get sessionSize(): { rows: number; cols: number } | null {
    return this.session?.size ?? null;
  }

  /** Resolves once the socket is closed. Never rejects. */
  async run(): Promise<void> {
    this.log.debug("connection opened");
    this.ctx.hooks
      .callHook("connection:open", { id: this.id, remoteAddress: this.remoteAddress })
      .catch(this.hookFailed);

    let session: PtySession;
    try {
      const request = await this.handshake();
      session = this.spawn(request);
    } catch (error) {
      this.reject(error);
      await this.closed;
      return;
    }

    if (this._state !== "handshaking") {
      // torn down while the handshake was in flight
      session.close();
      await this.closed;
      return;
    }

    this.session = session;
    this.activate(session);
    await Promise.all([this.pumpSocket(session), this.closed]);
  }

  /** End the connection from outside, e.g. on server shutdown. */
  close(reason: SessionEndReason = "server-shutdown"): void {
    this.finish(reason);
  }

  private async handshake(): Promise<HandshakeRequest> {
    const { handshakeTimeoutMs, token } = this.ctx.config;
    const frame = await withTimeout(this.reader.read(), handshakeTimeoutMs, () =>
      handshakeTimeoutError(handshakeTimeoutMs),
    );

    if (frame.type !== MsgHandshake) throw unexpectedFrameError(frame.type);
    const request = parseHandshake(frame.payload);
    if (token && !safeEqual(request.token, token)) throw unauthorizedError();
    return request;
  }

  private spawn(request: HandshakeRequest): PtySession {
    const argv = resolveCommand(request.command, {
      shellOverride: this.ctx.config.shell,
      env: this.ctx.env,
    });
    return PtySession.spawn(this.ctx.ptyFactory, argv, {
      rows: request.rows,
      cols: request.cols,
      env: childEnv(this.ctx.env),
      cwd: this.ctx.config.cwd,
      logger: this.log,
    });
  }

  private reject(error: unknown): void {
    if (this._state !== "handshaking") return;
    this._state = "closed";
    this.reader.detach();

    if (error instanceof ProtocolError && error.code === "ERR_PROTOCOL_TRUNCATED") {
      this.log.debug("peer left before completing the handshake");
      this.closeSocket();
      return;
    }

    if (error instanceof HandshakeError) {
      this.log.warn(`handshake rejected: ${error.message}`);
      this.ctx.hooks.callHook("handshake:reject", { id: this.id, code: error.code }).catch(this.hookFailed);
    } else {
      this.log.error("could not start session:", error instanceof Error ? error.message : error);
    }

    const text = error instanceof TermlinkError ? error.message : "internal error";
    this.closeSocket(encodeError(text));
  }

  private activate(session: PtySession): void {
    this._state = "active";
    session.start({
      onData: (chunk) => this.forward(session, chunk),
      onEnd: (exit) => {
        this.log.debug(`session exited (code ${exit.exitCode})`);
        this.finish("pty-exit");
      },
    });

    const { rows, cols } = session.size;
    this.log.info(`session started: pid ${session.pid}, ${session.argv.join(" ")} (${cols}x${rows})`);
    this.ctx.hooks
      .callHook("session:start", { id: this.id, pid: session.pid, argv: session.argv, rows, cols })
      .catch(this.hookFailed);
  }

  /** PTY -> socket, pausing the PTY while the socket buffer is full. */
  private forward(session: PtySession, chunk: Buffer): void {
    if (this._state !== "active" || !this.socket.writable) return;
    const flushed = this.socket.write(encodeData(chunk));
    if (flushed || this.outputPaused) return;

    this.outputPaused = true;
    session.pause();
    this.socket.once("drain", () => {
      this.outputPaused = false;
      session.resume();
    });
  }

  /** socket -> PTY until a terminal condition. */
  private async pumpSocket(session: PtySession): Promise<void> {
    while (this._state === "active") {
      let frame: Frame;
      try {
        frame = await this.reader.read();
      } catch (error) {
        if (error instanceof ProtocolError && !error.isCleanEof) {
          this.log.warn(error.message);
          this.finish("protocol-error");
        } else {
          this.finish("disconnected");
        }
        return;
      }
      if (this._state !== "active") return;

      switch (frame.type) {
        case MsgData:
          try {
            session.write(frame.payload);
          } catch (error) {
            this.log.debug(error instanceof Error ? error.message : error);
            this.finish("pty-write-failed");
            return;
          }
          break;
        case MsgResize: {
          const size = parseResize(frame.payload);
          if (!size) {
            this.log.debug(`ignoring resize frame with ${frame.payload.length} byte payload`);
            break;
          }
          if (session.resize(size.rows, size.cols)) {
            this.ctx.hooks
              .callHook("session:resize", { id: this.id, ...size })
              .catch(this.hookFailed);
          }
          break;
        }
        case MsgExit:
          this.finish("client-exit");
          return;
        default:
          this.log.debug(`ignoring ${frameTypeName(frame.type)} frame`);
      }
    }
  }

  private finish(reason: SessionEndReason): void {
    if (this._state === "closed") return;
    const hadSession = this._state === "active";
    this._state = "closed";
    this._endReason = reason;
    this.reader.detach();

    const session = this.session;
    if (session && session.close()) {
      this.log.info(`session ended (${reason})`);
      this.ctx.hooks.callHook("session:end", { id: this.id, reason }).catch(this.hookFailed);
    }

    this.closeSocket(hadSession ? encodeExit() : undefined);
  }

  /** Best-effort: send `lastFrame`, half-close, destroy if the peer lingers. */
  private closeSocket(lastFrame?: Buffer): void {
    if (this.socket.destroyed) return;
    try {
      if (lastFrame && this.socket.writable) {
        this.socket.end(lastFrame);
      } else {
        this.socket.end();
      }
    } catch (error) {
      this.log.debug("socket end failed:", error);
    }
    this.destroyTimer = setTimeout(() => this.socket.destroy(), CLOSE_GRACE_MS);
    this.destroyTimer.unref();
  }

  private readonly hookFailed = (error: unknown): void => {
    this.log.warn("hook failed:", error);
  };
}
