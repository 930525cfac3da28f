import { createConnection, type Socket } from "node:net";
import type { Readable, Writable } from "node:stream";
import { connectFailedError, rawModeError } from "../../errors/index.ts";
import { createSilentLogger, type TermlinkLogger } from "../../termlink-logger.ts";
import {
  MsgData,
  MsgError,
  MsgExit,
  encodeData,
  encodeExit,
  encodeResize,
  frameTypeName,
  type Frame,
  type WindowSize,
} from "../protocol/frame.ts";
import { DEFAULT_COLS, DEFAULT_ROWS, encodeHandshake } from "../protocol/handshake.ts";
import { FrameReader } from "../protocol/reader.ts";

export type TerminalInput = Readable & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  unref?: () => unknown;
};

export type TerminalOutput = Writable & {
  rows?: number;
  columns?: number;
};

export interface TerminalIo {
  input: TerminalInput;
  /** Receives PTY output; its `resize` events drive Resize frames. */
  output: TerminalOutput;
  errorOutput: Writable;
}

export interface TerminalBridgeOptions {
  host: string;
  port: number;
  token?: string;
  /** Remote argv; the server's login shell when absent. */
  cmd?: string[];
  io?: Partial<TerminalIo>;
  logger?: TermlinkLogger;
}

export type BridgeEndReason = "server-exit" | "disconnected" | "input-closed" | "interrupted";

export interface BridgeResult {
  reason: BridgeEndReason;
  /** Text of every Error frame the server sent. */
  errors: string[];
}

/**
 * Client half of termlink: local terminal in raw mode, bridged to a remote
 * PTY over the framed protocol. The terminal mode is restored on every exit
 * path.
 */
export class TerminalBridge {
  private readonly io: TerminalIo;
  private readonly log: TermlinkLogger;
  private originalRaw = false;
  private rawApplied = false;
  private stop: ((reason: BridgeEndReason) => void) | null = null;
  private started = false;

  constructor(private readonly opts: TerminalBridgeOptions) {
    this.io = {
      input: opts.io?.input ?? process.stdin,
      output: opts.io?.output ?? process.stdout,
      errorOutput: opts.io?.errorOutput ?? process.stderr,
    };
    this.log = opts.logger ?? createSilentLogger();
  }

  get target(): string {
    return `${this.opts.host}:${this.opts.port}`;
  }

  /** Current local window size, 24x80 when the output is not a terminal. */
  querySize(): WindowSize {
    const { rows, columns } = this.io.output;
    return { rows: rows || DEFAULT_ROWS, cols: columns || DEFAULT_COLS };
  }

  /** Connect and bridge. Resolves when the session ends. */
  async run(): Promise<BridgeResult> {
    if (this.started) throw new Error("TerminalBridge.run() may only be called once");
    this.started = true;

    const size = this.querySize();
    const socket = await this.connect();

    const exitHandler = () => this.restoreMode();
    process.on("exit", exitHandler);
    try {
      this.enterRawMode();
      return await this.bridge(socket, size);
    } catch (error) {
      socket.destroy();
      throw error;
    } finally {
      this.restoreMode();
      process.removeListener("exit", exitHandler);
    }
  }

  /**
   * End the session from outside (signals). Returns false when there is no
   * live session to end, i.e. before `run()` connected or after it finished.
   */
  close(reason: BridgeEndReason = "interrupted"): boolean {
    if (!this.stop) return false;
    this.stop(reason);
    return true;
  }

  private connect(): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ host: this.opts.host, port: this.opts.port });
      const onError = (error: Error) => reject(connectFailedError(this.target, error));
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        socket.setNoDelay(true);
        resolve(socket);
      });
    });
  }

  private enterRawMode(): void {
    const { input } = this.io;
    if (!input.isTTY || !input.setRawMode) return;
    this.originalRaw = input.isRaw ?? false;
    try {
      input.setRawMode(true);
    } catch (error) {
      throw rawModeError(error);
    }
    this.rawApplied = true;
  }

  private restoreMode(): void {
    if (!this.rawApplied) return;
    this.rawApplied = false;
    try {
      this.io.input.setRawMode?.(this.originalRaw);
    } catch (error) {
      this.log.debug("could not restore terminal mode:", error);
    }
  }

  private bridge(socket: Socket, size: WindowSize): Promise<BridgeResult> {
    const { input, output } = this.io;
    const reader = new FrameReader(socket);
    const errors: string[] = [];

    return new Promise<BridgeResult>((resolve) => {
      const onInput = (chunk: Buffer | string) => {
        if (socket.writable) socket.write(encodeData(chunk));
      };
      const onInputEnd = () => finish("input-closed");
      const onResize = () => {
        if (!socket.writable) return;
        const { rows, cols } = this.querySize();
        socket.write(encodeResize(rows, cols));
      };
      const onSocketError = (error: Error) => this.log.debug("socket error:", error.message);

      const finish = (reason: BridgeEndReason) => {
        if (this.stop === null) return;
        this.stop = null;

        input.off("data", onInput);
        input.off("end", onInputEnd);
        output.off("resize", onResize);
        input.pause();
        input.unref?.();
        reader.detach();
        this.restoreMode();

        if (socket.writable) {
          socket.end(encodeExit());
        } else {
          socket.destroy();
        }
        this.log.debug(`session ended (${reason})`);
        resolve({ reason, errors });
      };
      this.stop = finish;

      socket.on("error", onSocketError);
      socket.write(
        encodeHandshake({ rows: size.rows, cols: size.cols, token: this.opts.token, cmd: this.opts.cmd }),
      );

      input.on("data", onInput);
      input.once("end", onInputEnd);
      input.resume();
      output.on("resize", onResize);

      this.pumpSocket(reader, errors).then(finish, (error: unknown) => {
        this.log.debug("socket pump failed:", error);
        finish("disconnected");
      });
    });
  }

  /** Frames -> local terminal until Exit or the socket goes away. */
  private async pumpSocket(reader: FrameReader, errors: string[]): Promise<BridgeEndReason> {
    const { output, errorOutput } = this.io;
    for (;;) {
      let frame: Frame;
      try {
        frame = await reader.read();
      } catch {
        return "disconnected";
      }

      switch (frame.type) {
        case MsgData:
          output.write(frame.payload);
          break;
        case MsgError: {
          const text = frame.payload.toString("utf8");
          errors.push(text);
          errorOutput.write(`${text}\r\n`);
          break;
        }
        case MsgExit:
          return "server-exit";
        default:
          this.log.debug(`ignoring ${frameTypeName(frame.type)} frame`);
      }
    }
  }
}
