import { sessionClosedError, spawnFailedError, writeFailedError } from "../../errors/index.ts";
import type { WindowSize } from "../protocol/frame.ts";
import type { TermlinkLogger } from "../../termlink-logger.ts";
import { createSilentLogger } from "../../termlink-logger.ts";
import type { IDisposable, PtyExit, PtyFactory, PtyProcess, PtySessionState } from "./types.ts";

export interface PtySessionOptions {
  rows: number;
  cols: number;
  env?: Record<string, string>;
  cwd?: string;
  logger?: TermlinkLogger;
}

export interface PtySessionListeners {
  onData: (chunk: Buffer) => void;
  /** Fires once, when the child exits. */
  onEnd: (exit: PtyExit) => void;
}

/**
 * One child process on one PTY, owned by a single connection.
 *
 * created -> active -> closing -> closed. A closed session is never reused;
 * `close()` may be called any number of times and tears down exactly once.
 */
export class PtySession {
  private _state: PtySessionState = "created";
  private _rows: number;
  private _cols: number;
  private readonly disposables: IDisposable[] = [];
  private readonly log: TermlinkLogger;
  private listeners: PtySessionListeners | null = null;
  private ended = false;

  private constructor(
    private readonly proc: PtyProcess,
    readonly argv: string[],
    size: WindowSize,
    logger: TermlinkLogger,
  ) {
    this._rows = size.rows;
    this._cols = size.cols;
    this.log = logger;
  }

  static spawn(factory: PtyFactory, argv: string[], options: PtySessionOptions): PtySession {
    const [file, ...args] = argv;
    if (!file) throw spawnFailedError(argv, new Error("empty command"));

    let proc: PtyProcess;
    try {
      proc = factory(file, args, {
        rows: options.rows,
        cols: options.cols,
        env: options.env,
        cwd: options.cwd,
      });
    } catch (error) {
      throw spawnFailedError(argv, error);
    }

    return new PtySession(
      proc,
      argv,
      { rows: options.rows, cols: options.cols },
      options.logger ?? createSilentLogger(),
    );
  }

  get state(): PtySessionState {
    return this._state;
  }

  get pid(): number {
    return this.proc.pid;
  }

  get size(): WindowSize {
    return { rows: this._rows, cols: this._cols };
  }

  start(listeners: PtySessionListeners): void {
    if (this._state !== "created") throw sessionClosedError(this._state);
    this.listeners = listeners;
    this.disposables.push(
      this.proc.onData((data) => {
        if (this._state === "active") listeners.onData(data);
      }),
      this.proc.onExit((exit) => this.end(exit)),
    );
    this._state = "active";
  }

  write(bytes: Buffer): void {
    if (this._state !== "active") throw sessionClosedError(this._state);
    if (bytes.length === 0) return;
    try {
      this.proc.write(bytes);
    } catch (error) {
      this._state = "closing";
      throw writeFailedError(error);
    }
  }

  /** Apply a new window size. Non-positive or fractional sizes are ignored. */
  resize(rows: number, cols: number): boolean {
    if (this._state !== "active") return false;
    if (!isDimension(rows) || !isDimension(cols)) return false;
    try {
      this.proc.resize(cols, rows);
    } catch (error) {
      this.log.debug(`resize to ${rows}x${cols} failed:`, error);
      return false;
    }
    this._rows = rows;
    this._cols = cols;
    return true;
  }

  pause(): void {
    if (this._state === "active") this.proc.pause();
  }

  resume(): void {
    if (this._state === "active") this.proc.resume();
  }

  /**
   * Stop watching the PTY, close the master and hang up the child without
   * waiting for it.
   * Returns true only for the call that performed the teardown.
   */
  close(): boolean {
    if (this._state === "closed") return false;
    this._state = "closing";

    for (const disposable of this.disposables.splice(0)) {
      attempt(this.log, "dispose PTY listener", () => disposable.dispose());
    }
    attempt(this.log, "close PTY master", () => this.proc.destroy());

    this._state = "closed";
    this.listeners = null;
    return true;
  }

  private end(exit: PtyExit): void {
    if (this.ended) return;
    this.ended = true;
    this.listeners?.onEnd(exit);
  }
}

function isDimension(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= 0xffff;
}

function attempt(log: TermlinkLogger, step: string, fn: () => void): void {
  try {
    fn();
  } catch (error) {
    log.debug(`teardown: ${step} failed:`, error);
  }
}
