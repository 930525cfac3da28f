export interface IDisposable {
  dispose: () => void;
}

export interface PtyExit {
  exitCode: number;
  signal?: number;
}

/** The slice of a PTY-attached child process a session drives. */
export interface PtyProcess {
  readonly pid: number;
  write: (data: Buffer) => void;
  resize: (cols: number, rows: number) => void;
  pause: () => void;
  resume: () => void;
  /** Close the master descriptor and hang up the child; does not wait for it to exit. */
  destroy: () => void;
  onData: (callback: (data: Buffer) => void) => IDisposable;
  onExit: (callback: (exit: PtyExit) => void) => IDisposable;
}

export interface PtyFactoryOptions {
  env?: Record<string, string>;
  cols: number;
  rows: number;
  cwd?: string;
}

export type PtyFactory = (file: string, args: string[], options: PtyFactoryOptions) => PtyProcess;

export type PtySessionState = "created" | "active" | "closing" | "closed";
