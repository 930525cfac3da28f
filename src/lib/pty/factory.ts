import { spawn, type IPty } from "node-pty";
import { childEnv } from "../shell/resolve.ts";
import type { PtyFactory, PtyFactoryOptions, PtyProcess } from "./types.ts";

/**
 * Close the master and send SIGHUP. node-pty's Unix terminal does both in
 * `destroy()`, which its typings leave out; elsewhere fall back to a kill.
 */
function destroyTerminal(proc: IPty): void {
  if ("destroy" in proc && typeof proc.destroy === "function") {
    proc.destroy();
  } else {
    proc.kill("SIGHUP");
  }
}

/** Spawns `file` on a fresh pseudo-terminal through node-pty, bytes in and out. */
export const nodePtyFactory: PtyFactory = (
  file: string,
  args: string[],
  options: PtyFactoryOptions,
): PtyProcess => {
  const proc = spawn(file, args, {
    name: options.env?.TERM ?? "xterm-256color",
    cols: options.cols,
    rows: options.rows,
    cwd: options.cwd ?? process.cwd(),
    env: options.env ?? childEnv(process.env),
    encoding: null,
  });

  return {
    get pid() {
      return proc.pid;
    },
    write: (data) => proc.write(data),
    resize: (cols, rows) => proc.resize(cols, rows),
    pause: () => proc.pause(),
    resume: () => proc.resume(),
    destroy: () => destroyTerminal(proc),
    // with `encoding: null` node-pty emits Buffers despite its string typing
    onData: (cb) => proc.onData((data: string | Buffer) => cb(typeof data === "string" ? Buffer.from(data) : data)),
    onExit: (cb) => proc.onExit(cb),
  };
};
