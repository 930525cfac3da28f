import { spawn } from "node:child_process";
import { daemonRunningError, daemonSpawnError } from "../errors/index.ts";
import { PidFile } from "./pid-file.ts";

export interface DaemonizeOptions {
  /** Arguments for the detached child, e.g. ["serve", "--port", "7070"]. */
  args: string[];
  pidFile: string;
  env?: NodeJS.ProcessEnv;
}

/** Drop `--daemon` and `-d` so the child runs the server in the foreground. */
export function foregroundArgs(argv: string[]): string[] {
  return argv.filter((arg) => arg !== "--daemon" && arg !== "-d");
}

/**
 * Re-launch this CLI detached from the terminal with stdio discarded and
 * record the child's PID. Returns the PID without waiting for the child.
 */
export function daemonize(options: DaemonizeOptions): number {
  const pidFile = new PidFile(options.pidFile);
  const running = pidFile.read();
  if (running !== null) throw daemonRunningError(running, pidFile.path);

  const script = process.argv[1];
  const child = spawn(process.execPath, [...process.execArgv, ...(script ? [script] : []), ...options.args], {
    detached: true,
    stdio: "ignore",
    env: options.env ?? process.env,
    cwd: "/",
  });
  if (child.pid === undefined) throw daemonSpawnError();
  child.unref();

  pidFile.write(child.pid);
  return child.pid;
}
