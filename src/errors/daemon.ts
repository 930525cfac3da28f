import type { DaemonErrorCode } from "./codes.ts";
import { TermlinkError } from "./base.ts";

export class DaemonError extends TermlinkError {
  constructor(code: DaemonErrorCode, options: { message: string; fix?: string }) {
    super(code, options);
    this.name = "DaemonError";
  }
}

export const daemonRunningError = (pid: number, pidPath: string): DaemonError =>
  new DaemonError("ERR_DAEMON_RUNNING", {
    message: `A termlink daemon is already running (pid ${pid})`,
    fix: `Run 'termlink stop --pidfile ${pidPath}' first.`,
  });

export const daemonNotRunningError = (pidPath: string): DaemonError =>
  new DaemonError("ERR_DAEMON_NOT_RUNNING", {
    message: `No running daemon recorded in ${pidPath}`,
  });

export const daemonSpawnError = (): DaemonError =>
  new DaemonError("ERR_DAEMON_SPAWN", {
    message: "Failed to start the daemon process",
  });
