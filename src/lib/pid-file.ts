import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { isProcessAlive, safeKill } from "./utils.ts";

/** PID of a background `termlink serve`, stored as plain text. */
export class PidFile {
  constructor(readonly path: string) {}

  /** Recorded PID if that process is still alive; stale files are removed. */
  read(): number | null {
    if (!existsSync(this.path)) return null;
    const pid = Number(readFileSync(this.path, "utf-8").trim());
    if (!Number.isInteger(pid) || pid <= 0) {
      this.remove();
      return null;
    }
    if (isProcessAlive(pid)) return pid;
    this.remove();
    return null;
  }

  write(pid: number): void {
    mkdirSync(dirname(this.path), { recursive: true, mode: 0o700 });
    writeFileSync(this.path, String(pid), { mode: 0o600 });
  }

  /** Remove the file, but only while it still names `pid` (when given). */
  remove(pid?: number): void {
    if (pid !== undefined) {
      try {
        if (Number(readFileSync(this.path, "utf-8").trim()) !== pid) return;
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === "ENOENT") return;
        throw error;
      }
    }
    rmSync(this.path, { force: true });
  }

  /** Signal the recorded process. Returns its PID, or null when none was running. */
  kill(signal: NodeJS.Signals = "SIGTERM"): number | null {
    const pid = this.read();
    if (pid === null) return null;
    safeKill(pid, signal);
    this.remove();
    return pid;
  }
}
