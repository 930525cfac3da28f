import { homedir } from "node:os";
import { join } from "node:path";
import { execFileSync } from "node:child_process";

export interface TermlinkPaths {
  baseDir: string;
  pidFile: string;
}

/**
 * Resolve the real user's home directory, even under sudo.
 * Priority: $TERMLINK_DIR > SUDO_USER home > current HOME.
 */
function resolveBaseDir(env: NodeJS.ProcessEnv): string {
  if (env.TERMLINK_DIR) return env.TERMLINK_DIR;

  const sudoUser = env.SUDO_USER;
  if (sudoUser) {
    try {
      const home = execFileSync("getent", ["passwd", sudoUser], { stdio: "pipe" })
        .toString()
        .trim()
        .split(":")[5];
      if (home) return join(home, ".termlink");
    } catch {
      // fall through to HOME
    }
  }

  return join(homedir(), ".termlink");
}

export function termlinkPaths(baseDir?: string, env: NodeJS.ProcessEnv = process.env): TermlinkPaths {
  const base = baseDir ?? resolveBaseDir(env);
  return {
    baseDir: base,
    pidFile: join(base, "termlink.pid"),
  };
}
