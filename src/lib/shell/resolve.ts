import { accessSync, constants, statSync } from "node:fs";
import { delimiter, isAbsolute, join } from "node:path";
import { noShellError } from "../../errors/index.ts";
import type { SessionCommand } from "../protocol/handshake.ts";

const FALLBACK_SHELL = "/bin/sh";
const SEARCH_SHELLS = ["bash", "sh"];
const TERM_NAME = "xterm-256color";

export interface ResolveCommandOptions {
  /** Server-side override (TERMLINK_SHELL). */
  shellOverride?: string;
  env?: NodeJS.ProcessEnv;
}

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** Locate `name` on PATH, or check it directly when it is already a path. */
export function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (name.includes("/")) {
    return isExecutableFile(name) ? name : null;
  }
  for (const dir of (env.PATH ?? "").split(delimiter)) {
    if (!dir || !isAbsolute(dir)) continue;
    const candidate = join(dir, name);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

function searchShell(env: NodeJS.ProcessEnv, tried: string[]): string {
  for (const name of SEARCH_SHELLS) {
    const found = findExecutable(name, env);
    if (found) return found;
    tried.push(name);
  }
  if (isExecutableFile(FALLBACK_SHELL)) return FALLBACK_SHELL;
  tried.push(FALLBACK_SHELL);
  throw noShellError(tried);
}

/** Shell used to run a single command line with `-lc`. */
export function resolveLoginShell(env: NodeJS.ProcessEnv = process.env): string {
  return searchShell(env, []);
}

/** Shell started for an interactive session: override, then $SHELL, then PATH. */
export function resolveInteractiveShell(options: ResolveCommandOptions = {}): string {
  const env = options.env ?? process.env;
  const tried: string[] = [];

  for (const preferred of [options.shellOverride, env.SHELL]) {
    if (!preferred) continue;
    const found = findExecutable(preferred, env);
    if (found) return found;
    tried.push(preferred);
  }

  return searchShell(env, tried);
}

/**
 * Turn the handshake's command into the argv handed to the PTY:
 *   shell-line  -> [shell, "-lc", line]
 *   exec        -> argv verbatim
 *   interactive -> [shell, "-l"]
 */
export function resolveCommand(command: SessionCommand, options: ResolveCommandOptions = {}): string[] {
  switch (command.kind) {
    case "shell-line":
      return [resolveLoginShell(options.env), "-lc", command.line];
    case "exec":
      return [...command.argv];
    case "interactive":
      return [resolveInteractiveShell(options), "-l"];
  }
}

/** Environment for the session's child: the server's own, TERM defaulted. */
export function childEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  out.TERM ??= TERM_NAME;
  return out;
}
